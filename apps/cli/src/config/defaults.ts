export interface ConfigData {
  /** bunyan level: trace, debug, info, warn, error or fatal */
  logLevel: string;
  /** "true" stops placements and passes once the game is over */
  freezeOnGameOver: string;
  /** "unicode" or "ascii" board drawing */
  boardStyle: string;
}

export const CONFIG_KEYS: (keyof ConfigData)[] = [
  "logLevel",
  "freezeOnGameOver",
  "boardStyle",
];

export const DEFAULTS: ConfigData = {
  logLevel: "warn",
  freezeOnGameOver: "false",
  boardStyle: "unicode",
};

export const ENV_MAP: Record<keyof ConfigData, string> = {
  logLevel: "REVERSI_LOG_LEVEL",
  freezeOnGameOver: "REVERSI_FREEZE_ON_GAME_OVER",
  boardStyle: "REVERSI_BOARD_STYLE",
};

/** Accepted values per key, checked by `config set` and when settings are parsed */
export const ALLOWED_VALUES: Record<keyof ConfigData, readonly string[]> = {
  logLevel: ["trace", "debug", "info", "warn", "error", "fatal"],
  freezeOnGameOver: ["true", "false"],
  boardStyle: ["unicode", "ascii"],
};
