import type { LogLevelString } from "bunyan";
import { ALLOWED_VALUES, ConfigData } from "./defaults.js";

export type BoardStyle = "unicode" | "ascii";

/** Typed view of the resolved string config */
export interface Settings {
  logLevel: LogLevelString;
  freezeOnGameOver: boolean;
  boardStyle: BoardStyle;
}

export class ConfigError extends Error {
  constructor(key: keyof ConfigData, value: string) {
    super(
      `Invalid value for ${key}: "${value}". ` +
        `Expected one of: ${ALLOWED_VALUES[key].join(", ")}`,
    );
    this.name = "ConfigError";
  }
}

export function isAllowedValue(key: keyof ConfigData, value: string): boolean {
  return ALLOWED_VALUES[key].includes(value);
}

function isLogLevel(value: string): value is LogLevelString {
  return ALLOWED_VALUES.logLevel.includes(value);
}

function isBoardStyle(value: string): value is BoardStyle {
  return value === "unicode" || value === "ascii";
}

export function parseSettings(config: ConfigData): Settings {
  if (!isLogLevel(config.logLevel)) {
    throw new ConfigError("logLevel", config.logLevel);
  }
  if (!isAllowedValue("freezeOnGameOver", config.freezeOnGameOver)) {
    throw new ConfigError("freezeOnGameOver", config.freezeOnGameOver);
  }
  if (!isBoardStyle(config.boardStyle)) {
    throw new ConfigError("boardStyle", config.boardStyle);
  }
  return {
    logLevel: config.logLevel,
    freezeOnGameOver: config.freezeOnGameOver === "true",
    boardStyle: config.boardStyle,
  };
}
