export type { ConfigData } from "./defaults.js";
export {
  CONFIG_KEYS,
  DEFAULTS,
  ENV_MAP,
  ALLOWED_VALUES,
} from "./defaults.js";
export {
  readConfigFile,
  writeConfigFile,
  updateConfigFile,
  getConfigDir,
  getConfigPath,
} from "./configFile.js";
export { resolveConfig, setCliOverride, clearCliOverrides } from "./resolve.js";
export { parseSettings, isAllowedValue, ConfigError } from "./settings.js";
export type { Settings, BoardStyle } from "./settings.js";
