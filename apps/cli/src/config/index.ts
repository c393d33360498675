export type { ConfigData } from "./defaults.js";
export { CONFIG_KEYS, DEFAULTS, ENV_MAP } from "./defaults.js";
export {
  readConfigFile,
  writeConfigFile,
  updateConfigFile,
  getConfigPath,
  pickConfig,
} from "./configFile.js";
export { resolveConfig, mergeConfig, setCliOverride } from "./resolve.js";
export { initConfig, getConfig } from "./runtime.js";
export {
  VARIANTS,
  OPPONENTS,
  parseVariant,
  parseOpponent,
  parseStrategy,
  parseLogLevel,
  parseBudget,
  parseExploration,
  parseConfigKey,
  parseGameCount,
  validateValue,
  toSettings,
} from "./settings.js";
export type { Opponent, Settings } from "./settings.js";
