/**
 * Configuration module exports
 */

// Defaults
export { DEFAULT_CONFIG, deepMerge } from "./defaults";
// Environment
export { applyEnvOverrides, dailyCronFromTime, type Env } from "./env";
// Loader
export {
  CONFIG_FILE_NAMES,
  ConfigError,
  configFromEnv,
  findAndLoadConfig,
  findConfigFile,
  loadConfig,
} from "./loader";
// Resolver
export { parseTargetArg, resolvePaths, resolveScheduleTarget } from "./resolver";
// Validator
export { validateConfig } from "./validator";
