/**
 * Configuration module exports
 */

// Defaults
export { DEFAULT_CONFIG, deepMerge } from "./defaults";
// Loader
export {
  CONFIG_FILE_NAMES,
  findAndLoadConfig,
  findConfigFile,
  loadConfig,
  parseConfigContent,
} from "./loader";
// Resolver
export {
  getServiceConfig,
  getServiceNames,
  type ResolvedPath,
  resolvePaths,
  resolveServicePaths,
} from "./resolver";
// Validator
export { ConfigError, validateConfig } from "./validator";
// Template
export { CONFIG_TEMPLATE } from "./template";
