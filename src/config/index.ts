/**
 * Configuration module exports
 */

// Defaults
export { DEFAULT_CONFIG, deepMerge, isRecord } from "./defaults";
// Inline options
export {
  buildInlineConfig,
  extractInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineConfigOptions,
  mergeInlineConfig,
  type ParsedInlineValues,
} from "./inline";
// Loader
export { CONFIG_FILE_NAMES, configFromInlineOptions, findAndLoadConfig, findConfigFile, loadConfig } from "./loader";
// Resolver
export { isAbsoluteLocation, resolvePaths } from "./resolver";
// Validator
export { ConfigError, validateConfig } from "./validator";
