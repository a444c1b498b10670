/**
 * Configuration Management Module
 *
 * Main API for loading, validating, and managing the dbdconf tool's own
 * configuration.
 *
 * @example
 * ```typescript
 * import { getConfig, validateConfig } from './config/index.js';
 *
 * const config = getConfig();
 * console.log(config.paths.confFile);
 *
 * const result = validateConfig(config);
 * if (!result.valid) {
 *   console.error(result.errors);
 * }
 * ```
 */

// Schema exports
export {
  type PathsConfig,
  type LoggingConfig,
  type WritesConfig,
  type ToolConfig,
  type ValidatedToolConfig,
  PathsConfigSchema,
  LoggingConfigSchema,
  WritesConfigSchema,
  ToolConfigSchema,
} from './schema.js';

// Default configuration
export { DEFAULT_CONFIG, MAINTAINED_PARAMETERS } from './defaults.js';

// Loader functions
export {
  loadConfig,
  getConfig,
  reloadConfig,
  clearConfigCache,
  loadConfigFile,
  loadEnvironmentConfig,
  validateConfigFile,
  deepMerge,
  deepClone,
  formatValidationErrors as formatLoaderErrors,
  type ConfigSource,
  type ConfigFragment,
  type LoadConfigOptions,
} from './loader.js';

// Validation functions
export {
  validateLogLevel,
  validatePaths,
  validateParameters,
  validateConfig,
  formatValidationErrors,
  getConfigSummary,
  type ValidationResult,
} from './validation.js';
