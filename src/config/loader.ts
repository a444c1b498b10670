/**
 * Configuration File Loader
 *
 * Loads the tool configuration from multiple sources with precedence:
 * 1. Environment variables (highest priority)
 * 2. Explicit config file (--config)
 * 3. Project-local config (.dbdconf/config.yml)
 * 4. Global user config (~/.dbdconf/config.yml)
 * 5. Built-in defaults (lowest priority)
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ToolConfigSchema, type ToolConfig } from './schema.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { ZodError } from 'zod';

/**
 * Configuration source for tracking where settings came from
 */
export type ConfigSource = 'default' | 'global' | 'project' | 'file' | 'env';

/**
 * Loosely-typed configuration fragment, validated only after merging
 */
export type ConfigFragment = Record<string, unknown>;

export interface LoadConfigOptions {
  /**
   * Explicit configuration file, applied above the project file.
   */
  configFile?: string;
}

/**
 * Cached configuration to avoid repeated file system access
 */
let cachedConfig: ToolConfig | null = null;

function isPlainObject(value: unknown): value is ConfigFragment {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load and merge configuration from all sources.
 *
 * @returns Complete configuration with all required fields
 * @throws {Error} If a file cannot be read or the merged configuration is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): ToolConfig {
  let config: ConfigFragment = deepClone({ ...DEFAULT_CONFIG });

  const globalConfig = loadConfigFile(path.join(os.homedir(), '.dbdconf', 'config.yml'));
  if (globalConfig) {
    config = deepMerge(config, globalConfig);
  }

  const projectConfig = loadConfigFile(path.join(process.cwd(), '.dbdconf', 'config.yml'));
  if (projectConfig) {
    config = deepMerge(config, projectConfig);
  }

  if (options.configFile) {
    const explicitConfig = loadConfigFile(options.configFile);
    if (!explicitConfig) {
      throw new Error(`Configuration file not found: ${options.configFile}`);
    }
    config = deepMerge(config, explicitConfig);
  }

  const envConfig = loadEnvironmentConfig();
  if (envConfig) {
    config = deepMerge(config, envConfig);
  }

  try {
    const validated: ToolConfig = ToolConfigSchema.parse(config);
    cachedConfig = validated;
    return validated;
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(formatValidationErrors(error));
    }
    throw error;
  }
}

/**
 * Get cached configuration or load if not cached.
 */
export function getConfig(options: LoadConfigOptions = {}): ToolConfig {
  if (cachedConfig) {
    return cachedConfig;
  }
  return loadConfig(options);
}

/**
 * Reload configuration, clearing cache and re-reading all sources.
 */
export function reloadConfig(options: LoadConfigOptions = {}): ToolConfig {
  cachedConfig = null;
  return loadConfig(options);
}

/**
 * Clear cached configuration. Useful for testing.
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}

/**
 * Load configuration from a YAML file.
 *
 * @param filePath - Path to YAML configuration file
 * @returns Parsed configuration object or null if file doesn't exist or is empty
 * @throws {Error} If YAML parsing fails or the document is not a mapping
 */
export function loadConfigFile(filePath: string): ConfigFragment | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      throw new Error(
        `YAML parsing error in ${filePath}:\n` + `  Line ${error.mark.line + 1}: ${error.reason}`,
      );
    }
    throw error;
  }

  // Empty file
  if (parsed === undefined || parsed === null) {
    return null;
  }

  if (!isPlainObject(parsed)) {
    throw new Error(`Invalid configuration file: ${filePath} - expected object`);
  }

  return parsed;
}

/**
 * Load configuration from environment variables.
 *
 * Supports environment variables with DBDCONF_ prefix:
 * - DBDCONF_CONF_FILE
 * - DBDCONF_DEFAULTS_FILE
 * - DBDCONF_LOG_LEVEL
 * - DBDCONF_LOG_FILE
 * - DBDCONF_CONSOLE_OUTPUT
 * - DBDCONF_LOCK
 *
 * @returns Partial configuration from environment variables
 */
export function loadEnvironmentConfig(): ConfigFragment | null {
  const env = process.env;
  const config: {
    paths?: Record<string, string>;
    logging?: Record<string, string | boolean>;
    writes?: Record<string, boolean>;
  } = {};

  // Paths
  if (env.DBDCONF_CONF_FILE) {
    config.paths = config.paths || {};
    config.paths.confFile = env.DBDCONF_CONF_FILE;
  }
  if (env.DBDCONF_DEFAULTS_FILE) {
    config.paths = config.paths || {};
    config.paths.defaultsFile = env.DBDCONF_DEFAULTS_FILE;
  }

  // Logging
  if (env.DBDCONF_LOG_LEVEL) {
    config.logging = config.logging || {};
    config.logging.level = env.DBDCONF_LOG_LEVEL;
  }
  if (env.DBDCONF_LOG_FILE) {
    config.logging = config.logging || {};
    config.logging.filePath = env.DBDCONF_LOG_FILE;
  }
  if (env.DBDCONF_CONSOLE_OUTPUT !== undefined) {
    config.logging = config.logging || {};
    config.logging.consoleOutput = env.DBDCONF_CONSOLE_OUTPUT === 'true';
  }

  // Writes
  if (env.DBDCONF_LOCK !== undefined) {
    config.writes = { lock: env.DBDCONF_LOCK !== 'false' };
  }

  return Object.keys(config).length > 0 ? config : null;
}

/**
 * Deep merge two objects, with source overriding target.
 *
 * - Nested objects are merged recursively
 * - Arrays are replaced entirely (not merged)
 * - Primitive values in source override target
 * - Undefined values in source are skipped
 */
export function deepMerge(target: ConfigFragment, source: ConfigFragment): ConfigFragment {
  const result: ConfigFragment = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (sourceValue === undefined) {
      continue;
    }

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Deep clone an object.
 */
export function deepClone<T>(obj: T): T {
  return structuredClone(obj);
}

/**
 * Format Zod validation errors into human-readable message.
 */
export function formatValidationErrors(error: ZodError): string {
  const errors = error.issues.map((err) => {
    const issuePath = err.path.join('.');
    return `  • ${issuePath}: ${err.message}`;
  });

  return `Configuration validation failed:\n${errors.join('\n')}`;
}

/**
 * Validate a configuration file without loading it.
 *
 * @returns Validation result with errors if any
 */
export function validateConfigFile(filePath: string): { valid: boolean; errors?: string } {
  try {
    const config = loadConfigFile(filePath);
    if (!config) {
      return { valid: false, errors: 'Configuration file not found' };
    }

    const merged = deepMerge({ ...DEFAULT_CONFIG }, config);
    ToolConfigSchema.parse(merged);

    return { valid: true };
  } catch (error) {
    if (error instanceof ZodError) {
      return { valid: false, errors: formatValidationErrors(error) };
    }
    if (error instanceof Error) {
      return { valid: false, errors: error.message };
    }
    return { valid: false, errors: 'Unknown validation error' };
  }
}
