/**
 * Configuration Validation Utilities
 *
 * Semantic checks the schema cannot express, and error messaging for them.
 */

import fs from 'fs';
import path from 'path';
import type { LoggingConfig, PathsConfig, ToolConfig } from './schema.js';
import { InvalidValueError, UnrecognizedKeyError } from '../editor/errors.js';
import { SECRET_TOKENS, textCodec } from '../editor/registry.js';
import { isConfigToken, lookup } from '../editor/tokens.js';
import type { ValidationResult } from '../editor/validators.js';

export type { ValidationResult };

/**
 * Validate log level.
 */
export function validateLogLevel(config: LoggingConfig): ValidationResult {
  const errors: string[] = [];

  const validLevels = ['debug', 'info', 'warn', 'error'];
  if (!validLevels.includes(config.level)) {
    errors.push(`logging.level: expected 'debug' | 'info' | 'warn' | 'error', got '${config.level}'`);
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

function checkDirectory(field: string, filePath: string, errors: string[]): void {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    errors.push(`${field}: directory does not exist: ${dir} - create it first or use a different path`);
    return;
  }
  try {
    fs.accessSync(dir, fs.constants.W_OK);
  } catch {
    errors.push(`${field}: directory is not writable: ${dir} - check permissions`);
  }
}

/**
 * Validate file paths in configuration.
 *
 * @param checkExistence - Also require each path's directory to exist and be writable
 */
export function validatePaths(
  paths: PathsConfig,
  logging: LoggingConfig,
  checkExistence: boolean = false,
): ValidationResult {
  const errors: string[] = [];

  if (paths.confFile === paths.defaultsFile) {
    errors.push(`paths: confFile and defaultsFile must differ, both are '${paths.confFile}'`);
  }

  if (checkExistence) {
    checkDirectory('paths.confFile', paths.confFile, errors);
    checkDirectory('paths.defaultsFile', paths.defaultsFile, errors);
    if (logging.filePath) {
      checkDirectory('logging.filePath', logging.filePath, errors);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validate static parameters against the slurmdbd.conf vocabulary and each
 * key's validator.
 */
export function validateParameters(parameters: ToolConfig['parameters']): ValidationResult {
  const errors: string[] = [];

  for (const [name, value] of Object.entries(parameters)) {
    const text = typeof value === 'boolean' ? (value ? 'yes' : 'no') : String(value);
    try {
      textCodec(lookup(name)).encode(text);
    } catch (error) {
      if (error instanceof UnrecognizedKeyError) {
        errors.push(`parameters.${name}: not a slurmdbd.conf option`);
        continue;
      }
      if (error instanceof InvalidValueError) {
        errors.push(`parameters.${name}: ${error.message}`);
        continue;
      }
      throw error;
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validate complete configuration.
 *
 * Runs all validation checks and aggregates errors.
 */
export function validateConfig(config: ToolConfig, checkFilePaths: boolean = false): ValidationResult {
  const allErrors: string[] = [];

  allErrors.push(...validateLogLevel(config.logging).errors);
  allErrors.push(...validatePaths(config.paths, config.logging, checkFilePaths).errors);
  allErrors.push(...validateParameters(config.parameters).errors);

  return {
    valid: allErrors.length === 0,
    errors: allErrors,
  };
}

/**
 * Format validation errors as a user-friendly message.
 */
export function formatValidationErrors(errors: string[]): string {
  if (errors.length === 0) {
    return 'Configuration is valid';
  }

  const header = 'Configuration validation failed:';
  const errorList = errors.map((err) => `  • ${err}`).join('\n');

  return `${header}\n${errorList}`;
}

/**
 * Get configuration summary for display.
 */
export function getConfigSummary(config: ToolConfig): string {
  const lines: string[] = [];

  lines.push('Configuration Summary:');
  lines.push('');
  lines.push('Paths:');
  lines.push(`  slurmdbd.conf: ${config.paths.confFile}`);
  lines.push(`  Defaults File: ${config.paths.defaultsFile}`);
  lines.push('');
  lines.push('Logging:');
  lines.push(`  Level: ${config.logging.level}`);
  lines.push(`  Console Output: ${config.logging.consoleOutput}`);
  lines.push(`  File Path: ${config.logging.filePath ?? 'none'}`);
  lines.push('');
  lines.push('Writes:');
  lines.push(`  Lock: ${config.writes.lock}`);
  lines.push('');
  lines.push('Static Parameters:');
  const names = Object.keys(config.parameters);
  if (names.length === 0) {
    lines.push('  none');
  }
  for (const name of names) {
    const secret = isConfigToken(name) && SECRET_TOKENS.has(name);
    lines.push(`  ${name}: ${secret ? '********' : config.parameters[name]}`);
  }

  return lines.join('\n');
}
