/**
 * Option Parsing and Validation Framework
 *
 * Provides utilities for parsing, validating, and normalizing CLI options.
 * Supports:
 * - Key=Value assignments
 * - Path resolution against the tool configuration
 * - Type coercion and normalization
 * - Environment variable overrides
 */

import path from 'path';
import fs from 'fs-extra';
import { loadConfig, type ToolConfig } from '../config/index.js';
import { isConfEditorError } from '../editor/errors.js';
import { log } from './logger.js';

/**
 * Options every command inherits from the program
 */
export interface GlobalOptions {
  verbose?: boolean;
  /** Tool configuration file */
  config?: string;
  /** slurmdbd.conf to edit */
  conf?: string;
  /** Environment-defaults file to edit */
  defaults?: string;
  color?: boolean;
}

/**
 * Everything a command needs to find and write its files
 */
export interface CliContext {
  config: ToolConfig;
  confFile: string;
  defaultsFile: string;
  lock: boolean;
}

/**
 * Validation error with helpful message
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly value: unknown,
    public readonly suggestion?: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Parse a `Key=Value` assignment. The value is everything after the first
 * "=" and may itself contain "=".
 *
 * @throws ValidationError if there is no "=" or the key is empty
 */
export function parseAssignment(assignment: string): [string, string] {
  const separator = assignment.indexOf('=');
  if (separator <= 0) {
    throw new ValidationError(
      `Invalid assignment: "${assignment}"`,
      'assignment',
      assignment,
      'Use format like "DebugLevel=info"',
    );
  }
  return [assignment.slice(0, separator).trim(), assignment.slice(separator + 1)];
}

/**
 * Parse several assignments into an ordered mapping; a repeated key keeps
 * its last value.
 */
export function parseAssignments(assignments: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const assignment of assignments) {
    const [key, value] = parseAssignment(assignment);
    result[key] = value;
  }
  return result;
}

/**
 * Resolve and validate a file path
 *
 * @param filePath - Path to resolve (can be relative or absolute)
 * @param mustExist - Whether the path must exist
 * @returns Absolute path
 * @throws ValidationError if path is invalid or doesn't exist when required
 */
export function resolvePath(filePath: string, mustExist = false): string {
  // Normalize and resolve to absolute path
  const resolved = path.resolve(filePath.trim());

  if (mustExist && !fs.existsSync(resolved)) {
    throw new ValidationError(
      `Path does not exist: "${filePath}"`,
      'path',
      filePath,
      'Provide a valid file path',
    );
  }

  return resolved;
}

/**
 * Get slurmdbd.conf path
 *
 * Priority:
 * 1. --conf flag
 * 2. paths.confFile from configuration (which DBDCONF_CONF_FILE overrides)
 */
export function getConfPath(confOption: string | undefined, config: ToolConfig): string {
  return resolvePath(confOption || config.paths.confFile, false);
}

/**
 * Get environment-defaults file path
 *
 * Priority:
 * 1. --defaults flag
 * 2. paths.defaultsFile from configuration (which DBDCONF_DEFAULTS_FILE overrides)
 */
export function getDefaultsPath(defaultsOption: string | undefined, config: ToolConfig): string {
  return resolvePath(defaultsOption || config.paths.defaultsFile, false);
}

/**
 * Load the tool configuration and resolve both file paths.
 *
 * @throws ValidationError if --config names a missing file
 */
export function loadCliContext(options: GlobalOptions): CliContext {
  const configFile = options.config ? resolvePath(options.config, true) : undefined;
  const config = loadConfig({ configFile });

  return {
    config,
    confFile: getConfPath(options.conf, config),
    defaultsFile: getDefaultsPath(options.defaults, config),
    lock: config.writes.lock,
  };
}

/**
 * Check if verbose mode is enabled
 *
 * Checks both --verbose flag and DBDCONF_VERBOSE environment variable
 */
export function isVerboseEnabled(verboseFlag?: boolean): boolean {
  if (verboseFlag !== undefined) {
    return verboseFlag;
  }

  const envVerbose = process.env.DBDCONF_VERBOSE;
  return envVerbose === 'true' || envVerbose === '1';
}

/**
 * Normalize boolean value from various input formats
 */
export function normalizeBoolean(value: unknown): boolean {
  if (typeof value === 'boolean') {
    return value;
  }

  const strValue = String(value).toLowerCase().trim();
  return strValue === 'true' || strValue === '1' || strValue === 'yes';
}

/**
 * Report an operator error and exit with status 2. Anything else is
 * rethrown for the entry point to handle.
 */
export function handleCommandError(error: unknown): never {
  if (error instanceof ValidationError) {
    log.error(error.message);
    if (error.suggestion) {
      log.info(`Suggestion: ${error.suggestion}`);
    }
    process.exit(2);
  }
  if (isConfEditorError(error)) {
    log.error(error.message);
    log.debug(`Error code: ${error.code}`);
    process.exit(2);
  }
  throw error;
}
