/**
 * Tool Configuration Schema Definition
 *
 * Defines TypeScript interfaces and Zod schemas for the dbdconf tool's own
 * settings: where slurmdbd's files live, how the tool logs, and which
 * parameters every render writes.
 */

import { z } from 'zod';

/**
 * Paths Configuration
 *
 * Locations of the two files the tool edits.
 */
export interface PathsConfig {
  /**
   * slurmdbd configuration file.
   *
   * @default "/etc/slurm/slurmdbd.conf"
   */
  confFile: string;

  /**
   * Environment-defaults file sourced by the slurmdbd service unit.
   *
   * @default "/etc/default/slurmdbd"
   */
  defaultsFile: string;
}

/**
 * Logging Configuration
 *
 * Controls logging behavior, output destinations, and verbosity.
 */
export interface LoggingConfig {
  /**
   * Log level controlling verbosity of output.
   *
   * @default "info"
   * @example "debug"
   */
  level: 'debug' | 'info' | 'warn' | 'error';

  /**
   * Optional file path for log output. If undefined, only console logging is used.
   *
   * @default undefined
   * @example "/var/log/dbdconf.log"
   */
  filePath?: string;

  /**
   * Whether to output logs to console.
   *
   * @default true
   */
  consoleOutput: boolean;
}

/**
 * Write Configuration
 */
export interface WritesConfig {
  /**
   * Take the advisory lock file (`<file>.lock`) around every write.
   *
   * @default true
   */
  lock: boolean;
}

/**
 * Tool Configuration
 *
 * Complete configuration structure combining all configuration sections.
 */
export interface ToolConfig {
  paths: PathsConfig;
  logging: LoggingConfig;
  writes: WritesConfig;

  /**
   * slurmdbd.conf parameters written by every render, keyed by on-disk key
   * name. Lowest precedence of all parameter sources.
   */
  parameters: Record<string, string | number | boolean>;
}

/**
 * Zod Schema for Paths Configuration
 */
export const PathsConfigSchema = z.object({
  confFile: z.string().min(1, {
    message: 'confFile must be a non-empty path',
  }),
  defaultsFile: z.string().min(1, {
    message: 'defaultsFile must be a non-empty path',
  }),
});

/**
 * Zod Schema for Logging Configuration
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']),
  filePath: z.string().optional(),
  consoleOutput: z.boolean(),
});

/**
 * Zod Schema for Write Configuration
 */
export const WritesConfigSchema = z.object({
  lock: z.boolean(),
});

/**
 * Complete Tool Configuration Schema
 */
export const ToolConfigSchema = z.object({
  paths: PathsConfigSchema,
  logging: LoggingConfigSchema,
  writes: WritesConfigSchema,
  parameters: z.record(z.union([z.string(), z.number(), z.boolean()])),
});

/**
 * Type alias for validated configuration
 */
export type ValidatedToolConfig = z.infer<typeof ToolConfigSchema>;
