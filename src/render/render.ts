/**
 * Configuration Rendering
 *
 * Regenerates slurmdbd.conf from scratch out of the assembled parameter
 * sources, then brings the environment-defaults file in line with the chosen
 * database endpoint.
 */

import fs from 'fs';
import yaml from 'js-yaml';
import { z, ZodError } from 'zod';
import { log } from '../cli/logger.js';
import { formatValidationErrors } from '../config/loader.js';
import { SlurmdbdConfEditor } from '../editor/conf-editor.js';
import { EnvDefaultsEditor, type EnvApplyResult } from '../editor/env-defaults.js';
import {
  applyParameters,
  assembleParameters,
  databaseParameters,
  type DatabaseInfo,
  type ParameterMap,
} from './parameters.js';

const ParameterMapSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

export const DatabaseInfoSchema = z.object({
  username: z.string().min(1, { message: 'username must be a non-empty string' }),
  password: z.string(),
  name: z.string().min(1).optional(),
  endpoints: z.string(),
});

/**
 * Zod Schema for a render parameters file
 */
export const RenderParamsSchema = z
  .object({
    peer: ParameterMapSchema.optional(),
    overrides: ParameterMapSchema.optional(),
    database: DatabaseInfoSchema.optional(),
  })
  .strict();

export type RenderParams = z.infer<typeof RenderParamsSchema>;

export interface RenderOptions {
  confFile: string;
  defaultsFile: string;
  /** Static parameters rendered on every run */
  defaults?: ParameterMap;
  peer?: ParameterMap;
  overrides?: ParameterMap;
  database?: DatabaseInfo;
  /** Hold the advisory locks while writing. @default true */
  lock?: boolean;
  /** Build the content without writing either file */
  dryRun?: boolean;
  now?: () => Date;
}

export interface RenderResult {
  /** Final parameter mapping, in the order written */
  parameters: Record<string, string>;
  /** slurmdbd.conf text that was (or, for a dry run, would be) written */
  content: string;
  /** Defaults-file outcome; absent without database data or on a dry run */
  env?: EnvApplyResult;
}

/**
 * Load a render parameters file (YAML).
 *
 * @throws {Error} If the file is not valid YAML or does not match the schema
 */
export function loadRenderParams(filePath: string): RenderParams {
  const parsed = yaml.load(fs.readFileSync(filePath, 'utf8')) ?? {};
  try {
    return RenderParamsSchema.parse(parsed);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(`${filePath}: ${formatValidationErrors(error)}`);
    }
    throw error;
  }
}

/**
 * Regenerate slurmdbd.conf and update the defaults file.
 *
 * Nothing is written unless every parameter is valid. slurmdbd.conf is
 * written before the defaults file; the caller restarts slurmdbd afterwards.
 *
 * @throws {EndpointError} If database data carries no usable endpoint
 * @throws {UnrecognizedKeyError | InvalidValueError} If a parameter is rejected
 */
export function renderConfiguration(options: RenderOptions): RenderResult {
  const database = options.database ? databaseParameters(options.database) : undefined;
  const parameters = assembleParameters({
    defaults: options.defaults,
    peer: options.peer,
    database: database?.parameters,
    overrides: options.overrides,
  });

  const editor = new SlurmdbdConfEditor(options.confFile, { lock: options.lock, now: options.now });
  applyParameters(editor, parameters);

  if (options.dryRun) {
    log.debug(`Dry run: not writing ${editor.path}`);
    return { parameters, content: editor.render() };
  }

  const content = editor.dump();
  log.info(`Wrote ${editor.size} parameters to ${editor.path}`);

  if (!database) {
    return { parameters, content };
  }

  const env = new EnvDefaultsEditor(options.defaultsFile, { lock: options.lock }).apply(database.env);
  return { parameters, content, env };
}
