/**
 * Environment-Defaults File Editor
 *
 * Upserts and deletes shell `KEY=VALUE` lines in the file the slurmdbd service
 * unit sources (/etc/default/slurmdbd). Unlike slurmdbd.conf this file is
 * hand-edited, so every line the caller does not target is kept verbatim:
 * comments, lines without "=", and other variables with their original casing.
 *
 * Keys match case-insensitively and are always written upper-cased.
 */

import path from 'path';
import { log } from '../cli/logger.js';
import { InvalidValueError } from './errors.js';
import { readTextIfExists, withFileLock, writeFileAtomic } from './file-io.js';
import { checkSingleLine } from './validators.js';

/**
 * Requested changes: a string sets the variable, null removes it.
 */
export type EnvChanges = Readonly<Record<string, string | null>>;

export interface EnvDefaultsOptions {
  /**
   * Hold the advisory lock while rewriting.
   *
   * @default true
   */
  lock?: boolean;
}

/**
 * Outcome of an apply, by upper-cased variable name
 */
export interface EnvApplyResult {
  updated: string[];
  added: string[];
  removed: string[];
}

/**
 * Check that every change writes exactly one `KEY=VALUE` line.
 *
 * @throws {InvalidValueError} On an empty key, a key with "=" or whitespace,
 *   or a value with a line break
 */
export function checkEnvChanges(changes: EnvChanges): void {
  for (const [key, value] of Object.entries(changes)) {
    const name = key.trim();
    if (name.length === 0 || /[=\s]/.test(name)) {
      throw new InvalidValueError(`Not a valid variable name: ${JSON.stringify(key)}`, key);
    }
    if (value === null) {
      continue;
    }
    try {
      checkSingleLine(value);
    } catch (error) {
      if (error instanceof InvalidValueError) {
        throw new InvalidValueError(error.message, value, name.toUpperCase());
      }
      throw error;
    }
  }
}

/**
 * Apply changes to the lines of a defaults file.
 *
 * Pure counterpart of {@link EnvDefaultsEditor.apply}; `lines` carry no line
 * terminators.
 *
 * @throws {InvalidValueError} See {@link checkEnvChanges}
 */
export function applyEnvChanges(
  lines: readonly string[],
  changes: EnvChanges,
): { lines: string[]; result: EnvApplyResult } {
  checkEnvChanges(changes);

  const requested = new Map<string, string | null>();
  for (const [key, value] of Object.entries(changes)) {
    requested.set(key.trim().toLowerCase(), value);
  }

  const output: string[] = [];
  const matched = new Set<string>();
  const result: EnvApplyResult = { updated: [], added: [], removed: [] };

  for (const line of lines) {
    if (line.startsWith('#')) {
      output.push(line);
      continue;
    }

    const separator = line.indexOf('=');
    if (separator === -1) {
      output.push(line);
      continue;
    }

    const name = line.slice(0, separator).trim().toLowerCase();
    if (!requested.has(name)) {
      output.push(line);
      continue;
    }

    matched.add(name);
    const value = requested.get(name);
    if (value === null || value === undefined) {
      result.removed.push(name.toUpperCase());
      continue;
    }

    output.push(`${name.toUpperCase()}=${value}`);
    result.updated.push(name.toUpperCase());
  }

  for (const [name, value] of requested) {
    if (matched.has(name) || value === null) {
      continue;
    }
    output.push(`${name.toUpperCase()}=${value}`);
    result.added.push(name.toUpperCase());
  }

  return { lines: output, result };
}

export class EnvDefaultsEditor {
  private readonly filePath: string;
  private readonly lock: boolean;

  constructor(filePath: string, options: EnvDefaultsOptions = {}) {
    this.filePath = path.resolve(filePath);
    this.lock = options.lock ?? true;
  }

  get path(): string {
    return this.filePath;
  }

  /**
   * Current lines of the file; a missing file has none.
   */
  readLines(): string[] {
    const content = readTextIfExists(this.filePath);
    if (content === null || content.length === 0) {
      return [];
    }
    const lines = content.split('\n');
    if (lines[lines.length - 1] === '') {
      lines.pop();
    }
    return lines;
  }

  /**
   * Upsert or remove variables and rewrite the file.
   *
   * Matching lines are replaced in place, or dropped for a null value. Keys
   * that match no line are appended in the order given; null for a missing
   * key adds nothing. Changes are checked before the file is touched.
   *
   * @throws {InvalidValueError} See {@link checkEnvChanges}
   */
  apply(changes: EnvChanges): EnvApplyResult {
    checkEnvChanges(changes);
    return withFileLock(
      this.filePath,
      () => {
        const { lines, result } = applyEnvChanges(this.readLines(), changes);
        log.debug(
          `Updating ${this.filePath}: ` +
            `updated [${result.updated.join(', ')}], ` +
            `added [${result.added.join(', ')}], ` +
            `removed [${result.removed.join(', ')}]`,
        );
        writeFileAtomic(this.filePath, lines.map((line) => `${line}\n`).join(''));
        return result;
      },
      this.lock,
    );
  }

  /**
   * Value of a variable as written in the file, matched case-insensitively.
   * The last assignment wins, as when the shell sources the file.
   */
  get(key: string): string | undefined {
    const wanted = key.trim().toLowerCase();
    let found: string | undefined;
    for (const line of this.readLines()) {
      if (line.startsWith('#')) {
        continue;
      }
      const separator = line.indexOf('=');
      if (separator !== -1 && line.slice(0, separator).trim().toLowerCase() === wanted) {
        found = line.slice(separator + 1);
      }
    }
    return found;
  }
}
