/**
 * File I/O for the configuration editors
 *
 * Whole-file replacement through write-tmp-rename, and an advisory lock file
 * that marks a single writer. Both editors only write through here.
 */

import fs from 'fs-extra';
import { v4 as uuidv4 } from 'uuid';
import { FileLockedError } from './errors.js';
import { log } from '../cli/logger.js';

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Path of the advisory lock guarding writes to `filePath`
 */
export function lockPathFor(filePath: string): string {
  return `${filePath}.lock`;
}

/**
 * Create the lock file exclusively and return its release function.
 *
 * The lock is advisory: it only excludes other writers that also take it.
 *
 * @throws {FileLockedError} If the lock file already exists
 */
export function acquireLock(filePath: string): () => void {
  const lockPath = lockPathFor(filePath);
  let fd: number;
  try {
    fd = fs.openSync(lockPath, 'wx');
  } catch (error) {
    if (hasErrorCode(error, 'EEXIST')) {
      throw new FileLockedError(filePath, lockPath);
    }
    throw error;
  }

  try {
    fs.writeSync(fd, `${process.pid}\n`);
  } finally {
    fs.closeSync(fd);
  }
  log.debug(`Acquired lock ${lockPath}`);

  return () => {
    fs.removeSync(lockPath);
    log.debug(`Released lock ${lockPath}`);
  };
}

/**
 * Run `fn` while holding the lock for `filePath`. With `enabled` false the
 * function runs unguarded.
 */
export function withFileLock<T>(filePath: string, fn: () => T, enabled = true): T {
  if (!enabled) {
    return fn();
  }
  const release = acquireLock(filePath);
  try {
    return fn();
  } finally {
    release();
  }
}

export interface WriteOptions {
  /**
   * Permission bits for a file that does not exist yet. An existing file
   * keeps its own.
   */
  mode?: number;
}

/**
 * Replace the content of `filePath` atomically.
 *
 * Content goes to a sibling temp file first, which is then renamed over the
 * target. The existing file's permission bits are carried over. On failure
 * the temp file is removed and the target is left as it was.
 */
export function writeFileAtomic(filePath: string, content: string, options: WriteOptions = {}): void {
  const tmpPath = `${filePath}.${uuidv4()}.tmp`;
  try {
    const mode = fs.existsSync(filePath) ? fs.statSync(filePath).mode & 0o7777 : options.mode;
    fs.writeFileSync(tmpPath, content, { encoding: 'utf8', mode: mode ?? 0o666 });
    if (mode !== undefined) {
      fs.chmodSync(tmpPath, mode);
    }
    fs.renameSync(tmpPath, filePath);
  } catch (error) {
    fs.removeSync(tmpPath);
    throw error;
  }
}

/**
 * Read a text file, or return null when it does not exist
 */
export function readTextIfExists(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return null;
    }
    throw error;
  }
}
