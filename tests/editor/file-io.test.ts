import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';

vi.mock('../../src/cli/logger.js', () => ({
  log: {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  },
}));

import {
  acquireLock,
  lockPathFor,
  readTextIfExists,
  withFileLock,
  writeFileAtomic,
} from '../../src/editor/file-io.js';
import { ConfErrorCode, FileLockedError } from '../../src/editor/errors.js';

describe('file I/O', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'dbdconf-io-'));
    file = path.join(dir, 'target.conf');
  });

  afterEach(() => {
    fs.removeSync(dir);
  });

  it('derives the lock path from the file', () => {
    expect(lockPathFor('/etc/slurm/slurmdbd.conf')).toBe('/etc/slurm/slurmdbd.conf.lock');
  });

  describe('acquireLock', () => {
    it('creates the lock file with the pid and removes it on release', () => {
      const release = acquireLock(file);
      expect(fs.readFileSync(`${file}.lock`, 'utf8')).toBe(`${process.pid}\n`);
      release();
      expect(fs.existsSync(`${file}.lock`)).toBe(false);
    });

    it('fails while the lock is held', () => {
      const release = acquireLock(file);
      try {
        acquireLock(file);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(FileLockedError);
        if (error instanceof FileLockedError) {
          expect(error.code).toBe(ConfErrorCode.FILE_LOCKED);
          expect(error.lockPath).toBe(`${file}.lock`);
        }
      } finally {
        release();
      }
    });
  });

  describe('withFileLock', () => {
    it('releases the lock when the callback throws', () => {
      expect(() =>
        withFileLock(file, () => {
          throw new Error('boom');
        }),
      ).toThrow('boom');
      expect(fs.existsSync(`${file}.lock`)).toBe(false);
    });

    it('returns the callback result', () => {
      expect(withFileLock(file, () => 42)).toBe(42);
    });

    it('skips the lock when disabled', () => {
      fs.writeFileSync(`${file}.lock`, '');
      expect(withFileLock(file, () => 'ran', false)).toBe('ran');
    });
  });

  describe('writeFileAtomic', () => {
    it('replaces content and leaves no temp files behind', () => {
      fs.writeFileSync(file, 'old\n');
      writeFileAtomic(file, 'new\n');
      expect(fs.readFileSync(file, 'utf8')).toBe('new\n');
      expect(fs.readdirSync(dir)).toEqual(['target.conf']);
    });

    it('applies the requested mode to a new file only', () => {
      writeFileAtomic(file, 'new\n', { mode: 0o600 });
      expect(fs.statSync(file).mode & 0o777).toBe(0o600);

      fs.chmodSync(file, 0o644);
      writeFileAtomic(file, 'again\n', { mode: 0o600 });
      expect(fs.statSync(file).mode & 0o777).toBe(0o644);
    });

    it('cleans up the temp file when the rename fails', () => {
      fs.mkdirSync(file);
      expect(() => writeFileAtomic(file, 'content')).toThrow();
      expect(fs.readdirSync(dir)).toEqual(['target.conf']);
      expect(fs.statSync(file).isDirectory()).toBe(true);
    });
  });

  it('reads a missing file as null', () => {
    expect(readTextIfExists(file)).toBeNull();
    fs.writeFileSync(file, 'x');
    expect(readTextIfExists(file)).toBe('x');
  });
});
