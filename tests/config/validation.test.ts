/**
 * Configuration Validation Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  formatValidationErrors,
  getConfigSummary,
  validateConfig,
  validateLogLevel,
  validateParameters,
  validatePaths,
} from '../../src/config/validation.js';
import { DEFAULT_CONFIG } from '../../src/config/defaults.js';
import { deepClone } from '../../src/config/loader.js';
import type { ToolConfig } from '../../src/config/schema.js';

describe('Configuration Validation', () => {
  let config: ToolConfig;

  beforeEach(() => {
    config = deepClone(DEFAULT_CONFIG);
  });

  it('accepts the defaults', () => {
    expect(validateConfig(config)).toEqual({ valid: true, errors: [] });
  });

  it('validateLogLevel accepts the four levels', () => {
    expect(validateLogLevel({ level: 'debug', consoleOutput: true }).valid).toBe(true);
  });

  describe('validatePaths', () => {
    let testDir: string;

    beforeEach(() => {
      testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'validation-test-'));
    });

    afterEach(() => {
      fs.rmSync(testDir, { recursive: true, force: true });
    });

    it('rejects the same file for both paths', () => {
      const result = validatePaths({ confFile: '/etc/x', defaultsFile: '/etc/x' }, config.logging);
      expect(result.errors).toEqual(["paths: confFile and defaultsFile must differ, both are '/etc/x'"]);
    });

    it('checks directories only when asked', () => {
      const missing = path.join(testDir, 'nope', 'slurmdbd.conf');
      const paths = { confFile: missing, defaultsFile: path.join(testDir, 'slurmdbd') };

      expect(validatePaths(paths, config.logging).valid).toBe(true);
      expect(validatePaths(paths, config.logging, true).errors).toEqual([
        `paths.confFile: directory does not exist: ${path.join(testDir, 'nope')} - create it first or use a different path`,
      ]);
    });
  });

  describe('validateParameters', () => {
    it('accepts recognized keys with valid values', () => {
      expect(validateParameters({ DbdPort: 6819, ArchiveJobs: true, DebugLevel: 'info' }).valid).toBe(true);
    });

    it('reports unknown keys and rejected values', () => {
      expect(validateParameters({ Bogus: 'x', DebugLevel: 'loud', ArchiveJobs: 'maybe' }).errors).toEqual([
        'parameters.Bogus: not a slurmdbd.conf option',
        'parameters.DebugLevel: Not a valid debug level: loud',
        'parameters.ArchiveJobs: Not a valid boolean value: maybe',
      ]);
    });
  });

  it('validateConfig aggregates every check', () => {
    config.parameters.StoragePass = 'test#secret';
    expect(validateConfig(config).errors).toEqual(["parameters.StoragePass: Password cannot contain '#'"]);
  });

  it('formats errors as a bulleted list', () => {
    expect(formatValidationErrors([])).toBe('Configuration is valid');
    expect(formatValidationErrors(['a', 'b'])).toBe('Configuration validation failed:\n  • a\n  • b');
  });

  it('summarizes paths, logging, writes and parameters', () => {
    config.parameters = { DbdPort: '6819' };
    expect(getConfigSummary(config)).toBe(
      [
        'Configuration Summary:',
        '',
        'Paths:',
        '  slurmdbd.conf: /etc/slurm/slurmdbd.conf',
        '  Defaults File: /etc/default/slurmdbd',
        '',
        'Logging:',
        '  Level: info',
        '  Console Output: true',
        '  File Path: none',
        '',
        'Writes:',
        '  Lock: true',
        '',
        'Static Parameters:',
        '  DbdPort: 6819',
      ].join('\n'),
    );
  });
});
