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

import { loadRenderParams, renderConfiguration } from '../../src/render/render.js';
import { EndpointError, InvalidValueError } from '../../src/editor/errors.js';
import { log } from '../../src/cli/logger.js';

const now = () => new Date('2024-01-02T03:04:05.000Z');

describe('renderConfiguration', () => {
  let dir: string;
  let confFile: string;
  let defaultsFile: string;

  beforeEach(() => {
    vi.clearAllMocks();
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'dbdconf-render-'));
    confFile = path.join(dir, 'slurmdbd.conf');
    defaultsFile = path.join(dir, 'slurmdbd');
  });

  afterEach(() => {
    fs.removeSync(dir);
  });

  it('writes slurmdbd.conf from every source and drops the socket variable for tcp', () => {
    fs.writeFileSync(confFile, 'ArchiveJobs=yes\n');
    fs.writeFileSync(defaultsFile, '# slurmdbd defaults\nMYSQL_UNIX_PORT="/old.sock"\n');

    const result = renderConfiguration({
      confFile,
      defaultsFile,
      defaults: { DbdPort: '6819', SlurmUser: 'slurm' },
      database: { username: 'slurm', password: 'test-secret', endpoints: '[::1]:1234' },
      overrides: { DebugLevel: 'verbose' },
      now,
    });

    const expected =
      '#\n' +
      `# ${confFile} generated at 2024-01-02T03:04:05.000Z\n` +
      '#\n' +
      'DbdPort=6819\n' +
      'SlurmUser=slurm\n' +
      'StorageUser=slurm\n' +
      'StoragePass=test-secret\n' +
      'StorageLoc=slurm_acct_db\n' +
      'StorageHost=::1\n' +
      'StoragePort=1234\n' +
      'DebugLevel=verbose\n';
    expect(result.content).toBe(expected);
    expect(fs.readFileSync(confFile, 'utf8')).toBe(expected);
    expect(result.env).toEqual({ updated: [], added: [], removed: ['MYSQL_UNIX_PORT'] });
    expect(fs.readFileSync(defaultsFile, 'utf8')).toBe('# slurmdbd defaults\n');
    expect(log.info).toHaveBeenCalledWith(`Wrote 8 parameters to ${confFile}`);
  });

  it('exports the socket path for a socket endpoint', () => {
    const result = renderConfiguration({
      confFile,
      defaultsFile,
      database: { username: 'slurm', password: 'test-secret', endpoints: 'file:///run/mysqld/mysqld.sock' },
      now,
    });

    expect(result.parameters).toEqual({
      StorageUser: 'slurm',
      StoragePass: 'test-secret',
      StorageLoc: 'slurm_acct_db',
    });
    expect(fs.readFileSync(defaultsFile, 'utf8')).toBe('MYSQL_UNIX_PORT="/run/mysqld/mysqld.sock"\n');
  });

  it('creates slurmdbd.conf readable by its owner only', () => {
    renderConfiguration({
      confFile,
      defaultsFile,
      database: { username: 'slurm', password: 'test-secret', endpoints: 'db0:3306' },
      now,
    });

    expect(fs.statSync(confFile).mode & 0o777).toBe(0o600);
  });

  it('leaves the defaults file alone without database data', () => {
    const result = renderConfiguration({ confFile, defaultsFile, defaults: { DbdPort: '6819' }, now });
    expect(result.env).toBeUndefined();
    expect(fs.existsSync(defaultsFile)).toBe(false);
  });

  it('writes nothing on a dry run', () => {
    const result = renderConfiguration({
      confFile,
      defaultsFile,
      defaults: { DbdPort: '6819' },
      database: { username: 'slurm', password: 'test-secret', endpoints: 'db0:3306' },
      dryRun: true,
      now,
    });

    expect(result.content).toBe(
      `#\n# ${confFile} generated at 2024-01-02T03:04:05.000Z\n#\n` +
        'DbdPort=6819\nStorageUser=slurm\nStoragePass=test-secret\nStorageLoc=slurm_acct_db\n' +
        'StorageHost=db0\nStoragePort=3306\n',
    );
    expect(result.env).toBeUndefined();
    expect(fs.existsSync(confFile)).toBe(false);
    expect(fs.existsSync(defaultsFile)).toBe(false);
  });

  it('writes nothing when a parameter is rejected', () => {
    fs.writeFileSync(confFile, 'DbdPort=6819\n');
    expect(() =>
      renderConfiguration({ confFile, defaultsFile, overrides: { DebugLevel: 'loud' }, now }),
    ).toThrow(InvalidValueError);
    expect(fs.readFileSync(confFile, 'utf8')).toBe('DbdPort=6819\n');
  });

  it('fails before writing when no endpoint is usable', () => {
    expect(() =>
      renderConfiguration({
        confFile,
        defaultsFile,
        database: { username: 'slurm', password: 'test-secret', endpoints: '' },
        now,
      }),
    ).toThrow(EndpointError);
    expect(fs.existsSync(confFile)).toBe(false);
  });
});

describe('loadRenderParams', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'dbdconf-params-'));
  });

  afterEach(() => {
    fs.removeSync(dir);
  });

  it('reads peer, overrides and database sections', () => {
    const file = path.join(dir, 'render.yml');
    fs.writeFileSync(
      file,
      [
        'peer:',
        '  DbdHost: ctl0',
        'overrides:',
        '  ArchiveJobs: true',
        '  LogFile: null',
        'database:',
        '  username: slurm',
        '  password: test-secret',
        '  endpoints: db0:3306',
        '',
      ].join('\n'),
    );

    expect(loadRenderParams(file)).toEqual({
      peer: { DbdHost: 'ctl0' },
      overrides: { ArchiveJobs: true, LogFile: null },
      database: { username: 'slurm', password: 'test-secret', endpoints: 'db0:3306' },
    });
  });

  it('treats an empty file as no parameters', () => {
    const file = path.join(dir, 'empty.yml');
    fs.writeFileSync(file, '');
    expect(loadRenderParams(file)).toEqual({});
  });

  it('rejects unknown sections', () => {
    const file = path.join(dir, 'bad.yml');
    fs.writeFileSync(file, 'extra:\n  DbdPort: 1\n');
    expect(() => loadRenderParams(file)).toThrow(`${file}: Configuration validation failed:`);
  });
});
