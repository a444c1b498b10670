/**
 * Default Configuration Values
 */

import type { ToolConfig } from './schema.js';

/**
 * Parameters the tool maintains in every rendered slurmdbd.conf
 */
export const MAINTAINED_PARAMETERS: Readonly<Record<string, string>> = {
  DbdPort: '6819',
  AuthType: 'auth/munge',
  AuthInfo: '"socket=/var/run/munge/munge.socket.2"',
  SlurmUser: 'slurm',
  PidFile: '/var/run/slurmdbd/slurmdbd.pid',
  LogFile: '/var/log/slurm/slurmdbd.log',
  StorageType: 'accounting_storage/mysql',
};

/**
 * Default Tool Configuration
 *
 * - Distribution paths for slurmdbd.conf and /etc/default/slurmdbd
 * - Info-level logging to the console only
 * - Advisory locking on every write
 */
export const DEFAULT_CONFIG: ToolConfig = {
  paths: {
    confFile: '/etc/slurm/slurmdbd.conf',
    defaultsFile: '/etc/default/slurmdbd',
  },
  logging: {
    level: 'info',
    consoleOutput: true,
    filePath: undefined,
  },
  writes: {
    lock: true,
  },
  parameters: { ...MAINTAINED_PARAMETERS },
};
