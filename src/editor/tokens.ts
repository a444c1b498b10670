/**
 * slurmdbd.conf Token Registry
 *
 * The closed vocabulary of slurmdbd.conf keys, sourced from `man slurmdbd.conf.5`.
 * Member values are the exact on-disk spelling; matching is case-sensitive.
 */

import { UnrecognizedKeyError } from './errors.js';

export enum ConfigToken {
  ArchiveDir = 'ArchiveDir',
  ArchiveEvents = 'ArchiveEvents',
  ArchiveJobs = 'ArchiveJobs',
  ArchiveResvs = 'ArchiveResvs',
  ArchiveScript = 'ArchiveScript',
  ArchiveSteps = 'ArchiveSteps',
  ArchiveSuspend = 'ArchiveSuspend',
  ArchiveTXN = 'ArchiveTXN',
  ArchiveUsage = 'ArchiveUsage',
  AuthInfo = 'AuthInfo',
  AuthAltTypes = 'AuthAltTypes',
  AuthAltParameters = 'AuthAltParameters',
  AuthType = 'AuthType',
  CommitDelay = 'CommitDelay',
  CommunicationParameters = 'CommunicationParameters',
  DbdBackupHost = 'DbdBackupHost',
  DbdAddr = 'DbdAddr',
  DbdHost = 'DbdHost',
  DbdPort = 'DbdPort',
  DebugFlags = 'DebugFlags',
  DebugLevel = 'DebugLevel',
  DebugLevelSyslog = 'DebugLevelSyslog',
  DefaultQOS = 'DefaultQOS',
  LogFile = 'LogFile',
  LogTimeFormat = 'LogTimeFormat',
  MaxQueryTimeRange = 'MaxQueryTimeRange',
  MessageTimeout = 'MessageTimeout',
  Parameters = 'Parameters',
  PidFile = 'PidFile',
  PluginDir = 'PluginDir',
  PrivateData = 'PrivateData',
  PurgeEventAfter = 'PurgeEventAfter',
  PurgeJobAfter = 'PurgeJobAfter',
  PurgeResvAfter = 'PurgeResvAfter',
  PurgeStepAfter = 'PurgeStepAfter',
  PurgeSuspendAfter = 'PurgeSuspendAfter',
  PurgeTXNAfter = 'PurgeTXNAfter',
  PurgeUsageAfter = 'PurgeUsageAfter',
  SlurmUser = 'SlurmUser',
  StorageHost = 'StorageHost',
  StorageBackupHost = 'StorageBackupHost',
  StorageLoc = 'StorageLoc',
  StorageParameters = 'StorageParameters',
  StoragePass = 'StoragePass',
  StoragePort = 'StoragePort',
  StorageType = 'StorageType',
  StorageUser = 'StorageUser',
  TCPTimeout = 'TCPTimeout',
  TrackSlurmctldDown = 'TrackSlurmctldDown',
  TrackWCKey = 'TrackWCKey',
}

export const CONFIG_TOKENS: readonly ConfigToken[] = Object.values(ConfigToken);

const TOKEN_SET: ReadonlySet<string> = new Set(CONFIG_TOKENS);

/**
 * Check whether a name is a recognized slurmdbd.conf key
 */
export function isConfigToken(name: string): name is ConfigToken {
  return TOKEN_SET.has(name);
}

/**
 * Resolve a key name to its token.
 *
 * @throws {UnrecognizedKeyError} If the name is not an exact member of the vocabulary
 */
export function lookup(name: string): ConfigToken {
  if (!isConfigToken(name)) {
    throw new UnrecognizedKeyError(name);
  }
  return name;
}
