/**
 * Key Registry
 *
 * Dispatch table from every ConfigToken to the codec that converts and
 * validates its value. `satisfies Record<ConfigToken, ...>` keeps the table
 * exhaustive: adding a token without a codec fails to compile.
 */

import {
  booleanCodec,
  integerCodec,
  listCodec,
  pairsCodec,
  stringCodec,
  type KeyCodec,
  type TextCodec,
} from './codecs.js';
import { ConfigToken } from './tokens.js';
import {
  checkAuthType,
  checkDebugFlag,
  checkDebugLevel,
  checkDuration,
  checkLogTimeFormat,
  checkPassword,
  checkPortNumber,
  checkPrivateData,
  checkQueryRange,
  checkStorageType,
} from './validators.js';

const CODECS = {
  [ConfigToken.ArchiveDir]: stringCodec(),
  [ConfigToken.ArchiveEvents]: booleanCodec(),
  [ConfigToken.ArchiveJobs]: booleanCodec(),
  [ConfigToken.ArchiveResvs]: booleanCodec(),
  [ConfigToken.ArchiveScript]: stringCodec(),
  [ConfigToken.ArchiveSteps]: booleanCodec(),
  [ConfigToken.ArchiveSuspend]: booleanCodec(),
  [ConfigToken.ArchiveTXN]: booleanCodec(),
  [ConfigToken.ArchiveUsage]: booleanCodec(),
  [ConfigToken.AuthInfo]: stringCodec(),
  [ConfigToken.AuthAltTypes]: listCodec(','),
  [ConfigToken.AuthAltParameters]: pairsCodec(),
  [ConfigToken.AuthType]: stringCodec(checkAuthType),
  [ConfigToken.CommitDelay]: integerCodec(),
  [ConfigToken.CommunicationParameters]: listCodec(','),
  [ConfigToken.DbdBackupHost]: stringCodec(),
  [ConfigToken.DbdAddr]: stringCodec(),
  [ConfigToken.DbdHost]: stringCodec(),
  [ConfigToken.DbdPort]: integerCodec(checkPortNumber),
  [ConfigToken.DebugFlags]: listCodec(',', checkDebugFlag),
  [ConfigToken.DebugLevel]: stringCodec(checkDebugLevel),
  [ConfigToken.DebugLevelSyslog]: stringCodec(checkDebugLevel),
  [ConfigToken.DefaultQOS]: stringCodec(),
  [ConfigToken.LogFile]: stringCodec(),
  [ConfigToken.LogTimeFormat]: stringCodec(checkLogTimeFormat),
  [ConfigToken.MaxQueryTimeRange]: stringCodec(checkQueryRange),
  [ConfigToken.MessageTimeout]: integerCodec(),
  [ConfigToken.Parameters]: listCodec(','),
  [ConfigToken.PidFile]: stringCodec(),
  [ConfigToken.PluginDir]: listCodec(':'),
  [ConfigToken.PrivateData]: listCodec(',', checkPrivateData),
  [ConfigToken.PurgeEventAfter]: stringCodec(checkDuration),
  [ConfigToken.PurgeJobAfter]: stringCodec(checkDuration),
  [ConfigToken.PurgeResvAfter]: stringCodec(checkDuration),
  [ConfigToken.PurgeStepAfter]: stringCodec(checkDuration),
  [ConfigToken.PurgeSuspendAfter]: stringCodec(checkDuration),
  [ConfigToken.PurgeTXNAfter]: stringCodec(checkDuration),
  [ConfigToken.PurgeUsageAfter]: stringCodec(checkDuration),
  [ConfigToken.SlurmUser]: stringCodec(),
  [ConfigToken.StorageHost]: stringCodec(),
  [ConfigToken.StorageBackupHost]: stringCodec(),
  [ConfigToken.StorageLoc]: stringCodec(),
  [ConfigToken.StorageParameters]: pairsCodec(),
  [ConfigToken.StoragePass]: stringCodec(checkPassword),
  [ConfigToken.StoragePort]: integerCodec(checkPortNumber),
  [ConfigToken.StorageType]: stringCodec(checkStorageType),
  [ConfigToken.StorageUser]: stringCodec(),
  [ConfigToken.TCPTimeout]: integerCodec(),
  [ConfigToken.TrackSlurmctldDown]: booleanCodec(),
  [ConfigToken.TrackWCKey]: booleanCodec(),
} satisfies Record<ConfigToken, TextCodec>;

type CodecTable = typeof CODECS;

/**
 * Semantic value returned by the getter for key K
 */
export type ConfigValue<K extends ConfigToken> = ReturnType<CodecTable[K]['decode']>;

/**
 * Values accepted by the setter for key K
 */
export type ConfigInput<K extends ConfigToken> = Parameters<CodecTable[K]['encode']>[0];

export type KeyRegistry = {
  readonly [K in ConfigToken]: KeyCodec<ConfigValue<K>, ConfigInput<K>>;
};

export const KEY_REGISTRY: KeyRegistry = CODECS;

/**
 * Textual codec for a key, for callers holding a plain string value
 */
export function textCodec(key: ConfigToken): TextCodec {
  return KEY_REGISTRY[key];
}

/**
 * Keys whose values must never be echoed back to an operator
 */
export const SECRET_TOKENS: ReadonlySet<ConfigToken> = new Set([ConfigToken.StoragePass]);
