/**
 * slurmdbd Configuration Editing
 *
 * Public API for reading and writing slurmdbd.conf and the slurmdbd
 * environment-defaults file.
 *
 * @example
 * ```typescript
 * import { SlurmdbdConfEditor, EnvDefaultsEditor, ConfigToken } from './editor/index.js';
 *
 * const conf = SlurmdbdConfEditor.open('/etc/slurm/slurmdbd.conf');
 * conf.set(ConfigToken.DebugLevel, 'info');
 * conf.set(ConfigToken.PrivateData, ['accounts', 'jobs']);
 * conf.dump();
 *
 * new EnvDefaultsEditor('/etc/default/slurmdbd').apply({ mysql_unix_port: null });
 * ```
 */

export { ConfigToken, CONFIG_TOKENS, isConfigToken, lookup } from './tokens.js';

export {
  type Validator,
  type ValidationResult,
  type DebugLevel,
  type DebugFlag,
  type LogTimeFormat,
  type PrivateDataCategory,
  DEBUG_LEVELS,
  DEBUG_FLAGS,
  LOG_TIME_FORMATS,
  AUTH_TYPES,
  STORAGE_TYPES,
  PRIVATE_DATA,
  checkBool,
  checkPortNumber,
  checkInteger,
  checkDebugLevel,
  checkDebugFlag,
  checkLogTimeFormat,
  checkAuthType,
  checkStorageType,
  checkPrivateData,
  checkDuration,
  checkQueryRange,
  checkPassword,
  checkSingleLine,
} from './validators.js';

export {
  type KeyKind,
  type KeyCodec,
  type TextCodec,
  type ConfigPair,
  type ListDelimiter,
} from './codecs.js';

export {
  type ConfigValue,
  type ConfigInput,
  type KeyRegistry,
  KEY_REGISTRY,
  SECRET_TOKENS,
  textCodec,
} from './registry.js';

export {
  type ConfEditorOptions,
  CONF_FILE_MODE,
  SlurmdbdConfEditor,
  parseConf,
  serializeConf,
} from './conf-editor.js';

export {
  type EnvChanges,
  type EnvDefaultsOptions,
  type EnvApplyResult,
  EnvDefaultsEditor,
  applyEnvChanges,
  checkEnvChanges,
} from './env-defaults.js';

export {
  ConfErrorCode,
  ConfEditorError,
  UnrecognizedKeyError,
  ParseError,
  InvalidValueError,
  KeyNotPresentError,
  FileLockedError,
  EndpointError,
  isConfEditorError,
} from './errors.js';

export { type WriteOptions, acquireLock, withFileLock, writeFileAtomic, lockPathFor } from './file-io.js';
