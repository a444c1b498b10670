/**
 * Configuration Editor Errors
 *
 * Typed errors raised by the token registry, the validators and both file
 * editors. Every error carries a stable CONF_E### code so callers can branch
 * on `code` as well as on `instanceof`.
 */

/**
 * Editor error codes following CONF_E### format
 */
export enum ConfErrorCode {
  /** Key is not part of the slurmdbd.conf vocabulary */
  UNRECOGNIZED_KEY = 'CONF_E001',
  /** Configuration file content could not be parsed */
  PARSE_FAILED = 'CONF_E002',
  /** Value rejected by a key's validator */
  INVALID_VALUE = 'CONF_E003',
  /** Delete of a key that is not set */
  KEY_NOT_PRESENT = 'CONF_E004',
  /** Another writer holds the advisory lock */
  FILE_LOCKED = 'CONF_E005',

  /** Database endpoint list has no usable entry */
  ENDPOINT_INVALID = 'CONF_E010',
}

/**
 * Base class for every error raised while editing configuration files
 */
export class ConfEditorError extends Error {
  constructor(
    message: string,
    public readonly code: ConfErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ConfEditorError';
  }
}

export class UnrecognizedKeyError extends ConfEditorError {
  constructor(public readonly key: string) {
    super(`Unrecognized slurmdbd configuration option: ${key}`, ConfErrorCode.UNRECOGNIZED_KEY);
    this.name = 'UnrecognizedKeyError';
  }
}

/**
 * Raised by `load()`. `line` is 1-based within the source file.
 */
export class ParseError extends ConfEditorError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly line: number,
    options?: { cause?: unknown },
  ) {
    super(`${filePath}:${line}: ${message}`, ConfErrorCode.PARSE_FAILED, options);
    this.name = 'ParseError';
  }
}

export class InvalidValueError extends ConfEditorError {
  constructor(
    message: string,
    public readonly value: unknown,
    public readonly key?: string,
  ) {
    super(key ? `${key}: ${message}` : message, ConfErrorCode.INVALID_VALUE);
    this.name = 'InvalidValueError';
  }
}

export class KeyNotPresentError extends ConfEditorError {
  constructor(public readonly key: string) {
    super(`Configuration option ${key} is not set`, ConfErrorCode.KEY_NOT_PRESENT);
    this.name = 'KeyNotPresentError';
  }
}

export class FileLockedError extends ConfEditorError {
  constructor(
    public readonly filePath: string,
    public readonly lockPath: string,
  ) {
    super(
      `${filePath} is locked by another writer (remove ${lockPath} if no writer is running)`,
      ConfErrorCode.FILE_LOCKED,
    );
    this.name = 'FileLockedError';
  }
}

export class EndpointError extends ConfEditorError {
  constructor(
    message: string,
    public readonly endpoints: string,
  ) {
    super(message, ConfErrorCode.ENDPOINT_INVALID);
    this.name = 'EndpointError';
  }
}

/**
 * Type guard for editor errors
 */
export function isConfEditorError(error: unknown): error is ConfEditorError {
  return error instanceof ConfEditorError;
}
