/**
 * slurmdbd.conf Value Validators
 *
 * Pure validation predicates, one family per semantic type. Each `check*`
 * function returns nothing on success and throws `InvalidValueError` naming
 * the rejected value otherwise. The underlying zod schemas are exported for
 * callers that prefer `safeParse`.
 */

import { z } from 'zod';
import { InvalidValueError } from './errors.js';

/**
 * A validator over the canonical string form of a value
 */
export type Validator = (value: string) => void;

/**
 * Outcome of checking a whole document, one message per problem
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export const DEBUG_LEVELS = [
  'quiet',
  'fatal',
  'error',
  'info',
  'verbose',
  'debug',
  'debug2',
  'debug3',
  'debug4',
  'debug5',
] as const;

export const DEBUG_FLAGS = [
  'DB_ARCHIVE',
  'DB_ASSOC',
  'DB_EVENT',
  'DB_JOB',
  'DB_QOS',
  'DB_QUERY',
  'DB_RESERVATION',
  'DB_RESOURCE',
  'DB_STEP',
  'DB_TRES',
  'DB_USAGE',
  'DB_WCKEY',
  'FEDERATION',
] as const;

export const LOG_TIME_FORMATS = [
  'iso8601',
  'iso8601_ms',
  'rfc5424',
  'rfc5424_ms',
  'clock',
  'short',
] as const;

export const AUTH_TYPES = ['auth/munge'] as const;

export const STORAGE_TYPES = ['accounting_storage/mysql'] as const;

export const PRIVATE_DATA = [
  'accounts',
  'events',
  'jobs',
  'reservations',
  'usage',
  'users',
] as const;

export type DebugLevel = (typeof DEBUG_LEVELS)[number];
export type DebugFlag = (typeof DEBUG_FLAGS)[number];
export type LogTimeFormat = (typeof LOG_TIME_FORMATS)[number];
export type PrivateDataCategory = (typeof PRIVATE_DATA)[number];

export const BoolSchema = z.enum(['yes', 'no']);
export const DebugLevelSchema = z.enum(DEBUG_LEVELS);
export const DebugFlagSchema = z.enum(DEBUG_FLAGS);
export const LogTimeFormatSchema = z.enum(LOG_TIME_FORMATS);
export const AuthTypeSchema = z.enum(AUTH_TYPES);
export const StorageTypeSchema = z.enum(STORAGE_TYPES);
export const PrivateDataSchema = z.enum(PRIVATE_DATA);

// Digit count only; 99999 passes even though it is not a usable port.
export const PortNumberSchema = z.string().regex(/^\d{1,5}$/);

export const IntegerSchema = z
  .string()
  .regex(/^\d+$/)
  .refine((value) => Number.isSafeInteger(Number(value)));

export const DurationSchema = z.string().regex(/^\d+(hour|day|month)$/);

export const QueryRangeSchema = z
  .string()
  .regex(/^(\d+-\d+:\d+:\d+|\d+-\d+|\d+:\d+:\d+|\d+:\d+|INFINITE)$/);

export const PasswordSchema = z.string().refine((value) => !value.includes('#'));

export const SingleLineSchema = z.string().refine((value) => !/[\r\n]/.test(value));

function fromSchema(schema: z.ZodType<string>, describe: (value: string) => string): Validator {
  return (value: string): void => {
    if (!schema.safeParse(value).success) {
      throw new InvalidValueError(describe(value), value);
    }
  };
}

/**
 * Accepts "yes", "no", or a native boolean.
 */
export function checkBool(value: string | boolean): void {
  if (typeof value === 'boolean') {
    return;
  }
  if (!BoolSchema.safeParse(value).success) {
    throw new InvalidValueError(`Not a valid boolean value: ${value}`, value);
  }
}

/**
 * Accepts 1-5 decimal digits, given as a string or a number.
 */
export function checkPortNumber(value: string | number): void {
  const text = String(value);
  if (!PortNumberSchema.safeParse(text).success) {
    throw new InvalidValueError(`Not a valid port number: ${text}`, value);
  }
}

export const checkInteger: Validator = fromSchema(
  IntegerSchema,
  (value) => `Not a valid non-negative integer: ${value}`,
);

export const checkDebugLevel: Validator = fromSchema(
  DebugLevelSchema,
  (value) => `Not a valid debug level: ${value}`,
);

export const checkDebugFlag: Validator = fromSchema(
  DebugFlagSchema,
  (value) => `Not a valid debug flag: ${value}`,
);

export const checkLogTimeFormat: Validator = fromSchema(
  LogTimeFormatSchema,
  (value) => `Not a valid log time format: ${value}`,
);

export const checkAuthType: Validator = fromSchema(
  AuthTypeSchema,
  (value) => `Not a valid auth type: ${value}`,
);

export const checkStorageType: Validator = fromSchema(
  StorageTypeSchema,
  (value) => `Not a valid storage type: ${value}`,
);

export const checkPrivateData: Validator = fromSchema(
  PrivateDataSchema,
  (value) => `Not a valid private data entry: ${value}`,
);

export const checkDuration: Validator = fromSchema(
  DurationSchema,
  (value) => `Not a valid time format: ${value}`,
);

export const checkQueryRange: Validator = fromSchema(
  QueryRangeSchema,
  (value) => `Not a valid max query time format: ${value}`,
);

export const checkPassword: Validator = fromSchema(
  PasswordSchema,
  () => "Password cannot contain '#'",
);

export const checkSingleLine: Validator = fromSchema(
  SingleLineSchema,
  (value) => `Value cannot contain line breaks: ${JSON.stringify(value)}`,
);
