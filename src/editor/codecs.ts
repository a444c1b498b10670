/**
 * Value Codecs
 *
 * Conversion between the canonical on-disk string of a slurmdbd.conf value and
 * the semantic value handed to callers. Decoding happens on every access;
 * encoding validates before producing the stored string.
 *
 * Every codec accepts the plain textual form as input, so a value read from a
 * flat parameter mapping or a command line can be fed straight to `encode`.
 */

import { InvalidValueError } from './errors.js';
import { checkBool, checkInteger, checkSingleLine, type Validator } from './validators.js';

export type KeyKind = 'string' | 'boolean' | 'integer' | 'list' | 'pairs';

export type ListDelimiter = ',' | ':';

export type ConfigPair = [key: string, value: string];

/**
 * String conversion pair for one key
 */
export interface KeyCodec<Get, Set> {
  readonly kind: KeyKind;
  readonly delimiter?: ListDelimiter;

  /**
   * Convert a stored string into the semantic value.
   */
  decode(raw: string): Get;

  /**
   * Validate a semantic value and convert it to its stored string.
   *
   * @throws {InvalidValueError} If the value is rejected
   */
  encode(value: Set): string;
}

/**
 * Textual view shared by every codec
 */
export type TextCodec = KeyCodec<unknown, string>;

function requireText(value: string): void {
  if (value.length === 0) {
    throw new InvalidValueError('Value cannot be empty; delete the key instead', value);
  }
  checkSingleLine(value);
}

export function stringCodec(...validators: Validator[]): KeyCodec<string, string> {
  return {
    kind: 'string',
    decode: (raw) => raw,
    encode(value) {
      requireText(value);
      for (const validate of validators) {
        validate(value);
      }
      return value;
    },
  };
}

/**
 * yes/no keys. Stored text other than yes or no decodes to undefined, the same
 * as an absent key.
 */
export function booleanCodec(): KeyCodec<boolean | undefined, boolean | string> {
  return {
    kind: 'boolean',
    decode: (raw) => (raw === 'yes' ? true : raw === 'no' ? false : undefined),
    encode(value) {
      checkBool(value);
      if (typeof value === 'boolean') {
        return value ? 'yes' : 'no';
      }
      return value;
    },
  };
}

export function integerCodec(validate: Validator = checkInteger): KeyCodec<number, number | string> {
  return {
    kind: 'integer',
    decode(raw) {
      const value = Number.parseInt(raw, 10);
      if (!/^\d+$/.test(raw) || !Number.isSafeInteger(value)) {
        throw new InvalidValueError(`Stored value is not an integer: ${raw}`, raw);
      }
      return value;
    },
    encode(value) {
      const text = String(value);
      requireText(text);
      validate(text);
      return text;
    },
  };
}

/**
 * Delimiter-joined lists. A string input is split on the delimiter, so "a,b"
 * and ["a", "b"] store the same text.
 */
export function listCodec(
  delimiter: ListDelimiter,
  validateElement?: Validator,
): KeyCodec<string[], string | readonly string[]> {
  return {
    kind: 'list',
    delimiter,
    decode: (raw) => raw.split(delimiter),
    encode(value) {
      const elements = typeof value === 'string' ? value.split(delimiter) : [...value];
      if (elements.length === 0) {
        throw new InvalidValueError('List cannot be empty; delete the key instead', value);
      }
      for (const element of elements) {
        if (element.length === 0) {
          throw new InvalidValueError(`List contains an empty element: ${elements.join(delimiter)}`, value);
        }
        if (element.includes(delimiter)) {
          throw new InvalidValueError(`List element cannot contain '${delimiter}': ${element}`, value);
        }
        checkSingleLine(element);
        validateElement?.(element);
      }
      return elements.join(delimiter);
    },
  };
}

function splitPair(item: string): ConfigPair {
  const separator = item.indexOf('=');
  if (separator === -1) {
    return [item, ''];
  }
  return [item.slice(0, separator), item.slice(separator + 1)];
}

/**
 * Comma-joined `key=value` lists such as StorageParameters.
 */
export function pairsCodec(): KeyCodec<ConfigPair[], string | ReadonlyArray<readonly [string, string]>> {
  return {
    kind: 'pairs',
    delimiter: ',',
    decode: (raw) => raw.split(',').map(splitPair),
    encode(value) {
      let pairs: ReadonlyArray<readonly [string, string]>;
      if (typeof value === 'string') {
        pairs = value.split(',').map((item) => {
          if (!item.includes('=')) {
            throw new InvalidValueError(`Expected key=value, got: ${item}`, value);
          }
          return splitPair(item);
        });
      } else {
        pairs = value;
      }

      if (pairs.length === 0) {
        throw new InvalidValueError('List cannot be empty; delete the key instead', value);
      }
      for (const [key, pairValue] of pairs) {
        if (key.length === 0 || /[=,]/.test(key)) {
          throw new InvalidValueError(`Not a valid parameter name: ${key}`, value);
        }
        if (pairValue.includes(',')) {
          throw new InvalidValueError(`Parameter value cannot contain ',': ${pairValue}`, value);
        }
        checkSingleLine(key);
        checkSingleLine(pairValue);
      }
      return pairs.map(([key, pairValue]) => `${key}=${pairValue}`).join(',');
    },
  };
}
