import { describe, it, expect } from 'vitest';
import {
  checkAuthType,
  checkBool,
  checkDebugFlag,
  checkDebugLevel,
  checkDuration,
  checkInteger,
  checkLogTimeFormat,
  checkPassword,
  checkPortNumber,
  checkPrivateData,
  checkQueryRange,
  checkSingleLine,
  checkStorageType,
} from '../../src/editor/validators.js';
import { InvalidValueError } from '../../src/editor/errors.js';

describe('validators', () => {
  describe('checkBool', () => {
    it('accepts yes, no and native booleans', () => {
      expect(() => checkBool('yes')).not.toThrow();
      expect(() => checkBool('no')).not.toThrow();
      expect(() => checkBool(true)).not.toThrow();
      expect(() => checkBool(false)).not.toThrow();
    });

    it('rejects other spellings', () => {
      expect(() => checkBool('true')).toThrow('Not a valid boolean value: true');
      expect(() => checkBool('YES')).toThrow(InvalidValueError);
    });
  });

  describe('checkPortNumber', () => {
    it('accepts one to five digits as string or number', () => {
      expect(() => checkPortNumber('6819')).not.toThrow();
      expect(() => checkPortNumber(3306)).not.toThrow();
      expect(() => checkPortNumber('0')).not.toThrow();
    });

    it('checks digit count only', () => {
      expect(() => checkPortNumber('99999')).not.toThrow();
    });

    it('rejects six digits, signs and words', () => {
      expect(() => checkPortNumber('123456')).toThrow('Not a valid port number: 123456');
      expect(() => checkPortNumber(-1)).toThrow('Not a valid port number: -1');
      expect(() => checkPortNumber('http')).toThrow(InvalidValueError);
    });
  });

  it('checkInteger accepts non-negative decimals only', () => {
    expect(() => checkInteger('0')).not.toThrow();
    expect(() => checkInteger('300')).not.toThrow();
    expect(() => checkInteger('-5')).toThrow('Not a valid non-negative integer: -5');
    expect(() => checkInteger('1.5')).toThrow(InvalidValueError);
  });

  it('checkInteger rejects values beyond the safe integer range', () => {
    expect(() => checkInteger('9007199254740991')).not.toThrow();
    expect(() => checkInteger('9007199254740992')).toThrow(
      'Not a valid non-negative integer: 9007199254740992',
    );
    expect(() => checkInteger('99999999999999999999')).toThrow(InvalidValueError);
  });

  it('checkDebugLevel accepts the closed set', () => {
    for (const level of ['quiet', 'fatal', 'error', 'info', 'verbose', 'debug', 'debug2', 'debug5']) {
      expect(() => checkDebugLevel(level)).not.toThrow();
    }
    expect(() => checkDebugLevel('debug6')).toThrow('Not a valid debug level: debug6');
    expect(() => checkDebugLevel('INFO')).toThrow(InvalidValueError);
  });

  it('checkDebugFlag accepts the closed set', () => {
    expect(() => checkDebugFlag('DB_QUERY')).not.toThrow();
    expect(() => checkDebugFlag('FEDERATION')).not.toThrow();
    expect(() => checkDebugFlag('db_query')).toThrow('Not a valid debug flag: db_query');
  });

  it('checkLogTimeFormat accepts the closed set', () => {
    expect(() => checkLogTimeFormat('iso8601_ms')).not.toThrow();
    expect(() => checkLogTimeFormat('rfc3339')).toThrow('Not a valid log time format: rfc3339');
  });

  it('checkAuthType accepts only auth/munge', () => {
    expect(() => checkAuthType('auth/munge')).not.toThrow();
    expect(() => checkAuthType('auth/jwt')).toThrow('Not a valid auth type: auth/jwt');
  });

  it('checkStorageType accepts only accounting_storage/mysql', () => {
    expect(() => checkStorageType('accounting_storage/mysql')).not.toThrow();
    expect(() => checkStorageType('accounting_storage/none')).toThrow(
      'Not a valid storage type: accounting_storage/none',
    );
  });

  it('checkPrivateData accepts the closed set', () => {
    expect(() => checkPrivateData('usage')).not.toThrow();
    expect(() => checkPrivateData('cloud')).toThrow('Not a valid private data entry: cloud');
  });

  describe('checkDuration', () => {
    it('accepts a count followed by hour, day or month', () => {
      expect(() => checkDuration('12month')).not.toThrow();
      expect(() => checkDuration('1hour')).not.toThrow();
      expect(() => checkDuration('30day')).not.toThrow();
    });

    it('rejects plurals, spaces and bare numbers', () => {
      expect(() => checkDuration('12months')).toThrow('Not a valid time format: 12months');
      expect(() => checkDuration('12 month')).toThrow(InvalidValueError);
      expect(() => checkDuration('12')).toThrow(InvalidValueError);
    });
  });

  describe('checkQueryRange', () => {
    it('accepts every documented form', () => {
      for (const value of ['1-12', '1-12:30:00', '12:30:00', '12:30', 'INFINITE']) {
        expect(() => checkQueryRange(value)).not.toThrow();
      }
    });

    it('rejects bare minutes and lowercase infinite', () => {
      expect(() => checkQueryRange('60')).toThrow('Not a valid max query time format: 60');
      expect(() => checkQueryRange('infinite')).toThrow(InvalidValueError);
    });
  });

  it('checkPassword rejects "#"', () => {
    expect(() => checkPassword('test-secret')).not.toThrow();
    expect(() => checkPassword('test#secret')).toThrow("Password cannot contain '#'");
  });

  it('checkSingleLine rejects line breaks', () => {
    expect(() => checkSingleLine('one line')).not.toThrow();
    expect(() => checkSingleLine('a\nb')).toThrow('Value cannot contain line breaks: "a\\nb"');
    expect(() => checkSingleLine('a\rb')).toThrow(InvalidValueError);
  });
});
