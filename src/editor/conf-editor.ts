/**
 * slurmdbd.conf Editor
 *
 * Loads slurmdbd.conf into an ordered token → raw string document, exposes
 * typed get/set/delete over every key through the key registry, and writes the
 * document back with a generated banner.
 *
 * Comments in the source file are dropped on load and never written back; the
 * file is generated, not hand-edited. Use {@link EnvDefaultsEditor} for the
 * hand-edited defaults file, which keeps its comments.
 *
 * An editor instance is owned by the caller that opened it. There is no shared
 * instance per path: two editors on one file do not see each other's changes,
 * and the last `dump()` wins.
 *
 * @example
 * ```typescript
 * const editor = SlurmdbdConfEditor.open('/etc/slurm/slurmdbd.conf');
 * editor.set(ConfigToken.StorageHost, '::1');
 * editor.set(ConfigToken.StoragePort, 3306);
 * editor.dump();
 * ```
 */

import fs from 'fs-extra';
import path from 'path';
import { log } from '../cli/logger.js';
import { InvalidValueError, KeyNotPresentError, ParseError, UnrecognizedKeyError } from './errors.js';
import { readTextIfExists, withFileLock, writeFileAtomic } from './file-io.js';
import { KEY_REGISTRY, textCodec, type ConfigInput, type ConfigValue } from './registry.js';
import { ConfigToken, lookup } from './tokens.js';
import type { ValidationResult } from './validators.js';

export interface ConfEditorOptions {
  /**
   * Hold the advisory lock while writing.
   *
   * @default true
   */
  lock?: boolean;

  /**
   * Clock for the banner timestamp.
   */
  now?: () => Date;

  /**
   * Permission bits for a newly created file. The file holds StoragePass.
   *
   * @default 0o600
   */
  mode?: number;
}

export const CONF_FILE_MODE = 0o600;

/**
 * Parse slurmdbd.conf content into an ordered document.
 *
 * Comment and blank lines are skipped. Each other line splits on its first
 * "="; a repeated key keeps its first position and its last value. `Key=`
 * with nothing after the "=" leaves the key absent.
 *
 * @throws {ParseError} On a line without "=" or with an unrecognized key
 */
export function parseConf(content: string, filePath: string): Map<ConfigToken, string> {
  const document = new Map<ConfigToken, string>();
  const lines = content.split('\n');

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index].endsWith('\r') ? lines[index].slice(0, -1) : lines[index];
    if (line.trim().length === 0 || line.trimStart().startsWith('#')) {
      continue;
    }

    const separator = line.indexOf('=');
    if (separator === -1) {
      throw new ParseError(`Expected Key=Value, got: ${line}`, filePath, index + 1);
    }

    let token: ConfigToken;
    try {
      token = lookup(line.slice(0, separator));
    } catch (error) {
      if (error instanceof UnrecognizedKeyError) {
        throw new ParseError(error.message, filePath, index + 1, { cause: error });
      }
      throw error;
    }

    const value = line.slice(separator + 1);
    if (value.length === 0) {
      document.delete(token);
    } else {
      document.set(token, value);
    }
  }

  return document;
}

/**
 * Render a document as slurmdbd.conf text: a three-line banner, then one
 * `Key=Value` line per entry in document order.
 */
export function serializeConf(
  entries: Iterable<readonly [ConfigToken, string]>,
  filePath: string,
  generatedAt: Date,
): string {
  const lines = ['#', `# ${filePath} generated at ${generatedAt.toISOString()}`, '#'];
  for (const [key, value] of entries) {
    lines.push(`${key}=${value}`);
  }
  return lines.map((line) => `${line}\n`).join('');
}

function attachKey(error: unknown, key: ConfigToken): unknown {
  if (error instanceof InvalidValueError && error.key === undefined) {
    return new InvalidValueError(error.message, error.value, key);
  }
  return error;
}

export class SlurmdbdConfEditor {
  private document = new Map<ConfigToken, string>();
  private readonly filePath: string;
  private readonly lock: boolean;
  private readonly now: () => Date;
  private readonly mode: number;

  /**
   * Create an editor with an empty document. Does not touch the filesystem;
   * see {@link SlurmdbdConfEditor.open}.
   */
  constructor(filePath: string, options: ConfEditorOptions = {}) {
    this.filePath = path.resolve(filePath);
    this.lock = options.lock ?? true;
    this.now = options.now ?? (() => new Date());
    this.mode = options.mode ?? CONF_FILE_MODE;
  }

  /**
   * Open slurmdbd.conf. A missing file is created empty, readable by its
   * owner only, and the document starts empty; an existing file is loaded.
   *
   * @throws {ParseError} If the existing file cannot be parsed
   */
  static open(filePath: string, options: ConfEditorOptions = {}): SlurmdbdConfEditor {
    const editor = new SlurmdbdConfEditor(filePath, options);
    if (!fs.existsSync(editor.path)) {
      log.debug(`Creating slurmdbd.conf at ${editor.path}`);
      fs.ensureFileSync(editor.path);
      fs.chmodSync(editor.path, editor.mode);
    } else {
      editor.load();
    }
    return editor;
  }

  /**
   * Absolute path of the configuration file
   */
  get path(): string {
    return this.filePath;
  }

  /**
   * Number of keys in the document
   */
  get size(): number {
    return this.document.size;
  }

  /**
   * Replace the document with the file's content. On a parse error the
   * document is left as it was.
   */
  load(): void {
    log.debug(`Parsing slurmdbd.conf at ${this.filePath}`);
    const parsed = parseConf(readTextIfExists(this.filePath) ?? '', this.filePath);
    if (parsed.size === 0) {
      log.debug(`Parsed slurmdbd.conf file ${this.filePath} is empty`);
    }
    this.document = parsed;
  }

  /**
   * Write the document to disk, replacing the whole file, and return the text
   * written. An empty document is written too, with a warning.
   */
  dump(): string {
    if (this.document.size === 0) {
      log.warn('Writing empty slurmdbd configuration');
    }

    log.debug(`Dumping new slurmdbd.conf to ${this.filePath}`);
    const content = this.render();
    withFileLock(
      this.filePath,
      () => writeFileAtomic(this.filePath, content, { mode: this.mode }),
      this.lock,
    );
    return content;
  }

  /**
   * The text `dump()` would write now
   */
  render(): string {
    return serializeConf(this.document, this.filePath, this.now());
  }

  /**
   * Discard the in-memory document. The path is kept.
   */
  clear(): void {
    this.document = new Map();
  }

  has(key: ConfigToken): boolean {
    return this.document.has(key);
  }

  /**
   * Decoded value of `key`, or undefined when it is not set.
   *
   * @throws {InvalidValueError} If a stored integer is not a number
   */
  get<K extends ConfigToken>(key: K): ConfigValue<K> | undefined {
    const raw = this.document.get(key);
    if (raw === undefined) {
      return undefined;
    }
    try {
      return KEY_REGISTRY[key].decode(raw);
    } catch (error) {
      throw attachKey(error, key);
    }
  }

  /**
   * Validate and store a value. A rejected value leaves the document unchanged.
   *
   * @throws {InvalidValueError}
   */
  set<K extends ConfigToken>(key: K, value: ConfigInput<K>): void {
    let encoded: string;
    try {
      encoded = KEY_REGISTRY[key].encode(value);
    } catch (error) {
      throw attachKey(error, key);
    }
    this.document.set(key, encoded);
  }

  /**
   * Store a value given in its textual form, e.g. from a parameter mapping.
   *
   * @throws {InvalidValueError}
   */
  setText(key: ConfigToken, text: string): void {
    this.document.set(key, this.encodeText(key, text));
  }

  /**
   * Validate a textual value for `key` and return its stored form without
   * touching the document.
   *
   * @throws {InvalidValueError}
   */
  encodeText(key: ConfigToken, text: string): string {
    try {
      return textCodec(key).encode(text);
    } catch (error) {
      throw attachKey(error, key);
    }
  }

  /**
   * Remove a key.
   *
   * @throws {KeyNotPresentError} If the key is not set
   */
  delete(key: ConfigToken): void {
    if (!this.document.delete(key)) {
      throw new KeyNotPresentError(key);
    }
  }

  /**
   * Stored string of `key`, exactly as it will be written
   */
  getRaw(key: ConfigToken): string | undefined {
    return this.document.get(key);
  }

  /**
   * Raw entries in document order
   */
  entries(): Array<[ConfigToken, string]> {
    return [...this.document.entries()];
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.document);
  }

  /**
   * Run every key's validator over the stored values. `load()` does not
   * validate values, so a hand-edited file can hold values `set` would reject.
   */
  validate(): ValidationResult {
    const errors: string[] = [];
    for (const [key, raw] of this.document) {
      try {
        this.encodeText(key, raw);
        KEY_REGISTRY[key].decode(raw);
      } catch (error) {
        if (error instanceof InvalidValueError) {
          errors.push(error.key ? error.message : `${key}: ${error.message}`);
          continue;
        }
        throw error;
      }
    }

    return {
      valid: errors.length === 0,
      errors,
    };
  }
}
