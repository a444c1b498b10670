/**
 * Parameter Assembly
 *
 * Builds the flat slurmdbd.conf parameter mapping from its sources and feeds
 * it through the editor, so every value passes the same validators as a
 * direct `set`.
 *
 * Precedence, lowest to highest: static defaults, peer data, database data,
 * operator overrides.
 */

import type { SlurmdbdConfEditor } from '../editor/conf-editor.js';
import type { EnvChanges } from '../editor/env-defaults.js';
import { ConfigToken, lookup } from '../editor/tokens.js';
import { resolveDatabaseEndpoint } from './endpoints.js';

export type ParameterValue = string | number | boolean | null | undefined;

/**
 * Flat slurmdbd.conf parameters keyed by on-disk key name
 */
export type ParameterMap = Readonly<Record<string, ParameterValue>>;

export interface ParameterSources {
  defaults?: ParameterMap;
  peer?: ParameterMap;
  database?: ParameterMap;
  overrides?: ParameterMap;
}

/**
 * Credentials and endpoints handed over by the database relation
 */
export interface DatabaseInfo {
  username: string;
  password: string;
  /** @default "slurm_acct_db" */
  name?: string;
  /** Comma-separated; file:// entries are unix sockets */
  endpoints: string;
}

export interface DatabaseSettings {
  parameters: Record<string, string>;
  env: EnvChanges;
}

export const SLURM_ACCT_DB = 'slurm_acct_db';

/**
 * Environment variable the MySQL client reads for its socket path
 */
export const MYSQL_UNIX_PORT = 'mysql_unix_port';

/**
 * Translate database relation data into slurmdbd.conf parameters and the
 * matching defaults-file change.
 *
 * A socket endpoint is exported through MYSQL_UNIX_PORT; a TCP endpoint sets
 * StorageHost/StoragePort and removes MYSQL_UNIX_PORT.
 */
export function databaseParameters(info: DatabaseInfo): DatabaseSettings {
  const endpoint = resolveDatabaseEndpoint(info.endpoints);
  const parameters: Record<string, string> = {
    [ConfigToken.StorageUser]: info.username,
    [ConfigToken.StoragePass]: info.password,
    [ConfigToken.StorageLoc]: info.name ?? SLURM_ACCT_DB,
  };

  if (endpoint.kind === 'socket') {
    return { parameters, env: { [MYSQL_UNIX_PORT]: `"${endpoint.path}"` } };
  }

  parameters[ConfigToken.StorageHost] = endpoint.host;
  parameters[ConfigToken.StoragePort] = endpoint.port;
  return { parameters, env: { [MYSQL_UNIX_PORT]: null } };
}

function toText(value: string | number | boolean): string {
  if (typeof value === 'boolean') {
    return value ? 'yes' : 'no';
  }
  return String(value);
}

/**
 * Merge parameter sources. Undefined values do not override; null or an empty
 * string in a higher source removes the key from the result.
 */
export function assembleParameters(sources: ParameterSources): Record<string, string> {
  const merged = new Map<string, string | null>();
  for (const source of [sources.defaults, sources.peer, sources.database, sources.overrides]) {
    if (!source) {
      continue;
    }
    for (const [name, value] of Object.entries(source)) {
      if (value === undefined) {
        continue;
      }
      merged.set(name, value === null ? null : toText(value));
    }
  }

  const result: Record<string, string> = {};
  for (const [name, value] of merged) {
    if (value !== null && value !== '') {
      result[name] = value;
    }
  }
  return result;
}

/**
 * Set every parameter on the editor. All names and values are checked before
 * the first one is stored, so a rejected mapping leaves the editor unchanged.
 *
 * @throws {UnrecognizedKeyError} For a name outside the vocabulary
 * @throws {InvalidValueError} For a value its key's validator rejects
 */
export function applyParameters(editor: SlurmdbdConfEditor, parameters: Readonly<Record<string, string>>): void {
  const checked: Array<[ConfigToken, string]> = Object.entries(parameters).map(([name, text]) => {
    const token = lookup(name);
    editor.encodeText(token, text);
    return [token, text];
  });

  for (const [token, text] of checked) {
    editor.setText(token, text);
  }
}
