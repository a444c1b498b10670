/**
 * Database Endpoint Resolution
 *
 * The database relation hands over a comma-separated endpoint list. Entries
 * starting with file:// are unix sockets (a local mysql-router); anything else
 * is host:port. Sockets win over TCP, and only the first endpoint of the
 * chosen kind is used.
 */

import { EndpointError } from '../editor/errors.js';
import { log } from '../cli/logger.js';

export type DatabaseEndpoint =
  | { kind: 'socket'; path: string; raw: string }
  | { kind: 'tcp'; host: string; port: string; raw: string };

export interface ParsedEndpoints {
  sockets: string[];
  tcp: string[];
}

/**
 * Split and classify an endpoint list. Blank entries are dropped.
 */
export function parseEndpoints(endpoints: string): ParsedEndpoints {
  const parsed: ParsedEndpoints = { sockets: [], tcp: [] };
  for (const endpoint of endpoints.split(',').map((ep) => ep.trim())) {
    if (!endpoint) {
      continue;
    }
    if (endpoint.startsWith('file://')) {
      parsed.sockets.push(endpoint);
    } else {
      parsed.tcp.push(endpoint);
    }
  }
  return parsed;
}

/**
 * Split host:port on the last colon and strip IPv6 brackets from the host.
 *
 * @example
 * ```typescript
 * parseTcpEndpoint('[::1]:1234'); // { host: '::1', port: '1234' }
 * ```
 */
export function parseTcpEndpoint(endpoint: string): { host: string; port: string } {
  const separator = endpoint.lastIndexOf(':');
  if (separator === -1) {
    throw new EndpointError(`Missing port in database endpoint: ${endpoint}`, endpoint);
  }

  let host = endpoint.slice(0, separator);
  const port = endpoint.slice(separator + 1);
  if (host.startsWith('[') && host.endsWith(']')) {
    host = host.slice(1, -1);
  }
  if (!host || !port) {
    throw new EndpointError(`Not a valid database endpoint: ${endpoint}`, endpoint);
  }
  return { host, port };
}

/**
 * Filesystem path of a file:// socket endpoint
 */
export function parseSocketEndpoint(endpoint: string): string {
  const socketPath = new URL(endpoint).pathname;
  if (!socketPath || socketPath === '/') {
    throw new EndpointError(`Not a valid socket endpoint: ${endpoint}`, endpoint);
  }
  return socketPath;
}

/**
 * Pick the endpoint slurmdbd should use.
 *
 * @throws {EndpointError} If the list holds no usable endpoint
 */
export function resolveDatabaseEndpoint(endpoints: string): DatabaseEndpoint {
  const { sockets, tcp } = parseEndpoints(endpoints);

  if (sockets.length > 0) {
    if (sockets.length > 1) {
      log.warn(`${sockets.length} socket endpoints are specified, but only the first one will be used`);
    }
    return { kind: 'socket', path: parseSocketEndpoint(sockets[0]), raw: sockets[0] };
  }

  if (tcp.length > 0) {
    if (tcp.length > 1) {
      log.warn(`${tcp.length} tcp endpoints are specified, but only the first one will be used`);
    }
    return { kind: 'tcp', ...parseTcpEndpoint(tcp[0]), raw: tcp[0] };
  }

  throw new EndpointError(`No database endpoints provided: "${endpoints}"`, endpoints);
}
