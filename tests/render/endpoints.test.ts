import { describe, it, expect, beforeEach, vi } from 'vitest';

vi.mock('../../src/cli/logger.js', () => ({
  log: {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  },
}));

import {
  parseEndpoints,
  parseSocketEndpoint,
  parseTcpEndpoint,
  resolveDatabaseEndpoint,
} from '../../src/render/endpoints.js';
import { SlurmdbdConfEditor } from '../../src/editor/conf-editor.js';
import { ConfErrorCode, EndpointError } from '../../src/editor/errors.js';
import { ConfigToken } from '../../src/editor/tokens.js';
import { log } from '../../src/cli/logger.js';

describe('database endpoints', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('classifies sockets and tcp endpoints, dropping blanks', () => {
    expect(parseEndpoints('db0:3306, file:///run/mysqld.sock,,db1:3306')).toEqual({
      sockets: ['file:///run/mysqld.sock'],
      tcp: ['db0:3306', 'db1:3306'],
    });
  });

  describe('parseTcpEndpoint', () => {
    it('splits on the last colon and strips IPv6 brackets', () => {
      expect(parseTcpEndpoint('[::1]:1234')).toEqual({ host: '::1', port: '1234' });
      expect(parseTcpEndpoint('10.0.0.5:3306')).toEqual({ host: '10.0.0.5', port: '3306' });
    });

    it('rejects an endpoint without a port', () => {
      expect(() => parseTcpEndpoint('db0')).toThrow('Missing port in database endpoint: db0');
      expect(() => parseTcpEndpoint('db0:')).toThrow('Not a valid database endpoint: db0:');
    });
  });

  it('takes the path of a socket endpoint', () => {
    expect(parseSocketEndpoint('file:///var/snap/mysql/common/socket')).toBe('/var/snap/mysql/common/socket');
    expect(() => parseSocketEndpoint('file:///')).toThrow(EndpointError);
  });

  describe('resolveDatabaseEndpoint', () => {
    it('prefers a socket over tcp', () => {
      expect(resolveDatabaseEndpoint('db0:3306,file:///run/mysqld.sock')).toEqual({
        kind: 'socket',
        path: '/run/mysqld.sock',
        raw: 'file:///run/mysqld.sock',
      });
    });

    it('uses the first tcp endpoint and warns about the rest', () => {
      expect(resolveDatabaseEndpoint('db0:3306,db1:3307')).toEqual({
        kind: 'tcp',
        host: 'db0',
        port: '3306',
        raw: 'db0:3306',
      });
      expect(log.warn).toHaveBeenCalledWith('2 tcp endpoints are specified, but only the first one will be used');
    });

    it('fails on an empty list', () => {
      try {
        resolveDatabaseEndpoint(' , ');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(EndpointError);
        if (error instanceof EndpointError) {
          expect(error.code).toBe(ConfErrorCode.ENDPOINT_INVALID);
          expect(error.message).toBe('No database endpoints provided: " , "');
        }
      }
    });
  });

  it('feeds an IPv6 endpoint into StorageHost and StoragePort', () => {
    const endpoint = resolveDatabaseEndpoint('[::1]:1234');
    if (endpoint.kind !== 'tcp') {
      throw new Error(`expected a tcp endpoint, got ${endpoint.kind}`);
    }

    const editor = new SlurmdbdConfEditor('/tmp/unused-slurmdbd.conf');
    editor.set(ConfigToken.StorageHost, endpoint.host);
    editor.set(ConfigToken.StoragePort, endpoint.port);

    expect(editor.get(ConfigToken.StorageHost)).toBe('::1');
    expect(editor.get(ConfigToken.StoragePort)).toBe(1234);
  });
});
