import { describe, it, expect } from 'vitest';
import {
  DEFAULT_SOCKET_PATH,
  DEFAULT_TCP_PORT,
  describeEndpoint,
  resolveDefaultEndpoint,
} from '../../../src/bridge/endpoint.js';

describe('resolveDefaultEndpoint', () => {
  it('uses the Unix socket on POSIX platforms', () => {
    expect(resolveDefaultEndpoint('linux')).toEqual({ kind: 'unix', path: DEFAULT_SOCKET_PATH });
    expect(resolveDefaultEndpoint('darwin', { socketPath: '/run/relay.sock' })).toEqual({
      kind: 'unix',
      path: '/run/relay.sock',
    });
  });

  it('uses loopback TCP on Windows', () => {
    expect(resolveDefaultEndpoint('win32')).toEqual({
      kind: 'tcp',
      host: '127.0.0.1',
      port: DEFAULT_TCP_PORT,
    });
  });

  it('honours preferTcp anywhere', () => {
    expect(resolveDefaultEndpoint('linux', { preferTcp: true, tcpPort: 30000 })).toEqual({
      kind: 'tcp',
      host: '127.0.0.1',
      port: 30000,
    });
  });
});

describe('describeEndpoint', () => {
  it('formats both kinds', () => {
    expect(describeEndpoint({ kind: 'unix', path: '/tmp/x.sock' })).toBe('unix:/tmp/x.sock');
    expect(describeEndpoint({ kind: 'tcp', host: 'localhost', port: 1 })).toBe('tcp://localhost:1');
  });
});
