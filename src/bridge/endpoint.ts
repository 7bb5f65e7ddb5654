/**
 * Relay endpoint addressing
 *
 * The relay listens on a Unix domain socket everywhere except Windows,
 * where it listens on a loopback TCP port instead.
 */

export const DEFAULT_SOCKET_PATH = '/tmp/pcsx2.sock';
export const DEFAULT_TCP_HOST = '127.0.0.1';
export const DEFAULT_TCP_PORT = 28011;

export interface UnixEndpoint {
  kind: 'unix';
  path: string;
}

export interface TcpEndpoint {
  kind: 'tcp';
  host: string;
  port: number;
}

export type Endpoint = UnixEndpoint | TcpEndpoint;

export interface EndpointDefaults {
  socketPath?: string;
  tcpHost?: string;
  tcpPort?: number;
  preferTcp?: boolean;
}

/**
 * Pick the default endpoint for a platform.
 */
export function resolveDefaultEndpoint(
  platform: NodeJS.Platform = process.platform,
  defaults: EndpointDefaults = {}
): Endpoint {
  if (platform === 'win32' || defaults.preferTcp) {
    return {
      kind: 'tcp',
      host: defaults.tcpHost ?? DEFAULT_TCP_HOST,
      port: defaults.tcpPort ?? DEFAULT_TCP_PORT,
    };
  }
  return { kind: 'unix', path: defaults.socketPath ?? DEFAULT_SOCKET_PATH };
}

export function describeEndpoint(endpoint: Endpoint): string {
  return endpoint.kind === 'unix' ? `unix:${endpoint.path}` : `tcp://${endpoint.host}:${endpoint.port}`;
}
