/**
 * Main type exports for memrelay
 */

export type {
  Width,
  ValueOf,
  CommandKind,
} from '../protocol/opcodes.js';

export type { Endpoint, UnixEndpoint, TcpEndpoint } from '../bridge/endpoint.js';

/**
 * Plain error shape, as produced by MemoryClientError.toObject().
 */
export interface MemoryClientErrorShape {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Outcome of the last completed operation on a client handle.
 */
export type OperationStatus = 'Success' | 'Fail' | 'Unknown';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface SendOptions {
  /** Milliseconds before the send fails with Timeout. 0 disables. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ClientStats {
  commandsSent: number;
  batchesFinalized: number;
  batchesSent: number;
  failures: number;
}
