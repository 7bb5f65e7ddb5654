/**
 * Client error utilities.
 *
 * Provides a consistent error type for all public API surfaces and
 * helpers to convert lower-level socket and validation errors into
 * MemoryClientError instances that callers can reason about.
 */

import type { ZodError } from 'zod';
import type { MemoryClientErrorShape } from '../types/index.js';

/**
 * Error codes surfaced to API consumers.
 *
 * The first group mirrors the protocol's failure taxonomy; the rest cover
 * argument validation, API misuse, and caller-driven cancellation.
 */
export type MemoryClientErrorCode =
  | 'InvalidWidth'
  | 'ConnectionFailed'
  | 'IOFailed'
  | 'RemoteRejected'
  | 'BatchTooLarge'
  | 'Unknown'
  | 'InvalidParams'
  | 'InvalidState'
  | 'Timeout'
  | 'Cancelled';

export class MemoryClientError extends Error implements MemoryClientErrorShape {
  public readonly code: MemoryClientErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: MemoryClientErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MemoryClientError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape (for JSON output/logging).
   */
  public toObject(): MemoryClientErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

const ERRNO_CONNECT_CODES: ReadonlySet<string> = new Set([
  'ECONNREFUSED',
  'ENOENT',
  'EACCES',
  'EADDRNOTAVAIL',
  'ENOTSOCK',
  'EHOSTUNREACH',
]);

function errnoCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Map unknown errors into MemoryClientError instances.
 *
 * @param error - Error thrown by the socket layer or a caller callback
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toMemoryClientError(
  error: unknown,
  fallbackCode: MemoryClientErrorCode = 'Unknown'
): MemoryClientError {
  if (error instanceof MemoryClientError) {
    return error;
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError') {
      return new MemoryClientError('Cancelled', error.message || 'Operation aborted by caller');
    }

    const code = errnoCode(error);
    if (code !== undefined && ERRNO_CONNECT_CODES.has(code)) {
      return new MemoryClientError('ConnectionFailed', error.message, { errno: code });
    }

    return new MemoryClientError(
      fallbackCode,
      error.message,
      code !== undefined ? { errno: code } : undefined
    );
  }

  return new MemoryClientError(fallbackCode, 'Unknown client error');
}

export function createInvalidWidthError(width: number): MemoryClientError {
  return new MemoryClientError(
    'InvalidWidth',
    `Unsupported value width ${width}: expected 1, 2, 4 or 8 bytes`,
    { width }
  );
}

export function createBatchTooLargeError(capacity: number): MemoryClientError {
  return new MemoryClientError(
    'BatchTooLarge',
    `Batch already holds ${capacity} commands, the configured maximum`,
    { capacity }
  );
}

export function createInvalidStateError(
  message: string,
  details?: Record<string, unknown>
): MemoryClientError {
  return new MemoryClientError('InvalidState', message, details);
}

export function createTimeoutError(timeoutMs: number, endpoint: string): MemoryClientError {
  return new MemoryClientError(
    'Timeout',
    `Request timed out after ${timeoutMs}ms: ${endpoint}`,
    { timeoutMs, endpoint }
  );
}

/**
 * Convert a zod validation error into an InvalidParams error naming the
 * first offending field.
 */
export function zodErrorToMemoryClientError(error: ZodError): MemoryClientError {
  const firstIssue = error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = `Validation error on field '${field}': ${firstIssue?.message ?? 'invalid value'}`;

  return new MemoryClientError('InvalidParams', message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}
