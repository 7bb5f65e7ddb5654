/**
 * Result Type Helpers
 *
 * Encoder, buffer pool, batch appends and transport report failures as
 * values instead of throwing. The public client unwraps them at the edge.
 *
 * Usage:
 * ```typescript
 * const encoded = encodeRead(bytes, 0, 0x1000, 4);
 * if (encoded.err) {
 *   return encoded; // propagate MemoryClientError
 * }
 * offset += encoded.val;
 * ```
 */

import { Result, Ok, Err } from 'ts-results';
import { MemoryClientError, toMemoryClientError, type MemoryClientErrorCode } from '../api/errors.js';

export type ClientResult<T> = Result<T, MemoryClientError>;

/**
 * Convert a Promise<T> into Promise<ClientResult<T>>, mapping whatever it
 * rejects with onto the client error taxonomy.
 */
export async function resultify<T>(
  promise: Promise<T>,
  fallbackCode: MemoryClientErrorCode = 'Unknown'
): Promise<ClientResult<T>> {
  try {
    const value = await promise;
    return Ok(value);
  } catch (error) {
    return Err(toMemoryClientError(error, fallbackCode));
  }
}

/**
 * Unwrap a Result or throw its error.
 */
export function unwrap<T, E extends Error>(result: Result<T, E>): T {
  if (result.ok) {
    return result.val;
  }
  throw result.val;
}

export { Result, Ok, Err };
