/**
 * API Validators for memrelay
 *
 * Address and value checks run once per encoded command, so they are plain
 * type guards rather than zod parses. Client options and configuration,
 * validated once per instance, go through the zod schemas.
 */

import { Ok, Err } from 'ts-results';
import { MAX_ADDRESS, type Width } from '../protocol/opcodes.js';
import { MemoryClientOptionsSchema, type MemoryClientOptionsInput } from '../types/schemas/client.js';
import { MemoryClientError, zodErrorToMemoryClientError } from './errors.js';
import type { ClientResult } from '../utils/result-helpers.js';

const NUMBER_LIMITS: Record<1 | 2 | 4, { min: number; max: number }> = {
  1: { min: -0x80, max: 0xff },
  2: { min: -0x8000, max: 0xffff },
  4: { min: -0x80000000, max: 0xffffffff },
};

const BIGINT_MIN = -(2n ** 63n);
const BIGINT_MAX = 2n ** 64n - 1n;

export function checkAddress(address: unknown): ClientResult<number> {
  if (
    typeof address !== 'number' ||
    !Number.isInteger(address) ||
    address < 0 ||
    address > MAX_ADDRESS
  ) {
    return Err(
      new MemoryClientError(
        'InvalidParams',
        `Address must be an integer between 0 and 0x${MAX_ADDRESS.toString(16)}`,
        { address: String(address) }
      )
    );
  }
  return Ok(address);
}

/**
 * Check that a value fits the given width. Signed values are accepted and
 * written as two's complement.
 */
export function checkValue(value: unknown, width: Width): ClientResult<number | bigint> {
  if (width === 8) {
    if (typeof value !== 'bigint') {
      return Err(
        new MemoryClientError('InvalidParams', '64-bit values must be passed as bigint', {
          width,
          type: typeof value,
        })
      );
    }
    if (value < BIGINT_MIN || value > BIGINT_MAX) {
      return Err(
        new MemoryClientError('InvalidParams', `Value ${value} does not fit in 8 bytes`, {
          width,
          value: value.toString(),
        })
      );
    }
    return Ok(value);
  }

  if (typeof value !== 'number' || !Number.isInteger(value)) {
    return Err(
      new MemoryClientError('InvalidParams', `${width * 8}-bit values must be integer numbers`, {
        width,
        type: typeof value,
      })
    );
  }

  const limits = NUMBER_LIMITS[width];
  if (value < limits.min || value > limits.max) {
    return Err(
      new MemoryClientError('InvalidParams', `Value ${value} does not fit in ${width} byte(s)`, {
        width,
        value,
      })
    );
  }
  return Ok(value);
}

/**
 * Validate MemoryClient constructor options.
 *
 * @throws {MemoryClientError} InvalidParams naming the first bad field
 */
export function validateClientOptions(options: unknown): MemoryClientOptionsInput {
  const parsed = MemoryClientOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw zodErrorToMemoryClientError(parsed.error);
  }
  return parsed.data;
}
