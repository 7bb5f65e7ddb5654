import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  MemoryClientError,
  createBatchTooLargeError,
  createInvalidWidthError,
  createTimeoutError,
  toMemoryClientError,
  zodErrorToMemoryClientError,
} from '../../../src/api/errors.js';

describe('MemoryClientError', () => {
  it('serializes to a plain shape', () => {
    const error = new MemoryClientError('IOFailed', 'write failed', { errno: 'EPIPE' });

    expect(error.name).toBe('MemoryClientError');
    expect(error).toBeInstanceOf(Error);
    expect(error.toObject()).toEqual({
      code: 'IOFailed',
      message: 'write failed',
      details: { errno: 'EPIPE' },
    });
  });
});

describe('toMemoryClientError', () => {
  it('passes client errors through unchanged', () => {
    const original = createInvalidWidthError(3);
    expect(toMemoryClientError(original)).toBe(original);
  });

  it('maps connect-time errno codes to ConnectionFailed', () => {
    const error = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:28011'), {
      code: 'ECONNREFUSED',
    });

    const mapped = toMemoryClientError(error, 'IOFailed');

    expect(mapped.code).toBe('ConnectionFailed');
    expect(mapped.details).toEqual({ errno: 'ECONNREFUSED' });
  });

  it('maps AbortError to Cancelled', () => {
    const error = new Error('stop');
    error.name = 'AbortError';

    expect(toMemoryClientError(error)).toMatchObject({ code: 'Cancelled', message: 'stop' });
  });

  it('uses the fallback code for other errors', () => {
    const error = Object.assign(new Error('broken pipe'), { code: 'EPIPE' });

    expect(toMemoryClientError(error, 'IOFailed')).toMatchObject({
      code: 'IOFailed',
      details: { errno: 'EPIPE' },
    });
    expect(toMemoryClientError('nope')).toMatchObject({
      code: 'Unknown',
      message: 'Unknown client error',
    });
  });
});

describe('error factories', () => {
  it('describe the failing value', () => {
    expect(createInvalidWidthError(3).message).toBe(
      'Unsupported value width 3: expected 1, 2, 4 or 8 bytes'
    );
    expect(createBatchTooLargeError(16).details).toEqual({ capacity: 16 });
    expect(createTimeoutError(250, 'tcp://127.0.0.1:28011')).toMatchObject({
      code: 'Timeout',
      message: 'Request timed out after 250ms: tcp://127.0.0.1:28011',
    });
  });

  it('names the first offending field of a zod error', () => {
    const schema = z.object({ transport: z.object({ tcp_port: z.number().max(65535) }) });
    const parsed = schema.safeParse({ transport: { tcp_port: 70000 } });
    expect(parsed.success).toBe(false);
    if (parsed.success) {
      return;
    }

    const error = zodErrorToMemoryClientError(parsed.error);

    expect(error.code).toBe('InvalidParams');
    expect(error.details?.field).toBe('transport.tcp_port');
    expect(error.message).toMatch(/^Validation error on field 'transport\.tcp_port': /);
  });
});
