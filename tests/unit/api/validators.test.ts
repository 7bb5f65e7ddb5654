import { describe, it, expect } from 'vitest';
import { checkAddress, checkValue, validateClientOptions } from '../../../src/api/validators.js';
import { MemoryClientError } from '../../../src/api/errors.js';

describe('checkAddress', () => {
  it('accepts the full 32-bit range', () => {
    expect(checkAddress(0).ok).toBe(true);
    expect(checkAddress(0xffffffff).val).toBe(0xffffffff);
  });

  it.each([-1, 0x100000000, 1.5, Number.NaN, '16'])('rejects %s', (address) => {
    const result = checkAddress(address);

    expect(result.err).toBe(true);
    if (result.err) {
      expect(result.val.code).toBe('InvalidParams');
      expect(result.val.details).toEqual({ address: String(address) });
    }
  });
});

describe('checkValue', () => {
  it.each([
    { value: 0xff, width: 1 as const },
    { value: -0x80, width: 1 as const },
    { value: 0xffff, width: 2 as const },
    { value: -0x80000000, width: 4 as const },
    { value: 2n ** 64n - 1n, width: 8 as const },
    { value: -(2n ** 63n), width: 8 as const },
  ])('accepts $value at width $width', ({ value, width }) => {
    expect(checkValue(value, width).ok).toBe(true);
  });

  it.each([
    { value: 0x100, width: 1 as const },
    { value: -0x81, width: 1 as const },
    { value: 1.5, width: 2 as const },
    { value: 0x100000000, width: 4 as const },
    { value: 2n ** 64n, width: 8 as const },
    { value: -(2n ** 63n) - 1n, width: 8 as const },
  ])('rejects $value at width $width', ({ value, width }) => {
    const result = checkValue(value, width);
    expect(result.err && result.val.code).toBe('InvalidParams');
  });

  it('requires bigint for 64-bit values and numbers otherwise', () => {
    const wide = checkValue(5, 8);
    const narrow = checkValue(5n, 4);

    expect(wide.err && wide.val.message).toBe('64-bit values must be passed as bigint');
    expect(narrow.err && narrow.val.message).toBe('32-bit values must be integer numbers');
  });
});

describe('validateClientOptions', () => {
  it('returns valid options', () => {
    const options = {
      endpoint: { kind: 'tcp' as const, host: '127.0.0.1', port: 28011 },
      maxBatchCommands: 128,
      timeoutMs: 500,
      logLevel: 'debug' as const,
    };

    expect(validateClientOptions(options)).toEqual(options);
  });

  it.each([
    [{ maxBatchCommands: 0 }, 'maxBatchCommands'],
    [{ maxBatchCommands: 65536 }, 'maxBatchCommands'],
    [{ timeoutMs: -1 }, 'timeoutMs'],
    [{ endpoint: { kind: 'tcp', host: '127.0.0.1', port: 70000 } }, 'endpoint.port'],
    [{ endpoint: { kind: 'unix', path: '' } }, 'endpoint.path'],
  ])('rejects %j on %s', (options, field) => {
    try {
      validateClientOptions(options);
      expect.unreachable('validation should fail');
    } catch (error) {
      expect(error).toBeInstanceOf(MemoryClientError);
      expect(error).toMatchObject({ code: 'InvalidParams', details: { field } });
    }
  });
});
