import { describe, it, expect } from 'vitest';
import {
  BufferPool,
  DEFAULT_MAX_BATCH_COMMANDS,
  replyCapacityFor,
  requestCapacityFor,
} from '../../../src/core/buffer-pool.js';
import { MemoryClientError } from '../../../src/api/errors.js';
import { unwrap } from '../../../src/utils/result-helpers.js';
import { flush, track } from '../../helpers/test-client.js';

describe('BufferPool', () => {
  it('sizes regions for the worst-case batch', () => {
    const pool = new BufferPool({ maxBatchCommands: 10 });

    expect(pool.requestCapacity).toBe(133);
    expect(pool.replyCapacity).toBe(81);
    expect(requestCapacityFor(10)).toBe(133);
    expect(replyCapacityFor(10)).toBe(81);
  });

  it('defaults to 50000 commands', () => {
    const pool = new BufferPool();

    expect(pool.maxBatchCommands).toBe(DEFAULT_MAX_BATCH_COMMANDS);
    expect(pool.requestCapacity).toBe(650003);
    expect(pool.replyCapacity).toBe(400001);
  });

  it.each([0, 65536, 1.5])('rejects capacity %s', (maxBatchCommands) => {
    expect(() => new BufferPool({ maxBatchCommands })).toThrow(MemoryClientError);
  });

  it('hands out one lease at a time', async () => {
    const pool = new BufferPool({ maxBatchCommands: 4 });
    const first = unwrap(await pool.acquire());
    const second = track(pool.acquire());

    await flush();
    expect(second.settled()).toBe(false);
    expect(first.request.length).toBe(55);
    expect(first.offsets.length).toBe(4);

    first.release();
    const lease = unwrap(await second.promise);
    expect(lease.active).toBe(true);
    lease.release();
    expect(pool.getStats()).toMatchObject({ leases: 2, waiting: 0, locked: false });
  });

  it('reports an abandoned wait as Cancelled', async () => {
    const pool = new BufferPool({ maxBatchCommands: 4 });
    const lease = unwrap(await pool.acquire());
    const controller = new AbortController();

    const waiting = pool.acquire(controller.signal);
    controller.abort();
    const result = await waiting;

    expect(result.err).toBe(true);
    if (result.err) {
      expect(result.val.code).toBe('Cancelled');
      expect(result.val.details).toEqual({ lock: 'buffer' });
    }
    expect(pool.getStats()).toMatchObject({ leases: 1, waiting: 0, locked: true });
    lease.release();
  });

  it('refuses region access after the lease is released', async () => {
    const pool = new BufferPool({ maxBatchCommands: 4 });
    const lease = unwrap(await pool.acquire());
    lease.release();

    expect(lease.active).toBe(false);
    expect(() => lease.reply).toThrow(/without holding the buffer lock/);
  });

  it('cannot close while leased, and refuses leases once closed', async () => {
    const pool = new BufferPool({ maxBatchCommands: 4 });
    const lease = unwrap(await pool.acquire());

    const busy = pool.close();
    expect(busy.err).toBe(true);
    if (busy.err) {
      expect(busy.val.code).toBe('InvalidState');
    }

    lease.release();
    expect(pool.close().ok).toBe(true);
    expect(pool.isClosed).toBe(true);
    expect(pool.requestCapacity).toBe(0);

    const after = await pool.acquire();
    expect(after.err).toBe(true);
    if (after.err) {
      expect(after.val.code).toBe('InvalidState');
    }
  });
});
