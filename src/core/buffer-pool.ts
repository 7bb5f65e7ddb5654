/**
 * Buffer Pool
 *
 * Three fixed-capacity scratch regions, allocated once per client and reused
 * by every single command and batch build:
 *
 * - request: worst-case batch request (every command a 64-bit write)
 * - reply:   worst-case batch reply (every command a 64-bit read)
 * - offsets: one reply offset per command
 *
 * The regions are reachable only through a ScratchLease, which wraps the
 * pool's mutex guard. Capacity is a command count; exceeding it is reported
 * by the batch builder as BatchTooLarge.
 */

import { Ok, Err } from 'ts-results';
import type { Logger } from 'pino';
import {
  BATCH_HEADER_SIZE,
  COMMAND_HEADER_SIZE,
  MAX_BATCH_COUNT,
  MAX_WIDTH,
  STATUS_SIZE,
} from '../protocol/opcodes.js';
import { Mutex, type MutexGuard } from './async-mutex.js';
import { createInvalidStateError, MemoryClientError } from '../api/errors.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { resultify, type ClientResult } from '../utils/result-helpers.js';

export const DEFAULT_MAX_BATCH_COMMANDS = 50_000;

export interface BufferPoolOptions {
  maxBatchCommands?: number;
  logger?: Logger;
}

export interface BufferPoolStats {
  maxBatchCommands: number;
  requestCapacity: number;
  replyCapacity: number;
  leases: number;
  waiting: number;
  locked: boolean;
}

export function requestCapacityFor(commands: number): number {
  return BATCH_HEADER_SIZE + commands * (COMMAND_HEADER_SIZE + MAX_WIDTH);
}

export function replyCapacityFor(commands: number): number {
  return STATUS_SIZE + commands * MAX_WIDTH;
}

/**
 * Exclusive access to the pool's scratch regions. Every accessor fails once
 * the lease has been released.
 */
export class ScratchLease {
  private readonly pool: BufferPool;
  private readonly guard: MutexGuard;

  constructor(pool: BufferPool, guard: MutexGuard) {
    this.pool = pool;
    this.guard = guard;
  }

  get active(): boolean {
    return this.pool.holds(this.guard);
  }

  get request(): Uint8Array {
    return this.pool.region('request', this.guard);
  }

  get reply(): Uint8Array {
    return this.pool.region('reply', this.guard);
  }

  get offsets(): Uint32Array {
    return this.pool.offsetRegion(this.guard);
  }

  release(): void {
    this.guard.release();
  }
}

export class BufferPool {
  public readonly maxBatchCommands: number;
  private requestRegion: Uint8Array;
  private replyRegion: Uint8Array;
  private offsetsRegion: Uint32Array;
  private readonly mutex = new Mutex('buffer');
  private readonly logger?: Logger;
  private leaseCount = 0;
  private closed = false;

  constructor(options: BufferPoolOptions = {}) {
    const maxBatchCommands = options.maxBatchCommands ?? DEFAULT_MAX_BATCH_COMMANDS;
    if (!Number.isInteger(maxBatchCommands) || maxBatchCommands < 1 || maxBatchCommands > MAX_BATCH_COUNT) {
      throw new MemoryClientError(
        'InvalidParams',
        `maxBatchCommands must be an integer between 1 and ${MAX_BATCH_COUNT}`,
        { maxBatchCommands }
      );
    }

    this.maxBatchCommands = maxBatchCommands;
    this.logger = options.logger;
    this.requestRegion = new Uint8Array(requestCapacityFor(maxBatchCommands));
    this.replyRegion = new Uint8Array(replyCapacityFor(maxBatchCommands));
    this.offsetsRegion = new Uint32Array(maxBatchCommands);

    lazyLog(
      this.logger,
      'debug',
      () => ({
        maxBatchCommands,
        requestBytes: this.requestRegion.length,
        replyBytes: this.replyRegion.length,
      }),
      'Buffer pool allocated'
    );
  }

  get requestCapacity(): number {
    return this.requestRegion.length;
  }

  get replyCapacity(): number {
    return this.replyRegion.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get locked(): boolean {
    return this.mutex.locked;
  }

  /**
   * Wait for exclusive use of the scratch regions.
   */
  async acquire(signal?: AbortSignal): Promise<ClientResult<ScratchLease>> {
    if (this.closed) {
      return Err(createInvalidStateError('Buffer pool has been closed'));
    }
    const acquired = await resultify(this.mutex.acquire(signal), 'Cancelled');
    if (acquired.err) {
      return acquired;
    }
    const guard = acquired.val;
    if (this.closed) {
      guard.release();
      return Err(createInvalidStateError('Buffer pool has been closed'));
    }
    this.leaseCount++;
    return Ok(new ScratchLease(this, guard));
  }

  holds(guard: MutexGuard): boolean {
    return !this.closed && this.mutex.isHeldBy(guard);
  }

  region(name: 'request' | 'reply', guard: MutexGuard): Uint8Array {
    this.assertHeld(guard);
    return name === 'request' ? this.requestRegion : this.replyRegion;
  }

  offsetRegion(guard: MutexGuard): Uint32Array {
    this.assertHeld(guard);
    return this.offsetsRegion;
  }

  /**
   * Drop the scratch regions. Fails while a lease is outstanding.
   */
  close(): ClientResult<void> {
    if (this.closed) {
      return Ok.EMPTY;
    }
    if (this.mutex.locked) {
      return Err(createInvalidStateError('Cannot close buffer pool while it is in use'));
    }
    this.closed = true;
    this.requestRegion = new Uint8Array(0);
    this.replyRegion = new Uint8Array(0);
    this.offsetsRegion = new Uint32Array(0);
    lazyLog(this.logger, 'debug', () => ({ leases: this.leaseCount }), 'Buffer pool released');
    return Ok.EMPTY;
  }

  getStats(): BufferPoolStats {
    return {
      maxBatchCommands: this.maxBatchCommands,
      requestCapacity: this.requestRegion.length,
      replyCapacity: this.replyRegion.length,
      leases: this.leaseCount,
      waiting: this.mutex.pending,
      locked: this.mutex.locked,
    };
  }

  private assertHeld(guard: MutexGuard): void {
    if (!this.holds(guard)) {
      throw createInvalidStateError('Scratch buffers accessed without holding the buffer lock');
    }
  }
}
