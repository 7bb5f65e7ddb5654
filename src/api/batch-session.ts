/**
 * Batch Session
 *
 * Accumulates commands into one multi-command message inside the client's
 * scratch buffers. A session holds both the batch lock and the buffer lock
 * from creation until finalize() or abort(); it is the token proving that
 * ownership, and it cannot be used again afterwards.
 *
 * Request: [0xFF][count:2 LE][command]...
 * Reply:   [status:1][slot]...  (reads reserve `width` bytes, writes 1)
 */

import { Ok, Err } from 'ts-results';
import type { Logger } from 'pino';
import {
  BATCH_COUNT_OFFSET,
  BATCH_HEADER_SIZE,
  Opcode,
  STATUS_SIZE,
  batchReplySlot,
  isSupportedWidth,
  type CommandKind,
  type Width,
} from '../protocol/opcodes.js';
import { encodeRead, encodeWrite, writeUint16LE } from '../protocol/command-encoder.js';
import type { ScratchLease } from '../core/buffer-pool.js';
import type { MutexGuard } from '../core/async-mutex.js';
import { FinalizedBatch, OwnedBuffer } from '../core/wire-buffer.js';
import {
  createBatchTooLargeError,
  createInvalidStateError,
  createInvalidWidthError,
} from './errors.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { unwrap, type ClientResult } from '../utils/result-helpers.js';

export type BatchState = 'open' | 'accumulating' | 'finalized' | 'aborted';

export interface BatchSessionOptions {
  lease: ScratchLease;
  batchGuard: MutexGuard;
  capacity: number;
  logger?: Logger;
  onFinalize?: (batch: FinalizedBatch) => void;
  onAbort?: (commandCount: number) => void;
}

export class BatchSession {
  private readonly lease: ScratchLease;
  private readonly batchGuard: MutexGuard;
  private readonly logger?: Logger;
  private readonly onFinalize?: (batch: FinalizedBatch) => void;
  private readonly onAbort?: (commandCount: number) => void;
  public readonly capacity: number;

  private currentState: BatchState = 'open';
  private requestLen = BATCH_HEADER_SIZE;
  private replyLen = STATUS_SIZE;
  private count = 0;

  constructor(options: BatchSessionOptions) {
    this.lease = options.lease;
    this.batchGuard = options.batchGuard;
    this.capacity = options.capacity;
    this.logger = options.logger;
    this.onFinalize = options.onFinalize;
    this.onAbort = options.onAbort;

    this.lease.request[0] = Opcode.MultiCommand;
    writeUint16LE(this.lease.request, BATCH_COUNT_OFFSET, 0);

    lazyLog(this.logger, 'debug', () => ({ capacity: this.capacity }), 'Batch opened');
  }

  get state(): BatchState {
    return this.currentState;
  }

  get isOpen(): boolean {
    return this.currentState === 'open' || this.currentState === 'accumulating';
  }

  get commandCount(): number {
    return this.count;
  }

  /** Bytes the request will occupy, header included. */
  get requestLength(): number {
    return this.requestLen;
  }

  /** Bytes the reply will occupy, status included. */
  get replyLength(): number {
    return this.replyLen;
  }

  /**
   * Append a read. Resolves to the command's index in the batch.
   */
  tryRead(address: number, width: number): ClientResult<number> {
    const ready = this.checkAppend(width);
    if (ready.err) {
      return ready;
    }
    const encoded = encodeRead(this.lease.request, this.requestLen, address, ready.val);
    if (encoded.err) {
      return encoded;
    }
    return Ok(this.commit('read', ready.val, encoded.val));
  }

  /**
   * Append a write. Resolves to the command's index in the batch.
   */
  tryWrite(address: number, value: number | bigint, width: number): ClientResult<number> {
    const ready = this.checkAppend(width);
    if (ready.err) {
      return ready;
    }
    const encoded = encodeWrite(this.lease.request, this.requestLen, address, value, ready.val);
    if (encoded.err) {
      return encoded;
    }
    return Ok(this.commit('write', ready.val, encoded.val));
  }

  read(address: number, width: number): number {
    return unwrap(this.tryRead(address, width));
  }

  write(address: number, value: number | bigint, width: number): number {
    return unwrap(this.tryWrite(address, value, width));
  }

  read8(address: number): number {
    return this.read(address, 1);
  }

  read16(address: number): number {
    return this.read(address, 2);
  }

  read32(address: number): number {
    return this.read(address, 4);
  }

  read64(address: number): number {
    return this.read(address, 8);
  }

  write8(address: number, value: number): number {
    return this.write(address, value, 1);
  }

  write16(address: number, value: number): number {
    return this.write(address, value, 2);
  }

  write32(address: number, value: number): number {
    return this.write(address, value, 4);
  }

  write64(address: number, value: bigint): number {
    return this.write(address, value, 8);
  }

  /**
   * Stamp the command count, copy the request into an owned buffer, size an
   * owned reply buffer, and release both locks.
   */
  tryFinalize(): ClientResult<FinalizedBatch> {
    const active = this.checkActive();
    if (active.err) {
      return active;
    }

    const request = this.lease.request;
    writeUint16LE(request, BATCH_COUNT_OFFSET, this.count);

    const batch = new FinalizedBatch(
      OwnedBuffer.copyOf(request, this.requestLen),
      OwnedBuffer.alloc(this.replyLen),
      Array.from(this.lease.offsets.subarray(0, this.count))
    );

    this.currentState = 'finalized';
    this.unlock();

    lazyLog(
      this.logger,
      'debug',
      () => ({ commands: this.count, requestBytes: this.requestLen, replyBytes: this.replyLen }),
      'Batch finalized'
    );
    this.onFinalize?.(batch);
    return Ok(batch);
  }

  /**
   * @throws {MemoryClientError} InvalidState if the session is already closed
   */
  finalize(): FinalizedBatch {
    return unwrap(this.tryFinalize());
  }

  /**
   * Drop everything appended so far and release both locks.
   *
   * @throws {MemoryClientError} InvalidState if the session is already closed
   */
  abort(): void {
    unwrap(this.checkActive());
    this.currentState = 'aborted';
    this.unlock();
    lazyLog(this.logger, 'debug', () => ({ commands: this.count }), 'Batch aborted');
    this.onAbort?.(this.count);
  }

  private checkActive(): ClientResult<void> {
    if (!this.isOpen) {
      return Err(
        createInvalidStateError(`Batch session is ${this.currentState}`, { state: this.currentState })
      );
    }
    return Ok.EMPTY;
  }

  private checkAppend(width: number): ClientResult<Width> {
    const active = this.checkActive();
    if (active.err) {
      return active;
    }
    if (!isSupportedWidth(width)) {
      return Err(createInvalidWidthError(width));
    }
    if (this.count >= this.capacity) {
      return Err(createBatchTooLargeError(this.capacity));
    }
    return Ok(width);
  }

  private commit(kind: CommandKind, width: Width, encodedBytes: number): number {
    const index = this.count;
    this.lease.offsets[index] = this.replyLen;
    this.replyLen += batchReplySlot(kind, width);
    this.requestLen += encodedBytes;
    this.count++;
    this.currentState = 'accumulating';
    return index;
  }

  private unlock(): void {
    this.lease.release();
    this.batchGuard.release();
  }
}
