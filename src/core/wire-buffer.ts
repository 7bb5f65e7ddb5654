/**
 * Wire buffers
 *
 * A WireBuffer is a sized byte region handed to the transport. Scratch
 * buffers are views into the client's BufferPool and are only valid while
 * the buffer lock is held. Owned buffers are independent copies whose
 * lifetime the holder controls through release().
 */

import { Ok, Err } from 'ts-results';
import { isSupportedWidth, type ValueOf, type Width } from '../protocol/opcodes.js';
import { decodeValue } from '../protocol/command-encoder.js';
import { createInvalidStateError, createInvalidWidthError, MemoryClientError } from '../api/errors.js';
import type { ClientResult } from '../utils/result-helpers.js';

export interface WireBuffer {
  readonly size: number;
  readonly bytes: Uint8Array;
  readonly released?: boolean;
}

/**
 * Borrowed view of `size` bytes at the start of a scratch region.
 */
export function scratchView(region: Uint8Array, size: number): WireBuffer {
  return { size, bytes: region.subarray(0, size) };
}

export class OwnedBuffer implements WireBuffer {
  private data: Uint8Array;
  private isReleased = false;

  private constructor(data: Uint8Array) {
    this.data = data;
  }

  /**
   * Copy the first `size` bytes of `source` into a new owned buffer.
   */
  static copyOf(source: Uint8Array, size: number): OwnedBuffer {
    return new OwnedBuffer(source.slice(0, size));
  }

  static alloc(size: number): OwnedBuffer {
    return new OwnedBuffer(new Uint8Array(size));
  }

  get size(): number {
    return this.data.length;
  }

  get bytes(): Uint8Array {
    return this.data;
  }

  get released(): boolean {
    return this.isReleased;
  }

  /**
   * Zero and drop the backing memory. Idempotent.
   */
  release(): void {
    if (this.isReleased) {
      return;
    }
    this.data.fill(0);
    this.data = new Uint8Array(0);
    this.isReleased = true;
  }
}

/**
 * Finalized multi-command message, owned entirely by the caller.
 *
 * Send `request`, receive into `reply`, then decode each command's value
 * from `replyOffsets`.
 */
export class FinalizedBatch {
  public readonly request: OwnedBuffer;
  public readonly reply: OwnedBuffer;
  public readonly replyOffsets: readonly number[];

  constructor(request: OwnedBuffer, reply: OwnedBuffer, replyOffsets: readonly number[]) {
    this.request = request;
    this.reply = reply;
    this.replyOffsets = replyOffsets;
  }

  get commandCount(): number {
    return this.replyOffsets.length;
  }

  get released(): boolean {
    return this.request.released || this.reply.released;
  }

  /**
   * Decode the value read by command `index` once the reply has been received.
   */
  tryValueAt<W extends Width>(index: number, width: W): ClientResult<ValueOf<W>>;
  tryValueAt(index: number, width: number): ClientResult<number | bigint>;
  tryValueAt(index: number, width: number): ClientResult<number | bigint> {
    if (!isSupportedWidth(width)) {
      return Err(createInvalidWidthError(width));
    }
    if (this.reply.released) {
      return Err(createInvalidStateError('Batch reply buffer has been released'));
    }
    const offset = this.replyOffsets[index];
    if (!Number.isInteger(index) || offset === undefined) {
      return Err(
        new MemoryClientError('InvalidParams', `No command at index ${index}`, {
          index,
          commandCount: this.commandCount,
        })
      );
    }
    if (offset + width > this.reply.size) {
      return Err(
        new MemoryClientError('InvalidParams', `Command ${index} has no ${width}-byte value in the reply`, {
          index,
          offset,
          width,
          replySize: this.reply.size,
        })
      );
    }
    return Ok(decodeValue(this.reply.bytes, offset, width));
  }

  /**
   * @throws {MemoryClientError} when the index, width or buffer state is invalid
   */
  valueAt<W extends Width>(index: number, width: W): ValueOf<W> {
    const result = this.tryValueAt(index, width);
    if (result.err) {
      throw result.val;
    }
    return result.val;
  }

  release(): void {
    this.request.release();
    this.reply.release();
  }
}
