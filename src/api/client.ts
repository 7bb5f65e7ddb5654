import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type { MemoryClientEvents, RequestKind } from './events.js';
import { BatchSession } from './batch-session.js';
import {
  MemoryClientError,
  createInvalidStateError,
  createInvalidWidthError,
} from './errors.js';
import { validateClientOptions } from './validators.js';
import {
  STATUS_SIZE,
  isSupportedWidth,
  replySize,
  type CommandKind,
  type ValueOf,
  type Width,
} from '../protocol/opcodes.js';
import { decodeValue, encodeRead, encodeWrite } from '../protocol/command-encoder.js';
import { BufferPool, type BufferPoolStats } from '../core/buffer-pool.js';
import { Mutex } from '../core/async-mutex.js';
import { scratchView, type FinalizedBatch, type WireBuffer } from '../core/wire-buffer.js';
import { SocketTransport, type Transport } from '../bridge/socket-transport.js';
import { describeEndpoint, type Endpoint } from '../bridge/endpoint.js';
import { getConfig, getDefaultEndpoint, type Config } from '../config/loader.js';
import { createLogger, lazyLog } from '../utils/logger-helpers.js';
import { unwrap, type ClientResult } from '../utils/result-helpers.js';
import type {
  ClientStats,
  LogLevel,
  OperationStatus,
  SendOptions,
} from '../types/index.js';

export interface MemoryClientOptions {
  /** Relay endpoint. Defaults to the platform endpoint from configuration. */
  endpoint?: Endpoint;
  /** Largest batch this client can build. Sizes the scratch buffers. */
  maxBatchCommands?: number;
  /** Per-send timeout in milliseconds. 0 disables. */
  timeoutMs?: number;
  logLevel?: LogLevel;
}

interface MemoryClientDependencies {
  transport?: Transport;
  logger?: Logger;
  config?: Config;
}

/**
 * Client for the memory relay protocol.
 *
 * Single reads and writes take the buffer lock for encode, send and decode.
 * A batch session holds the batch lock and the buffer lock until it is
 * finalized or aborted, so single commands issued meanwhile wait for it.
 *
 * @example
 * ```typescript
 * const client = createMemoryClient();
 * const hp = await client.read32(0x00347d34);
 *
 * const batch = await client.initializeBatch();
 * batch.write8(0x1000, 0x7f);
 * const slot = batch.read32(0x2000);
 * const message = client.finalizeBatch();
 * await client.sendBatch(message);
 * console.log(message.valueAt(slot, 4));
 * message.release();
 * ```
 */
export class MemoryClient extends EventEmitter<MemoryClientEvents> {
  public readonly endpoint: Endpoint;
  private readonly logger: Logger;
  private readonly transport: Transport;
  private readonly pool: BufferPool;
  private readonly batchLock = new Mutex('batch');
  private readonly timeoutMs: number;

  private currentBatch: BatchSession | null = null;
  private lastStatus: OperationStatus = 'Unknown';
  private closed = false;
  private readonly stats: ClientStats = {
    commandsSent: 0,
    batchesFinalized: 0,
    batchesSent: 0,
    failures: 0,
  };

  /**
   * @param options - Endpoint, capacity and timeout overrides.
   * @param dependencies - Optional test hooks allowing a custom transport, logger or config.
   * @throws {MemoryClientError} InvalidParams when an option is malformed.
   */
  constructor(options: MemoryClientOptions = {}, dependencies: MemoryClientDependencies = {}) {
    super();
    const validated = validateClientOptions(options);
    const config = dependencies.config ?? getConfig();

    this.logger = dependencies.logger ?? createLogger(validated.logLevel ?? config.logging.level);
    this.endpoint = validated.endpoint ?? getDefaultEndpoint(config);
    this.timeoutMs = validated.timeoutMs ?? config.transport.timeout_ms;
    this.pool = new BufferPool({
      maxBatchCommands: validated.maxBatchCommands ?? config.buffer_pool.max_batch_commands,
      logger: this.logger,
    });
    this.transport =
      dependencies.transport ??
      new SocketTransport({
        endpoint: this.endpoint,
        defaultTimeoutMs: this.timeoutMs,
        logger: this.logger,
      });

    lazyLog(
      this.logger,
      'debug',
      () => ({
        endpoint: describeEndpoint(this.endpoint),
        maxBatchCommands: this.pool.maxBatchCommands,
        timeoutMs: this.timeoutMs,
      }),
      'Memory client created'
    );
  }

  get maxBatchCommands(): number {
    return this.pool.maxBatchCommands;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * The batch session currently open on this client, if any.
   */
  get activeBatch(): BatchSession | null {
    return this.currentBatch;
  }

  /**
   * Read a value of `width` bytes. Widths other than 1, 2, 4 and 8 reject
   * with InvalidWidth before any lock is taken.
   */
  public read<W extends Width>(address: number, width: W, options?: SendOptions): Promise<ValueOf<W>>;
  public read(address: number, width: number, options?: SendOptions): Promise<number | bigint>;
  public async read(address: number, width: number, options: SendOptions = {}): Promise<number | bigint> {
    const checked = this.checkCommand(width);
    return this.execute(
      'read',
      checked,
      (request) => encodeRead(request, 0, address, checked),
      (reply) => decodeValue(reply, STATUS_SIZE, checked),
      options
    );
  }

  /**
   * Write a value of `width` bytes. 64-bit values must be bigints.
   */
  public async write(
    address: number,
    value: number | bigint,
    width: number,
    options: SendOptions = {}
  ): Promise<void> {
    const checked = this.checkCommand(width);
    await this.execute(
      'write',
      checked,
      (request) => encodeWrite(request, 0, address, value, checked),
      () => undefined,
      options
    );
  }

  public read8(address: number, options?: SendOptions): Promise<number> {
    return this.read(address, 1, options);
  }

  public read16(address: number, options?: SendOptions): Promise<number> {
    return this.read(address, 2, options);
  }

  public read32(address: number, options?: SendOptions): Promise<number> {
    return this.read(address, 4, options);
  }

  public read64(address: number, options?: SendOptions): Promise<bigint> {
    return this.read(address, 8, options);
  }

  public write8(address: number, value: number, options?: SendOptions): Promise<void> {
    return this.write(address, value, 1, options);
  }

  public write16(address: number, value: number, options?: SendOptions): Promise<void> {
    return this.write(address, value, 2, options);
  }

  public write32(address: number, value: number, options?: SendOptions): Promise<void> {
    return this.write(address, value, 4, options);
  }

  public write64(address: number, value: bigint, options?: SendOptions): Promise<void> {
    return this.write(address, value, 8, options);
  }

  /**
   * Open a batch session. Waits until any earlier batch is finalized and any
   * in-flight single command has finished.
   */
  public async initializeBatch(signal?: AbortSignal): Promise<BatchSession> {
    this.assertOpen();
    const batchGuard = await this.batchLock.acquire(signal);
    const leased = await this.pool.acquire(signal);
    if (leased.err) {
      batchGuard.release();
      throw leased.val;
    }

    const session = new BatchSession({
      lease: leased.val,
      batchGuard,
      capacity: this.pool.maxBatchCommands,
      logger: this.logger,
      onFinalize: (batch) => {
        this.currentBatch = null;
        this.stats.batchesFinalized++;
        this.emit('batch:finalized', {
          commandCount: batch.commandCount,
          requestBytes: batch.request.size,
          replyBytes: batch.reply.size,
          timestamp: Date.now(),
        });
      },
      onAbort: (commandCount) => {
        this.currentBatch = null;
        this.emit('batch:aborted', { commandCount, timestamp: Date.now() });
      },
    });
    this.currentBatch = session;
    this.emit('batch:opened', { capacity: session.capacity, timestamp: Date.now() });
    return session;
  }

  /**
   * Finalize the batch session open on this client.
   *
   * @throws {MemoryClientError} InvalidState when no batch is open
   */
  public finalizeBatch(): FinalizedBatch {
    const session = this.currentBatch;
    if (!session) {
      throw createInvalidStateError('No batch is open on this client');
    }
    return session.finalize();
  }

  /**
   * Send a request and receive its reply through the transport.
   *
   * @throws {MemoryClientError} on connection, I/O or remote failure
   */
  public async send(request: WireBuffer, reply: WireBuffer, options: SendOptions = {}): Promise<void> {
    this.assertOpen();
    const result = await this.transmit('raw', request, reply, options);
    unwrap(result);
  }

  /**
   * Send a finalized batch and fill its reply buffer.
   */
  public async sendBatch(batch: FinalizedBatch, options: SendOptions = {}): Promise<FinalizedBatch> {
    this.assertOpen();
    if (batch.released) {
      throw createInvalidStateError('Batch buffers have been released');
    }
    const result = await this.transmit('batch', batch.request, batch.reply, options);
    unwrap(result);
    this.stats.batchesSent++;
    return batch;
  }

  /**
   * Outcome of the last send that went through this client.
   */
  public getLastStatus(): OperationStatus {
    return this.lastStatus;
  }

  public getStats(): ClientStats & { pool: BufferPoolStats } {
    return { ...this.stats, pool: this.pool.getStats() };
  }

  /**
   * Release the scratch buffers. Every later call fails with InvalidState.
   *
   * @throws {MemoryClientError} InvalidState while a batch or command is in progress
   */
  public close(): void {
    if (this.closed) {
      return;
    }
    if (this.currentBatch) {
      throw createInvalidStateError('Cannot close client while a batch is open');
    }
    unwrap(this.pool.close());
    this.closed = true;
    lazyLog(this.logger, 'debug', () => ({ ...this.stats }), 'Memory client closed');
  }

  private checkCommand(width: number): Width {
    this.assertOpen();
    if (!isSupportedWidth(width)) {
      throw createInvalidWidthError(width);
    }
    return width;
  }

  private async execute<T>(
    kind: CommandKind,
    width: Width,
    encode: (request: Uint8Array) => ClientResult<number>,
    decode: (reply: Uint8Array) => T,
    options: SendOptions
  ): Promise<T> {
    const lease = unwrap(await this.pool.acquire(options.signal));
    try {
      const encoded = unwrap(encode(lease.request));
      const result = await this.transmit(
        kind,
        scratchView(lease.request, encoded),
        scratchView(lease.reply, replySize(kind, width)),
        options
      );
      unwrap(result);
      this.stats.commandsSent++;
      return decode(lease.reply);
    } finally {
      lease.release();
    }
  }

  private async transmit(
    kind: RequestKind,
    request: WireBuffer,
    reply: WireBuffer,
    options: SendOptions
  ): Promise<ClientResult<void>> {
    const started = Date.now();
    const result = await this.transport.send(request, reply, {
      timeoutMs: options.timeoutMs ?? this.timeoutMs,
      signal: options.signal,
    });
    const durationMs = Date.now() - started;

    if (result.ok) {
      this.lastStatus = 'Success';
      this.emit('request:completed', {
        kind,
        requestBytes: request.size,
        replyBytes: reply.size,
        durationMs,
        timestamp: Date.now(),
      });
      return result;
    }

    const error: MemoryClientError = result.val;
    if (error.code !== 'InvalidState' && error.code !== 'InvalidParams') {
      this.lastStatus = error.code === 'Unknown' ? 'Unknown' : 'Fail';
      this.stats.failures++;
    }
    this.emit('request:failed', {
      kind,
      error: error.toObject(),
      durationMs,
      timestamp: Date.now(),
    });
    return result;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw createInvalidStateError('Memory client has been closed');
    }
  }
}

/**
 * Convenience factory for creating a client.
 */
export function createMemoryClient(options: MemoryClientOptions = {}): MemoryClient {
  return new MemoryClient(options);
}
