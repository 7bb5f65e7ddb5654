/**
 * Socket Transport
 *
 * Sends one request and receives one reply per connection:
 * - connect to the relay endpoint (Unix socket or loopback TCP)
 * - write the whole request
 * - read until exactly `reply.size` bytes have arrived
 * - close, then check the leading status byte
 *
 * Nothing is retried. A send that fails after the request went out is
 * reported as Unknown, since the relay may already have applied it.
 */

import { createConnection, type Socket } from 'node:net';
import type { Logger } from 'pino';
import { Ok, Err } from 'ts-results';
import { ReplyStatus } from '../protocol/opcodes.js';
import type { WireBuffer } from '../core/wire-buffer.js';
import {
  MemoryClientError,
  createInvalidStateError,
  createTimeoutError,
} from '../api/errors.js';
import { describeEndpoint, type Endpoint } from './endpoint.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { TimerGuard } from '../utils/timer-guard.js';
import type { ClientResult } from '../utils/result-helpers.js';
import type { SendOptions } from '../types/index.js';

export interface Transport {
  send(request: WireBuffer, reply: WireBuffer, options?: SendOptions): Promise<ClientResult<void>>;
}

export interface SocketTransportOptions {
  endpoint: Endpoint;
  /** 0 disables. */
  defaultTimeoutMs?: number;
  logger?: Logger;
}

type Phase = 'connecting' | 'writing' | 'reading';

/**
 * Inspect the status byte at the start of a reply. Only the failure code
 * rejects; any other leading byte counts as success.
 */
export function checkReplyStatus(reply: Uint8Array): ClientResult<void> {
  const status = reply[0];
  if (status !== ReplyStatus.Fail) {
    return Ok.EMPTY;
  }
  return Err(new MemoryClientError('RemoteRejected', 'Relay reported failure status', { status }));
}

export class SocketTransport implements Transport {
  public readonly endpoint: Endpoint;
  private readonly defaultTimeoutMs: number;
  private readonly logger?: Logger;
  private readonly label: string;

  constructor(options: SocketTransportOptions) {
    this.endpoint = options.endpoint;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 0;
    this.logger = options.logger;
    this.label = describeEndpoint(options.endpoint);
  }

  async send(
    request: WireBuffer,
    reply: WireBuffer,
    options: SendOptions = {}
  ): Promise<ClientResult<void>> {
    if (request.released || reply.released) {
      return Err(createInvalidStateError('Cannot send through a released buffer'));
    }
    if (request.size < 1 || request.size > request.bytes.length) {
      return Err(
        new MemoryClientError('InvalidParams', 'Request size does not match its buffer', {
          size: request.size,
          capacity: request.bytes.length,
        })
      );
    }
    if (reply.size < 1 || reply.size > reply.bytes.length) {
      return Err(
        new MemoryClientError('InvalidParams', 'Reply size must cover at least the status byte', {
          size: reply.size,
          capacity: reply.bytes.length,
        })
      );
    }

    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;

    lazyLog(
      this.logger,
      'debug',
      () => ({ endpoint: this.label, requestBytes: request.size, replyBytes: reply.size }),
      'Sending request'
    );

    const exchanged = await this.exchange(request, reply, timeoutMs, options.signal);
    const outcome = exchanged.ok ? checkReplyStatus(reply.bytes) : exchanged;

    if (outcome.err) {
      lazyLog(
        this.logger,
        'warn',
        () => ({ endpoint: this.label, code: outcome.val.code, details: outcome.val.details }),
        outcome.val.message
      );
    }
    return outcome;
  }

  private connect(): Socket {
    return this.endpoint.kind === 'unix'
      ? createConnection({ path: this.endpoint.path })
      : createConnection({ host: this.endpoint.host, port: this.endpoint.port });
  }

  private exchange(
    request: WireBuffer,
    reply: WireBuffer,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<ClientResult<void>> {
    return new Promise((resolve) => {
      if (signal?.aborted) {
        resolve(Err(new MemoryClientError('Cancelled', 'Send aborted by caller')));
        return;
      }

      const socket = this.connect();
      const timer = new TimerGuard('send-timeout');
      let phase: Phase = 'connecting';
      let received = 0;
      let settled = false;

      const finish = (result: ClientResult<void>): void => {
        if (settled) {
          return;
        }
        settled = true;
        timer.clear();
        signal?.removeEventListener('abort', onAbort);
        socket.destroy();
        resolve(result);
      };

      const failure = (reason: string, errno?: string): MemoryClientError => {
        const details: Record<string, unknown> = {
          endpoint: this.label,
          received,
          expected: reply.size,
        };
        if (errno !== undefined) {
          details.errno = errno;
        }
        switch (phase) {
          case 'connecting':
            return new MemoryClientError('ConnectionFailed', `Cannot reach relay at ${this.label}: ${reason}`, details);
          case 'writing':
            return new MemoryClientError('IOFailed', `Request write failed: ${reason}`, details);
          case 'reading':
            return new MemoryClientError(
              'Unknown',
              `Connection lost after ${received} of ${reply.size} reply bytes: ${reason}`,
              details
            );
        }
      };

      const onAbort = (): void => {
        finish(Err(new MemoryClientError('Cancelled', 'Send aborted by caller', { phase })));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      if (timeoutMs > 0) {
        timer.set(() => finish(Err(createTimeoutError(timeoutMs, this.label))), timeoutMs);
      }

      socket.once('connect', () => {
        phase = 'writing';
        socket.write(request.bytes.subarray(0, request.size), (error) => {
          if (error) {
            finish(Err(failure(error.message)));
            return;
          }
          phase = 'reading';
        });
      });

      socket.on('data', (chunk: Buffer) => {
        phase = 'reading';
        if (reply.released) {
          finish(Err(createInvalidStateError('Reply buffer was released during send')));
          return;
        }
        const take = Math.min(reply.size - received, chunk.length);
        reply.bytes.set(chunk.subarray(0, take), received);
        received += take;
        if (received >= reply.size) {
          finish(Ok.EMPTY);
        }
      });

      // A relay that rejects a request may close right after the status byte.
      const rejectedEarly = (): boolean =>
        phase === 'reading' && received > 0 && reply.bytes[0] === ReplyStatus.Fail;

      socket.on('error', (error: NodeJS.ErrnoException) => {
        finish(rejectedEarly() ? checkReplyStatus(reply.bytes) : Err(failure(error.message, error.code)));
      });

      socket.on('close', () => {
        finish(rejectedEarly() ? checkReplyStatus(reply.bytes) : Err(failure('connection closed')));
      });
    });
  }
}
