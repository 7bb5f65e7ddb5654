import { pino } from 'pino';
import { Ok } from 'ts-results';
import type { Config } from '../../src/config/loader.js';
import type { Transport } from '../../src/bridge/socket-transport.js';
import { checkReplyStatus } from '../../src/bridge/socket-transport.js';
import type { WireBuffer } from '../../src/core/wire-buffer.js';
import type { ClientResult } from '../../src/utils/result-helpers.js';
import type { SendOptions } from '../../src/types/index.js';
import { MemoryClient, type MemoryClientOptions } from '../../src/api/client.js';

export const silentLogger = pino({ level: 'silent' });

export function testConfig(maxBatchCommands = 16): Config {
  return {
    buffer_pool: { max_batch_commands: maxBatchCommands },
    transport: {
      timeout_ms: 0,
      socket_path: '/tmp/memrelay-test.sock',
      tcp_host: '127.0.0.1',
      tcp_port: 28011,
      prefer_tcp: false,
    },
    logging: { level: 'silent' },
  };
}

export interface SentRequest {
  request: number[];
  replySize: number;
  options?: SendOptions;
}

type ReplyHandler = (
  request: Uint8Array,
  reply: Uint8Array
) => ClientResult<void> | Promise<ClientResult<void>>;

/**
 * Transport stand-in that records every request and lets the test fill
 * the reply. By default it answers with status 0x00 and zeroed values.
 */
export class RecordingTransport implements Transport {
  public readonly sent: SentRequest[] = [];
  public handler: ReplyHandler = (_request, reply) => {
    reply[0] = 0x00;
    return Ok.EMPTY;
  };

  async send(request: WireBuffer, reply: WireBuffer, options?: SendOptions): Promise<ClientResult<void>> {
    const requestBytes = request.bytes.subarray(0, request.size);
    this.sent.push({ request: Array.from(requestBytes), replySize: reply.size, options });
    return this.handler(requestBytes, reply.bytes.subarray(0, reply.size));
  }

  /**
   * Reply with the given bytes and check the status like the real transport.
   */
  replyWith(bytes: number[]): void {
    this.handler = (_request, reply) => {
      reply.set(bytes.slice(0, reply.length));
      return checkReplyStatus(reply);
    };
  }
}

export function createTestClient(
  options: MemoryClientOptions = {},
  transport: Transport = new RecordingTransport(),
  config: Config = testConfig()
): MemoryClient {
  return new MemoryClient(options, { transport, logger: silentLogger, config });
}

/**
 * Let pending promise callbacks and I/O callbacks run.
 */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Track whether a promise has settled without awaiting it.
 */
export function track<T>(promise: Promise<T>): { settled: () => boolean; promise: Promise<T> } {
  let done = false;
  const observed = promise.then(
    (value) => {
      done = true;
      return value;
    },
    (error: unknown) => {
      done = true;
      throw error;
    }
  );
  return { settled: () => done, promise: observed };
}
