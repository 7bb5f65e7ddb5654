import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SocketTransport, checkReplyStatus } from '../../../src/bridge/socket-transport.js';
import { OwnedBuffer } from '../../../src/core/wire-buffer.js';
import { startFakeRelay, type FakeRelay } from '../../helpers/fake-relay.js';
import { silentLogger } from '../../helpers/test-client.js';

function read32Request(address: number): OwnedBuffer {
  const bytes = Uint8Array.from([0x02, address & 0xff, (address >>> 8) & 0xff, (address >>> 16) & 0xff, address >>> 24]);
  return OwnedBuffer.copyOf(bytes, bytes.length);
}

describe('checkReplyStatus', () => {
  it('rejects only the failure code', () => {
    const failed = checkReplyStatus(Uint8Array.from([0xff]));
    expect(failed.err && failed.val.code).toBe('RemoteRejected');
    expect(failed.err && failed.val.message).toBe('Relay reported failure status');
    expect(failed.err && failed.val.details).toEqual({ status: 0xff });
  });

  it.each([0x00, 0x01, 0x07, 0xfe])('accepts status byte %i', (status) => {
    expect(checkReplyStatus(Uint8Array.from([status, 0x2a])).ok).toBe(true);
  });
});

describe('SocketTransport', () => {
  let relay: FakeRelay;
  let transport: SocketTransport;

  beforeEach(async () => {
    relay = await startFakeRelay();
    transport = new SocketTransport({
      endpoint: { kind: 'tcp', host: '127.0.0.1', port: relay.port },
      logger: silentLogger,
    });
  });

  afterEach(async () => {
    await relay.close();
  });

  it('round-trips one request per connection', async () => {
    relay.memory.set(0x100, 0x44);
    relay.memory.set(0x101, 0x33);
    const reply = OwnedBuffer.alloc(5);

    const result = await transport.send(read32Request(0x100), reply);

    expect(result.ok).toBe(true);
    expect(Array.from(reply.bytes)).toEqual([0x00, 0x44, 0x33, 0x00, 0x00]);
    expect(Array.from(relay.requests[0] ?? [])).toEqual([0x02, 0x00, 0x01, 0x00, 0x00]);

    await transport.send(read32Request(0x100), OwnedBuffer.alloc(5));
    expect(relay.connections).toBe(2);
  });

  it('maps a failure status to RemoteRejected', async () => {
    relay.mode = 'reject';

    const result = await transport.send(read32Request(0x10), OwnedBuffer.alloc(5));

    expect(result.err && result.val.code).toBe('RemoteRejected');
  });

  it('reports Unknown when the connection drops after the request', async () => {
    relay.mode = 'drop';

    const result = await transport.send(read32Request(0x10), OwnedBuffer.alloc(5));

    expect(result.err && result.val.code).toBe('Unknown');
  });

  it('reports Unknown for a short reply', async () => {
    relay.mode = 'truncate';

    const result = await transport.send(read32Request(0x10), OwnedBuffer.alloc(5));

    expect(result.err).toBe(true);
    if (result.err) {
      expect(result.val.code).toBe('Unknown');
      expect(result.val.details).toMatchObject({ received: 2, expected: 5 });
    }
  });

  it('times out when the relay never answers', async () => {
    relay.mode = 'silent';

    const result = await transport.send(read32Request(0x10), OwnedBuffer.alloc(5), { timeoutMs: 100 });

    expect(result.err && result.val.code).toBe('Timeout');
    expect(result.err && result.val.details).toEqual({
      timeoutMs: 100,
      endpoint: `tcp://127.0.0.1:${relay.port}`,
    });
  });

  it('cancels through an abort signal', async () => {
    relay.mode = 'silent';
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 50);

    const result = await transport.send(read32Request(0x10), OwnedBuffer.alloc(5), {
      signal: controller.signal,
    });

    expect(result.err && result.val.code).toBe('Cancelled');
  });

  it('does not connect for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await transport.send(read32Request(0x10), OwnedBuffer.alloc(5), {
      signal: controller.signal,
    });

    expect(result.err && result.val.code).toBe('Cancelled');
    expect(relay.connections).toBe(0);
  });

  it('fails InvalidState when the reply is released mid-send', async () => {
    const reply = OwnedBuffer.alloc(5);

    const pending = transport.send(read32Request(0x10), reply);
    reply.release();
    const result = await pending;

    expect(result.err).toBe(true);
    if (result.err) {
      expect(result.val.code).toBe('InvalidState');
      expect(result.val.message).toBe('Reply buffer was released during send');
    }
    expect(reply.size).toBe(0);
  });

  it('validates buffers before connecting', async () => {
    const released = read32Request(0x10);
    released.release();

    const stale = await transport.send(released, OwnedBuffer.alloc(5));
    const noStatus = await transport.send(read32Request(0x10), { size: 0, bytes: new Uint8Array(0) });
    const oversized = await transport.send(read32Request(0x10), { size: 9, bytes: new Uint8Array(5) });

    expect(stale.err && stale.val.code).toBe('InvalidState');
    expect(noStatus.err && noStatus.val.code).toBe('InvalidParams');
    expect(oversized.err && oversized.val.code).toBe('InvalidParams');
    expect(relay.connections).toBe(0);
  });
});

describe('SocketTransport without a relay', () => {
  it('fails ConnectionFailed when nothing listens', async () => {
    const path = join(tmpdir(), `memrelay-missing-${process.pid}.sock`);
    const transport = new SocketTransport({ endpoint: { kind: 'unix', path }, logger: silentLogger });

    const result = await transport.send(read32Request(0x10), OwnedBuffer.alloc(5));

    expect(result.err).toBe(true);
    if (result.err) {
      expect(result.val.code).toBe('ConnectionFailed');
      expect(result.val.details).toMatchObject({ errno: 'ENOENT', endpoint: `unix:${path}` });
    }
  });
});
