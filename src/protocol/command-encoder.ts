/**
 * Command Encoder
 *
 * Writes single read/write commands into a caller-supplied byte region and
 * decodes little-endian values back out of replies. No I/O happens here.
 *
 *   Read:  [opcode:1][address:4 LE]
 *   Write: [opcode:1][address:4 LE][value:w LE]
 */

import { Ok, Err } from 'ts-results';
import {
  COMMAND_HEADER_SIZE,
  Opcode,
  isSupportedWidth,
  opcodeFor,
  requestSize,
  type CommandKind,
  type ValueOf,
  type Width,
} from './opcodes.js';
import { MemoryClientError, createInvalidWidthError } from '../api/errors.js';
import { checkAddress, checkValue } from '../api/validators.js';
import type { ClientResult } from '../utils/result-helpers.js';

/**
 * A command parsed back out of request bytes.
 */
export interface DecodedCommand {
  opcode: Opcode;
  kind: CommandKind;
  width: Width;
  address: number;
  value?: number | bigint;
  /** Bytes the command occupied. */
  size: number;
}

function checkRoom(target: Uint8Array, offset: number, size: number): ClientResult<void> {
  if (!Number.isInteger(offset) || offset < 0 || offset + size > target.length) {
    return Err(
      new MemoryClientError('InvalidParams', 'Target region too small for command', {
        offset,
        size,
        capacity: target.length,
      })
    );
  }
  return Ok.EMPTY;
}

export function writeUint32LE(target: Uint8Array, offset: number, value: number): void {
  target[offset] = value & 0xff;
  target[offset + 1] = (value >>> 8) & 0xff;
  target[offset + 2] = (value >>> 16) & 0xff;
  target[offset + 3] = (value >>> 24) & 0xff;
}

export function readUint32LE(source: Uint8Array, offset: number): number {
  return (
    (source[offset] |
      (source[offset + 1] << 8) |
      (source[offset + 2] << 16) |
      (source[offset + 3] << 24)) >>>
    0
  );
}

export function writeUint16LE(target: Uint8Array, offset: number, value: number): void {
  target[offset] = value & 0xff;
  target[offset + 1] = (value >>> 8) & 0xff;
}

export function readUint16LE(source: Uint8Array, offset: number): number {
  return source[offset] | (source[offset + 1] << 8);
}

/**
 * Write a value of the given width, little-endian, two's complement for
 * negative input. The value must already have been range-checked.
 */
function writeValue(target: Uint8Array, offset: number, value: number | bigint, width: Width): void {
  if (typeof value === 'bigint') {
    let remaining = BigInt.asUintN(64, value);
    for (let i = 0; i < width; i++) {
      target[offset + i] = Number(remaining & 0xffn);
      remaining >>= 8n;
    }
    return;
  }

  const unsigned = value < 0 ? value + 2 ** (width * 8) : value;
  for (let i = 0; i < width; i++) {
    target[offset + i] = (unsigned >>> (8 * i)) & 0xff;
  }
}

/**
 * Read an unsigned little-endian value of the given width.
 */
export function decodeValue<W extends Width>(source: Uint8Array, offset: number, width: W): ValueOf<W>;
export function decodeValue(source: Uint8Array, offset: number, width: Width): number | bigint {
  switch (width) {
    case 1:
      return source[offset];
    case 2:
      return readUint16LE(source, offset);
    case 4:
      return readUint32LE(source, offset);
    case 8: {
      const low = BigInt(readUint32LE(source, offset));
      const high = BigInt(readUint32LE(source, offset + 4));
      return (high << 32n) | low;
    }
  }
}

/**
 * Encode a read command at `offset`.
 *
 * @returns bytes written
 */
export function encodeRead(
  target: Uint8Array,
  offset: number,
  address: number,
  width: number
): ClientResult<number> {
  if (!isSupportedWidth(width)) {
    return Err(createInvalidWidthError(width));
  }
  const checkedAddress = checkAddress(address);
  if (checkedAddress.err) {
    return checkedAddress;
  }
  const room = checkRoom(target, offset, COMMAND_HEADER_SIZE);
  if (room.err) {
    return room;
  }

  target[offset] = opcodeFor('read', width);
  writeUint32LE(target, offset + 1, checkedAddress.val);
  return Ok(COMMAND_HEADER_SIZE);
}

/**
 * Encode a write command at `offset`.
 *
 * @returns bytes written
 */
export function encodeWrite(
  target: Uint8Array,
  offset: number,
  address: number,
  value: number | bigint,
  width: number
): ClientResult<number> {
  if (!isSupportedWidth(width)) {
    return Err(createInvalidWidthError(width));
  }
  const checkedAddress = checkAddress(address);
  if (checkedAddress.err) {
    return checkedAddress;
  }
  const checkedValue = checkValue(value, width);
  if (checkedValue.err) {
    return checkedValue;
  }
  const size = requestSize('write', width);
  const room = checkRoom(target, offset, size);
  if (room.err) {
    return room;
  }

  target[offset] = opcodeFor('write', width);
  writeUint32LE(target, offset + 1, checkedAddress.val);
  writeValue(target, offset + COMMAND_HEADER_SIZE, checkedValue.val, width);
  return Ok(size);
}

const OPCODE_TABLE: ReadonlyMap<number, { kind: CommandKind; width: Width }> = new Map<
  number,
  { kind: CommandKind; width: Width }
>([
  [Opcode.Read8, { kind: 'read', width: 1 }],
  [Opcode.Read16, { kind: 'read', width: 2 }],
  [Opcode.Read32, { kind: 'read', width: 4 }],
  [Opcode.Read64, { kind: 'read', width: 8 }],
  [Opcode.Write8, { kind: 'write', width: 1 }],
  [Opcode.Write16, { kind: 'write', width: 2 }],
  [Opcode.Write32, { kind: 'write', width: 4 }],
  [Opcode.Write64, { kind: 'write', width: 8 }],
]);

/**
 * Parse one single command back out of request bytes. Write values come back
 * unsigned.
 */
export function decodeCommand(source: Uint8Array, offset = 0): ClientResult<DecodedCommand> {
  const opcode = source[offset];
  const entry = opcode === undefined ? undefined : OPCODE_TABLE.get(opcode);
  if (opcode === undefined || entry === undefined) {
    return Err(
      new MemoryClientError('InvalidParams', `Unknown opcode at offset ${offset}`, {
        offset,
        opcode,
      })
    );
  }

  const size = requestSize(entry.kind, entry.width);
  if (offset + size > source.length) {
    return Err(
      new MemoryClientError('InvalidParams', 'Command truncated', {
        offset,
        size,
        available: source.length - offset,
      })
    );
  }

  const decoded: DecodedCommand = {
    opcode,
    kind: entry.kind,
    width: entry.width,
    address: readUint32LE(source, offset + 1),
    size,
  };
  if (entry.kind === 'write') {
    decoded.value = decodeValue(source, offset + COMMAND_HEADER_SIZE, entry.width);
  }
  return Ok(decoded);
}
