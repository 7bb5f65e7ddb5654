/**
 * Wire protocol constants
 *
 * Every request starts with a one-byte opcode; every reply starts with a
 * one-byte status. Multi-byte fields are little-endian.
 *
 *   Read<w>   opcode(1) + address(4)             -> status(1) + value(w)
 *   Write<w>  opcode(1) + address(4) + value(w)  -> status(1)
 *   Multi     opcode(1) + count(2) + commands... -> status(1) + replies...
 */

export enum Opcode {
  Read8 = 0x00,
  Read16 = 0x01,
  Read32 = 0x02,
  Read64 = 0x03,
  Write8 = 0x04,
  Write16 = 0x05,
  Write32 = 0x06,
  Write64 = 0x07,
  MultiCommand = 0xff,
}

export enum ReplyStatus {
  Ok = 0x00,
  Fail = 0xff,
}

/**
 * Value widths in bytes supported by the protocol.
 */
export type Width = 1 | 2 | 4 | 8;

export const SUPPORTED_WIDTHS: readonly Width[] = [1, 2, 4, 8];

/**
 * JavaScript representation of a value of the given width.
 * 64-bit values do not fit a double, so they travel as bigint.
 */
export type ValueOf<W extends Width> = W extends 8 ? bigint : number;

export type CommandKind = 'read' | 'write';

/** opcode(1) + address(4) */
export const COMMAND_HEADER_SIZE = 5;

/** opcode(1) + count(2) */
export const BATCH_HEADER_SIZE = 3;

/** Offset of the 16-bit command count in a multi-command request. */
export const BATCH_COUNT_OFFSET = 1;

export const STATUS_SIZE = 1;

/** The count field is 16 bits wide. */
export const MAX_BATCH_COUNT = 0xffff;

export const MAX_ADDRESS = 0xffffffff;

export const MAX_WIDTH: Width = 8;

const READ_OPCODES: Record<Width, Opcode> = {
  1: Opcode.Read8,
  2: Opcode.Read16,
  4: Opcode.Read32,
  8: Opcode.Read64,
};

const WRITE_OPCODES: Record<Width, Opcode> = {
  1: Opcode.Write8,
  2: Opcode.Write16,
  4: Opcode.Write32,
  8: Opcode.Write64,
};

export function isSupportedWidth(width: number): width is Width {
  return width === 1 || width === 2 || width === 4 || width === 8;
}

export function opcodeFor(kind: CommandKind, width: Width): Opcode {
  return kind === 'read' ? READ_OPCODES[width] : WRITE_OPCODES[width];
}

/**
 * Bytes a command occupies in a request.
 */
export function requestSize(kind: CommandKind, width: Width): number {
  return kind === 'read' ? COMMAND_HEADER_SIZE : COMMAND_HEADER_SIZE + width;
}

/**
 * Bytes a standalone command's reply occupies (status included).
 */
export function replySize(kind: CommandKind, width: Width): number {
  return kind === 'read' ? STATUS_SIZE + width : STATUS_SIZE;
}

/**
 * Bytes a command reserves inside a multi-command reply. Reads reserve their
 * value width, writes one byte.
 */
export function batchReplySlot(kind: CommandKind, width: Width): number {
  return kind === 'read' ? width : 1;
}
