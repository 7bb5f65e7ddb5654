export { MemoryClient, createMemoryClient, type MemoryClientOptions } from './api/client.js';
export { BatchSession, type BatchState } from './api/batch-session.js';
export {
  MemoryClientError,
  toMemoryClientError,
  zodErrorToMemoryClientError,
  type MemoryClientErrorCode,
} from './api/errors.js';
export * from './api/validators.js';
export type * from './api/events.js';

export {
  Opcode,
  ReplyStatus,
  SUPPORTED_WIDTHS,
  MAX_BATCH_COUNT,
  isSupportedWidth,
  opcodeFor,
  requestSize,
  replySize,
  batchReplySlot,
} from './protocol/opcodes.js';
export {
  encodeRead,
  encodeWrite,
  decodeValue,
  decodeCommand,
  type DecodedCommand,
} from './protocol/command-encoder.js';

export {
  BufferPool,
  ScratchLease,
  DEFAULT_MAX_BATCH_COMMANDS,
  requestCapacityFor,
  replyCapacityFor,
  type BufferPoolOptions,
  type BufferPoolStats,
} from './core/buffer-pool.js';
export { Mutex, type MutexGuard } from './core/async-mutex.js';
export { OwnedBuffer, FinalizedBatch, scratchView, type WireBuffer } from './core/wire-buffer.js';

export {
  SocketTransport,
  checkReplyStatus,
  type Transport,
  type SocketTransportOptions,
} from './bridge/socket-transport.js';
export {
  DEFAULT_SOCKET_PATH,
  DEFAULT_TCP_HOST,
  DEFAULT_TCP_PORT,
  resolveDefaultEndpoint,
  describeEndpoint,
} from './bridge/endpoint.js';

export {
  initializeConfig,
  getConfig,
  resetConfig,
  loadConfig,
  validateConfig,
  getDefaultEndpoint,
  type Config,
} from './config/loader.js';

export { resultify, unwrap, type ClientResult } from './utils/result-helpers.js';

export * from './types/index.js';
