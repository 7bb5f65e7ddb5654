/**
 * Client Event System
 *
 * Defines event types and payloads for the MemoryClient class.
 */

import type { MemoryClientErrorShape } from '../types/index.js';

export type RequestKind = 'read' | 'write' | 'batch' | 'raw';

/**
 * Event payload when a batch session is opened
 */
export interface BatchOpenedEvent {
  capacity: number;
  timestamp: number;
}

/**
 * Event payload when a batch is finalized into owned buffers
 */
export interface BatchFinalizedEvent {
  commandCount: number;
  requestBytes: number;
  replyBytes: number;
  timestamp: number;
}

export interface BatchAbortedEvent {
  commandCount: number;
  timestamp: number;
}

/**
 * Event payload when a request round trip succeeds
 */
export interface RequestCompletedEvent {
  kind: RequestKind;
  requestBytes: number;
  replyBytes: number;
  durationMs: number;
  timestamp: number;
}

/**
 * Event payload when a request round trip fails
 */
export interface RequestFailedEvent {
  kind: RequestKind;
  error: MemoryClientErrorShape;
  durationMs: number;
  timestamp: number;
}

/**
 * MemoryClient event map
 */
export interface MemoryClientEvents {
  'batch:opened': (event: BatchOpenedEvent) => void;
  'batch:finalized': (event: BatchFinalizedEvent) => void;
  'batch:aborted': (event: BatchAbortedEvent) => void;
  'request:completed': (event: RequestCompletedEvent) => void;
  'request:failed': (event: RequestFailedEvent) => void;
}
