/**
 * MemoryClient option schemas
 *
 * @module schemas/client
 */

import { z } from 'zod';
import { MAX_BATCH_COUNT } from '../../protocol/opcodes.js';
import { LogLevelSchema } from './config.js';

export const UnixEndpointSchema = z.object({
  kind: z.literal('unix'),
  path: z.string().min(1, 'Socket path cannot be empty'),
});

export const TcpEndpointSchema = z.object({
  kind: z.literal('tcp'),
  host: z.string().min(1, 'Host cannot be empty'),
  port: z.number().int().min(0).max(65535),
});

export const EndpointSchema = z.discriminatedUnion('kind', [UnixEndpointSchema, TcpEndpointSchema]);

export const MemoryClientOptionsSchema = z.object({
  endpoint: EndpointSchema.optional(),
  maxBatchCommands: z
    .number()
    .int()
    .min(1, 'must be >= 1')
    .max(MAX_BATCH_COUNT, `must be <= ${MAX_BATCH_COUNT}`)
    .optional(),
  timeoutMs: z.number().int().min(0, 'must be >= 0').optional(),
  logLevel: LogLevelSchema.optional(),
});

export type MemoryClientOptionsInput = z.infer<typeof MemoryClientOptionsSchema>;
