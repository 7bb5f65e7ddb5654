/**
 * Client Configuration Schemas
 *
 * Zod schemas for validating config/client.yaml.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import { MAX_BATCH_COUNT } from '../../protocol/opcodes.js';

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

/**
 * Buffer Pool Configuration
 */
export const BufferPoolConfigSchema = z.object({
  max_batch_commands: z
    .number()
    .int()
    .min(1, 'must be >= 1')
    .max(MAX_BATCH_COUNT, `must be <= ${MAX_BATCH_COUNT} (16-bit count field)`),
});

/**
 * Transport Configuration
 */
export const TransportConfigSchema = z.object({
  timeout_ms: z.number().int().min(0, 'must be >= 0'),
  socket_path: z.string().min(1, 'Socket path cannot be empty'),
  tcp_host: z.string().min(1, 'TCP host cannot be empty'),
  tcp_port: z.number().int().min(1, 'must be >= 1').max(65535, 'must be <= 65535'),
  prefer_tcp: z.boolean(),
});

/**
 * Logging Configuration
 */
export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
});

export const ClientConfigSchema = z.object({
  buffer_pool: BufferPoolConfigSchema,
  transport: TransportConfigSchema,
  logging: LoggingConfigSchema,
});

export type ClientConfigInput = z.infer<typeof ClientConfigSchema>;
