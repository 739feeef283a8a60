/**
 * Runtime Configuration Schemas
 *
 * Zod schemas for validating runtime.yaml configuration, with cross-field
 * checks where one limit bounds another.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import { NonEmptyString, NonNegativeInteger, PositiveInteger, UnitInterval } from './common.js';

/**
 * Completion client (retry + timeout) configuration
 */
export const ClientConfigSchema = z
  .object({
    max_attempts: PositiveInteger,
    base_backoff_ms: NonNegativeInteger,
    max_backoff_ms: NonNegativeInteger,
    jitter_ratio: UnitInterval,
    request_timeout_ms: PositiveInteger,
    retry_transport_errors: z.boolean(),
  })
  .refine((data) => data.max_backoff_ms >= data.base_backoff_ms, {
    message: 'must be >= base_backoff_ms',
    path: ['max_backoff_ms'],
  });

/**
 * Response cache configuration
 */
export const CacheConfigSchema = z.object({
  max_entries: PositiveInteger,
  ttl_ms: NonNegativeInteger,
  persistence: z.object({
    enabled: z.boolean(),
    path: NonEmptyString,
  }),
});

export const ServiceConfigSchema = z.object({
  single_flight: z.boolean(),
});

export const TaskQueueConfigSchema = z.object({
  max_history: PositiveInteger,
  drain_timeout_ms: PositiveInteger,
});

export const IndexingConfigSchema = z
  .object({
    chunk_size: PositiveInteger,
    chunk_overlap: NonNegativeInteger,
    extensions: z.array(z.string().regex(/^\.[\w.-]+$/, 'must look like ".ts"')),
    max_file_bytes: PositiveInteger,
  })
  .refine((data) => data.chunk_overlap < data.chunk_size, {
    message: 'must be < chunk_size',
    path: ['chunk_overlap'],
  });

export const RefinementConfigSchema = z.object({
  max_iterations: PositiveInteger,
  improvement_threshold: UnitInterval,
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
});

/**
 * Complete runtime configuration
 */
export const RuntimeConfigSchema = z.object({
  client: ClientConfigSchema,
  cache: CacheConfigSchema,
  service: ServiceConfigSchema,
  task_queue: TaskQueueConfigSchema,
  indexing: IndexingConfigSchema,
  refinement: RefinementConfigSchema,
  logging: LoggingConfigSchema,
});

export type RuntimeConfigInput = z.input<typeof RuntimeConfigSchema>;
export type RuntimeConfig = z.output<typeof RuntimeConfigSchema>;
