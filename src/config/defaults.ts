/**
 * Default Configuration
 *
 * In-code equivalent of the base section of config/runtime.yaml, used when
 * a caller builds components without loading a file.
 */

import type { Config } from './loader.js';

export const DEFAULT_CONFIG: Config = {
  client: {
    max_attempts: 5,
    base_backoff_ms: 500,
    max_backoff_ms: 30_000, // 30 seconds
    jitter_ratio: 0.5,
    request_timeout_ms: 30_000,
    retry_transport_errors: true,
  },
  cache: {
    max_entries: 512,
    ttl_ms: 0,
    persistence: {
      enabled: false,
      path: '.completion-relay/cache.json',
    },
  },
  service: {
    single_flight: false,
  },
  task_queue: {
    max_history: 100,
    drain_timeout_ms: 30_000,
  },
  indexing: {
    chunk_size: 1000,
    chunk_overlap: 200,
    extensions: ['.ts', '.tsx', '.js', '.jsx', '.mjs', '.py', '.go', '.rs', '.java', '.md', '.txt', '.json', '.yaml', '.yml'],
    max_file_bytes: 1_000_000, // 1MB
  },
  refinement: {
    max_iterations: 5,
    improvement_threshold: 0.1,
  },
  logging: {
    level: 'info',
  },
};
