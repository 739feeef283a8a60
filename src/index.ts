export { Assistant, createAssistant, type AssistantOptions } from './api/assistant.js';
export {
  ResilientCompletionService,
  type CompletionServiceOptions,
  type CompletionServiceStats,
  type CompletionStream,
} from './api/completion-service.js';
export {
  CompletionError,
  RemoteError,
  classifyRemoteError,
  createTimeoutError,
  toCompletionError,
  zodErrorToCompletionError,
  type CompletionErrorCode,
  type CompletionErrorShape,
  type RemoteErrorKind,
} from './api/errors.js';
export * from './api/validators.js';
export type * from './api/events.js';

export {
  BackoffPolicy,
  DEFAULT_BACKOFF_CONFIG,
  type BackoffDecision,
  type BackoffPolicyConfig,
} from './core/backoff-policy.js';
export { computeFingerprint, type FingerprintParams } from './core/fingerprint.js';
export {
  ResponseCache,
  type CacheHit,
  type ResponseCacheConfig,
  type ResponseCacheStats,
} from './core/response-cache.js';
export { SingleFlight, type SingleFlightStats } from './core/single-flight.js';
export {
  CompletionClient,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  type CompletionClientConfig,
  type CompletionClientStats,
  type RetryAttemptContext,
} from './core/completion-client.js';
export { BackgroundTaskQueue, type TaskQueueConfig } from './core/task-queue.js';
export { PluginRegistry, type PluginRegistryConfig } from './core/plugin-registry.js';
export {
  refine,
  type CompletionFetcher,
  type RefinementOptions,
  type RefinementResult,
  type RefinementStep,
} from './core/refinement-loop.js';

export { splitText, DEFAULT_SPLIT_OPTIONS } from './indexing/text-splitter.js';
export { ChunkIndex, type ChunkIndexStats } from './indexing/chunk-index.js';
export { indexDirectory, type IndexDirectoryOptions } from './indexing/directory-indexer.js';

export { BUILTIN_PLUGINS, type PluginDeps } from './plugins/manifest.js';

export {
  loadConfig,
  validateConfig,
  initializeConfig,
  getConfig,
  resetConfig,
  toServiceOptions,
  type Config,
  type ServiceOptions,
} from './config/loader.js';
export { DEFAULT_CONFIG } from './config/defaults.js';
export { createLogger } from './utils/logger-helpers.js';

export * from './types/index.js';
