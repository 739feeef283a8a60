/**
 * Assistant façade
 *
 * Wires the completion service, background task queue, plugin registry and
 * chunk index from one configuration. This is the surface a command layer
 * talks to.
 *
 * @example
 * ```typescript
 * const assistant = createAssistant({ remote: myProvider });
 * await assistant.start();
 *
 * const { text } = await assistant.getCompletion('Summarise this file', [{ content: source }]);
 * const handle = assistant.submitIndexingTask('./src');
 *
 * await assistant.shutdown();
 * ```
 */

import type { Logger } from 'pino';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { toServiceOptions, type Config, type ServiceOptions } from '../config/loader.js';
import { BackoffPolicy } from '../core/backoff-policy.js';
import { CompletionClient } from '../core/completion-client.js';
import { PluginRegistry } from '../core/plugin-registry.js';
import { ResponseCache } from '../core/response-cache.js';
import { BackgroundTaskQueue } from '../core/task-queue.js';
import { ChunkIndex } from '../indexing/chunk-index.js';
import { indexDirectory } from '../indexing/directory-indexer.js';
import { BUILTIN_PLUGINS, type PluginDeps } from '../plugins/manifest.js';
import type {
  AssistantPlugin,
  CompletionCallOptions,
  CompletionContext,
  CompletionResult,
  IndexSearchHit,
  PluginManifestEntry,
  PluginPreloadReport,
  RemoteCompletionProvider,
  ServiceMode,
  TaskHandle,
} from '../types/index.js';
import type { Sleeper } from '../utils/abort.js';
import { createLogger } from '../utils/logger-helpers.js';
import { ResilientCompletionService, type CompletionStream } from './completion-service.js';

export interface AssistantOptions {
  remote: RemoteCompletionProvider;

  /** Validated configuration (default: built-in defaults) */
  config?: Config;

  /** Default: pino at config.logging.level */
  logger?: Logger;

  /** Plugin manifest (default: built-in plugins) */
  plugins?: readonly PluginManifestEntry<PluginDeps>[];

  /** Backoff delay implementation, mainly for tests */
  sleep?: Sleeper;
}

export class Assistant {
  public readonly service: ResilientCompletionService;
  public readonly tasks: BackgroundTaskQueue;
  public readonly plugins: PluginRegistry<PluginDeps>;
  public readonly index: ChunkIndex;

  private readonly cache: ResponseCache;
  private readonly options: ServiceOptions;
  private readonly logger: Logger;

  constructor(options: AssistantOptions) {
    this.options = toServiceOptions(options.config ?? DEFAULT_CONFIG);
    this.logger = options.logger ?? createLogger(this.options.logLevel);

    this.cache = new ResponseCache({
      ...this.options.cache,
      logger: this.logger.child({ component: 'cache' }),
    });

    const client = new CompletionClient({
      provider: options.remote,
      maxAttempts: this.options.client.maxAttempts,
      requestTimeoutMs: this.options.client.requestTimeoutMs,
      backoff: new BackoffPolicy(this.options.client.backoff),
      sleep: options.sleep,
      logger: this.logger.child({ component: 'client' }),
    });

    this.service = new ResilientCompletionService({
      client,
      cache: this.cache,
      singleFlight: this.options.singleFlight,
      logger: this.logger.child({ component: 'service' }),
    });

    this.tasks = new BackgroundTaskQueue({
      ...this.options.taskQueue,
      logger: this.logger.child({ component: 'tasks' }),
    });

    this.index = new ChunkIndex(this.logger.child({ component: 'index' }));

    this.plugins = new PluginRegistry<PluginDeps>({
      manifest: options.plugins ?? BUILTIN_PLUGINS,
      deps: { service: this.service, refinement: this.options.refinement },
      logger: this.logger.child({ component: 'plugins' }),
    });
  }

  /**
   * Load the persisted cache (when enabled) and preload plugins.
   */
  public async start(): Promise<PluginPreloadReport> {
    const restored = this.cache.load();
    const report = await this.plugins.preload();
    this.logger.info(
      { restoredCacheEntries: restored, plugins: report.successful, pluginFailures: report.failed },
      'Assistant started'
    );
    return report;
  }

  public getCompletion(
    prompt: string,
    context?: CompletionContext,
    options?: CompletionCallOptions
  ): Promise<CompletionResult> {
    return this.service.getCompletion(prompt, context, options);
  }

  public streamCompletion(
    prompt: string,
    context?: CompletionContext,
    options?: CompletionCallOptions
  ): Promise<CompletionStream> {
    return this.service.streamCompletion(prompt, context, options);
  }

  /**
   * Queue indexing of `directory`. Returns before any file is read.
   */
  public submitIndexingTask(directory: string): TaskHandle {
    const logger = this.logger.child({ component: 'indexer' });
    return this.tasks.submit(
      `index:${directory}`,
      (signal, dir: string) =>
        indexDirectory(dir, this.index, { ...this.options.indexing, signal, logger }),
      directory
    );
  }

  public searchIndex(query: string, limit?: number): IndexSearchHit[] {
    return this.index.search(query, limit);
  }

  public getPlugin(name: string): AssistantPlugin | undefined {
    return this.plugins.get(name);
  }

  public getMode(): ServiceMode {
    return this.service.getMode();
  }

  public goOnline(): boolean {
    return this.service.goOnline();
  }

  /**
   * Stop the task queue, then persist the cache (when enabled).
   */
  public async shutdown(): Promise<void> {
    await this.tasks.shutdown();
    const saved = this.cache.save();
    this.logger.info({ cacheSaved: saved }, 'Assistant shut down');
  }
}

export function createAssistant(options: AssistantOptions): Assistant {
  return new Assistant(options);
}
