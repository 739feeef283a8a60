/**
 * Resilient Completion Service
 *
 * Single entry point callers use to obtain completions. Composes the response
 * cache, the completion client and an ONLINE/OFFLINE mode flag owned by this
 * instance (one instance per logical session).
 *
 * Flow for getCompletion():
 * 1. Fingerprint prompt + context.
 * 2. ONLINE: cache hit → return; miss → client → cache → return.
 *    RetriesExhausted flips the mode to OFFLINE and falls through.
 * 3. OFFLINE: cache hit → return marked stale; miss → NoOfflineFallback.
 *
 * The mode only moves ONLINE → OFFLINE on its own. Going back requires an
 * explicit goOnline(): probing would spend the retry budget that going
 * offline exists to save.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { CompletionError, toCompletionError } from './errors.js';
import type { CompletionServiceEvents } from './events.js';
import { assertValidCompletionRequest, normalizeContext } from './validators.js';
import type { CompletionClient, CompletionClientStats } from '../core/completion-client.js';
import { computeFingerprint } from '../core/fingerprint.js';
import type { ResponseCache, ResponseCacheStats } from '../core/response-cache.js';
import { SingleFlight, type SingleFlightStats } from '../core/single-flight.js';
import type {
  CompletionCallOptions,
  CompletionContext,
  CompletionResult,
  CompletionSource,
  ServiceMode,
} from '../types/index.js';

export interface CompletionServiceOptions {
  client: CompletionClient;
  cache: ResponseCache;

  /**
   * Share one remote computation between concurrent requests for the same
   * fingerprint (default: false). Followers ride on the leader's signal.
   */
  singleFlight?: boolean;

  /** Mode at construction (default: ONLINE) */
  initialMode?: ServiceMode;

  logger?: Logger;
}

/**
 * A stream plus the provenance known before the first chunk.
 */
export interface CompletionStream extends AsyncIterable<string> {
  readonly fingerprint: string;
  readonly source: CompletionSource;
  readonly stale: boolean;
}

export interface CompletionServiceStats {
  mode: ServiceMode;
  offlineTransitions: number;
  cache: ResponseCacheStats;
  client: CompletionClientStats;
  singleFlight?: SingleFlightStats;
}

export class ResilientCompletionService extends EventEmitter<CompletionServiceEvents> {
  private readonly client: CompletionClient;
  private readonly cache: ResponseCache;
  private readonly singleFlight?: SingleFlight<string>;
  private readonly logger?: Logger;

  private mode: ServiceMode;
  private offlineTransitions = 0;

  constructor(options: CompletionServiceOptions) {
    super();
    this.client = options.client;
    this.cache = options.cache;
    this.singleFlight = options.singleFlight ? new SingleFlight<string>(options.logger) : undefined;
    this.logger = options.logger;
    this.mode = options.initialMode ?? 'ONLINE';

    this.logger?.debug(
      { mode: this.mode, singleFlight: options.singleFlight ?? false, provider: this.client.providerName },
      'ResilientCompletionService initialized'
    );
  }

  public getMode(): ServiceMode {
    return this.mode;
  }

  /**
   * Explicit external reset back to ONLINE.
   *
   * @returns true if the mode changed
   */
  public goOnline(reason = 'manual reset'): boolean {
    return this.transition('ONLINE', reason);
  }

  /**
   * Force OFFLINE (e.g. the user asked to work offline).
   *
   * @returns true if the mode changed
   */
  public goOffline(reason = 'manual'): boolean {
    return this.transition('OFFLINE', reason);
  }

  /**
   * Obtain a completion for a prompt and its ordered context.
   *
   * @throws CompletionError - `NoOfflineFallback` when offline without a cached
   *   value, `InvalidParams` for bad input, or the client's non-retryable error
   */
  public async getCompletion(
    prompt: string,
    context?: CompletionContext,
    options: CompletionCallOptions = {}
  ): Promise<CompletionResult> {
    assertValidCompletionRequest(prompt, context, options.model);
    const ctx = normalizeContext(context);
    const fingerprint = computeFingerprint({ prompt, context: ctx, model: options.model });
    const startTime = Date.now();

    if (this.mode === 'ONLINE') {
      const hit = this.cache.get(fingerprint);
      if (hit) {
        this.emit('cache:hit', { fingerprint, mode: this.mode, timestamp: Date.now() });
        return this.succeed(fingerprint, hit.text, 'cache', startTime);
      }
      this.emit('cache:miss', { fingerprint, mode: this.mode, timestamp: Date.now() });

      try {
        const text = await this.fetchRemote(fingerprint, prompt, ctx, options);
        return this.succeed(fingerprint, text, 'remote', startTime);
      } catch (error) {
        const failure = toCompletionError(error);
        if (failure.code !== 'RetriesExhausted') {
          this.fail(fingerprint, failure);
          throw failure;
        }
        this.transition('OFFLINE', failure.message);
      }
    }

    return this.serveOffline(fingerprint, startTime);
  }

  /**
   * Stream a completion. Cache hits (and offline hits) are delivered as a
   * single chunk; a remote stream is cached only once it completes.
   *
   * Stream failures do not change the mode: re-issuing is the caller's call.
   *
   * @throws CompletionError('NoOfflineFallback') when offline without a cached value
   */
  public async streamCompletion(
    prompt: string,
    context?: CompletionContext,
    options: CompletionCallOptions = {}
  ): Promise<CompletionStream> {
    assertValidCompletionRequest(prompt, context, options.model);
    const ctx = normalizeContext(context);
    const fingerprint = computeFingerprint({ prompt, context: ctx, model: options.model });
    const startTime = Date.now();

    const hit = this.cache.get(fingerprint);
    if (hit) {
      this.emit('cache:hit', { fingerprint, mode: this.mode, timestamp: Date.now() });
      const source: CompletionSource = this.mode === 'ONLINE' ? 'cache' : 'offline-cache';
      this.succeed(fingerprint, hit.text, source, startTime);
      return {
        fingerprint,
        source,
        stale: source === 'offline-cache',
        [Symbol.asyncIterator]: () => singleChunk(hit.text),
      };
    }
    this.emit('cache:miss', { fingerprint, mode: this.mode, timestamp: Date.now() });

    if (this.mode === 'OFFLINE') {
      const failure = this.noOfflineFallback(fingerprint);
      this.fail(fingerprint, failure);
      throw failure;
    }

    const relay = async function* (this: ResilientCompletionService): AsyncGenerator<string, void, undefined> {
      const chunks: string[] = [];
      try {
        for await (const chunk of this.client.streamComplete(prompt, ctx, options)) {
          chunks.push(chunk);
          yield chunk;
        }
      } catch (error) {
        this.fail(fingerprint, toCompletionError(error));
        throw error;
      }
      const text = chunks.join('');
      this.cache.put(fingerprint, text);
      this.succeed(fingerprint, text, 'remote', startTime);
    };

    return {
      fingerprint,
      source: 'remote',
      stale: false,
      [Symbol.asyncIterator]: () => relay.call(this),
    };
  }

  /**
   * Drop every cached completion.
   */
  public invalidate(): void {
    this.cache.clear();
  }

  public getStats(): CompletionServiceStats {
    return {
      mode: this.mode,
      offlineTransitions: this.offlineTransitions,
      cache: this.cache.getStats(),
      client: this.client.getStats(),
      ...(this.singleFlight && { singleFlight: this.singleFlight.getStats() }),
    };
  }

  private async fetchRemote(
    fingerprint: string,
    prompt: string,
    context: CompletionContext,
    options: CompletionCallOptions
  ): Promise<string> {
    const work = async (): Promise<string> => {
      const text = await this.client.complete(prompt, context, options);
      this.cache.put(fingerprint, text);
      return text;
    };

    return this.singleFlight ? this.singleFlight.run(fingerprint, work) : work();
  }

  private serveOffline(fingerprint: string, startTime: number): CompletionResult {
    const hit = this.cache.get(fingerprint);
    if (hit) {
      this.emit('cache:hit', { fingerprint, mode: this.mode, timestamp: Date.now() });
      this.logger?.info({ fingerprint }, 'Serving cached completion while offline');
      return this.succeed(fingerprint, hit.text, 'offline-cache', startTime);
    }

    this.emit('cache:miss', { fingerprint, mode: this.mode, timestamp: Date.now() });
    const failure = this.noOfflineFallback(fingerprint);
    this.fail(fingerprint, failure);
    throw failure;
  }

  private noOfflineFallback(fingerprint: string): CompletionError {
    return new CompletionError(
      'NoOfflineFallback',
      'Remote completion service is offline and no cached completion exists for this request',
      { fingerprint }
    );
  }

  /**
   * Flip the mode flag. Synchronous, so concurrent readers see either the old
   * or the new value.
   */
  private transition(next: ServiceMode, reason: string): boolean {
    const previous = this.mode;
    if (previous === next) {
      return false;
    }

    this.mode = next;
    if (next === 'OFFLINE') {
      this.offlineTransitions++;
    }

    const level = next === 'OFFLINE' ? 'warn' : 'info';
    this.logger?.[level]({ mode: next, previousMode: previous, reason }, 'Completion service mode changed');
    this.emit('mode:changed', { mode: next, previousMode: previous, reason, timestamp: Date.now() });
    return true;
  }

  private succeed(
    fingerprint: string,
    text: string,
    source: CompletionSource,
    startTime: number
  ): CompletionResult {
    const durationMs = Date.now() - startTime;
    this.emit('completion:succeeded', { fingerprint, source, durationMs, timestamp: Date.now() });
    return { text, fingerprint, source, stale: source === 'offline-cache' };
  }

  private fail(fingerprint: string, error: CompletionError): void {
    this.logger?.debug({ fingerprint, code: error.code }, 'Completion failed');
    this.emit('completion:failed', { fingerprint, error: error.toObject(), timestamp: Date.now() });
  }
}

async function* singleChunk(text: string): AsyncGenerator<string, void, undefined> {
  yield text;
}
