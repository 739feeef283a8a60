/**
 * Completion Client
 *
 * Wraps a remote completion provider with a per-attempt timeout and the
 * backoff policy. Holds no cache state.
 *
 * - complete(): up to maxAttempts attempts; non-retryable kinds fail at once
 *   with the classified error; exhaustion fails with RetriesExhausted
 *   wrapping the last underlying error.
 * - streamComplete(): single pass, never retried. A mid-stream transport
 *   failure ends the sequence with StreamInterrupted. Abandoning iteration
 *   aborts the transport signal and closes the provider iterator.
 */

import type { Logger } from 'pino';
import {
  CompletionError,
  RemoteError,
  classifyRemoteError,
  createTimeoutError,
  toCompletionError,
} from '../api/errors.js';
import type {
  CompletionCallOptions,
  CompletionContext,
  RemoteCompletionProvider,
  RemoteCompletionRequest,
} from '../types/index.js';
import { abortableDelay, createCancelledError, linkAbortSignal, type Sleeper } from '../utils/abort.js';
import { BackoffPolicy } from './backoff-policy.js';

export const DEFAULT_MAX_ATTEMPTS = 5;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export interface RetryAttemptContext {
  attempt: number;
  delayMs: number;
  error: CompletionError;
}

export interface CompletionClientConfig {
  provider: RemoteCompletionProvider;

  /** Total attempts including the first (default: 5) */
  maxAttempts?: number;

  /** Per-attempt timeout in milliseconds (default: 30000) */
  requestTimeoutMs?: number;

  backoff?: BackoffPolicy;

  /** Delay implementation (default: abort-aware setTimeout) */
  sleep?: Sleeper;

  /** Invoked before each backoff delay */
  onRetry?: (context: RetryAttemptContext) => void;

  logger?: Logger;
}

export interface CompletionClientStats {
  calls: number;
  attempts: number;
  retries: number;
  succeeded: number;
  failed: number;
  exhausted: number;
  streams: number;
  interruptedStreams: number;
}

export class CompletionClient {
  private readonly provider: RemoteCompletionProvider;
  private readonly maxAttempts: number;
  private readonly requestTimeoutMs: number;
  private readonly backoff: BackoffPolicy;
  private readonly sleep: Sleeper;
  private readonly onRetry?: (context: RetryAttemptContext) => void;
  private readonly logger?: Logger;

  private stats: CompletionClientStats = {
    calls: 0,
    attempts: 0,
    retries: 0,
    succeeded: 0,
    failed: 0,
    exhausted: 0,
    streams: 0,
    interruptedStreams: 0,
  };

  constructor(config: CompletionClientConfig) {
    this.provider = config.provider;
    this.maxAttempts = config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.requestTimeoutMs = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.backoff = config.backoff ?? new BackoffPolicy();
    this.sleep = config.sleep ?? abortableDelay;
    this.onRetry = config.onRetry;
    this.logger = config.logger;

    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new Error('maxAttempts must be an integer >= 1');
    }
    if (this.requestTimeoutMs <= 0) {
      throw new Error('requestTimeoutMs must be > 0');
    }
  }

  public get providerName(): string {
    return this.provider.name;
  }

  /**
   * Produce a full completion, retrying transient failures.
   *
   * @throws CompletionError - classified kind for non-retryable failures,
   *   `RetriesExhausted` after maxAttempts, `Cancelled` on caller abort
   */
  public async complete(
    prompt: string,
    context: CompletionContext = [],
    options: CompletionCallOptions = {}
  ): Promise<string> {
    this.stats.calls++;
    const startTime = Date.now();
    let lastError: CompletionError | undefined;

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      if (options.signal?.aborted) {
        this.stats.failed++;
        throw createCancelledError();
      }

      this.stats.attempts++;
      try {
        const text = await this.attemptOnce(prompt, context, options);
        this.stats.succeeded++;
        if (attempt > 0) {
          this.logger?.info(
            { provider: this.provider.name, attempts: attempt + 1, elapsedMs: Date.now() - startTime },
            'Completion succeeded after retry'
          );
        }
        return text;
      } catch (error) {
        const classified = this.classify(error);

        if (classified.code === 'Cancelled') {
          this.stats.failed++;
          throw classified;
        }

        const decision = this.backoff.delay(
          attempt,
          classified.code,
          classified instanceof RemoteError ? classified.retryAfterMs : undefined
        );

        if (!decision.retry) {
          this.logger?.debug(
            { provider: this.provider.name, code: classified.code, attempt },
            'Error not retryable'
          );
          this.stats.failed++;
          throw classified;
        }

        lastError = classified;
        if (attempt + 1 >= this.maxAttempts) {
          break;
        }

        this.stats.retries++;
        this.onRetry?.({ attempt, delayMs: decision.delayMs, error: classified });
        this.logger?.warn(
          {
            provider: this.provider.name,
            attempt: attempt + 1,
            maxAttempts: this.maxAttempts,
            delayMs: decision.delayMs,
            code: classified.code,
            error: classified.message,
          },
          'Retrying completion after delay'
        );

        try {
          await this.sleep(decision.delayMs, options.signal);
        } catch (sleepError) {
          this.stats.failed++;
          throw toCompletionError(sleepError, 'Cancelled');
        }
      }
    }

    this.stats.failed++;
    this.stats.exhausted++;
    this.logger?.error(
      {
        provider: this.provider.name,
        attempts: this.maxAttempts,
        elapsedMs: Date.now() - startTime,
        lastCode: lastError?.code,
      },
      'Completion retries exhausted'
    );

    throw new CompletionError(
      'RetriesExhausted',
      `Completion failed after ${this.maxAttempts} attempts: ${lastError?.message ?? 'unknown error'}`,
      { attempts: this.maxAttempts, lastCode: lastError?.code },
      { cause: lastError }
    );
  }

  /**
   * Stream a completion as text chunks. Not retried: re-issuing a stream is
   * the caller's decision.
   *
   * @throws CompletionError('StreamInterrupted') when the transport fails
   *   before the stream completes
   */
  public async *streamComplete(
    prompt: string,
    context: CompletionContext = [],
    options: CompletionCallOptions = {}
  ): AsyncGenerator<string, void, undefined> {
    this.stats.streams++;
    const { controller, unlink } = linkAbortSignal(options.signal);
    const request: RemoteCompletionRequest = {
      prompt,
      context,
      model: options.model,
      timeoutMs: this.requestTimeoutMs,
      signal: controller.signal,
    };

    let chunks = 0;
    let completed = false;
    let timedOut = false;
    let pendingNext = false;
    let iterator: AsyncIterator<string> | undefined;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort(createTimeoutError(`${this.provider.name}.stream`, this.requestTimeoutMs));
    }, this.requestTimeoutMs);

    try {
      try {
        iterator = this.provider.stream(request)[Symbol.asyncIterator]();
        for (;;) {
          pendingNext = true;
          const next = await nextOrAbort(iterator, controller.signal);
          pendingNext = false;
          if (next.done) {
            break;
          }
          chunks++;
          yield next.value;
        }
        completed = true;
      } catch (error) {
        if (options.signal?.aborted) {
          throw createCancelledError('Stream aborted by caller');
        }
        this.stats.interruptedStreams++;
        const cause = timedOut
          ? createTimeoutError(`${this.provider.name}.stream`, this.requestTimeoutMs)
          : this.classify(error);
        this.logger?.warn(
          { provider: this.provider.name, chunks, code: cause.code, error: cause.message },
          'Completion stream interrupted'
        );
        throw new CompletionError(
          'StreamInterrupted',
          `Stream interrupted after ${chunks} chunk(s): ${cause.message}`,
          { chunks, causeCode: cause.code },
          { cause }
        );
      }
    } finally {
      clearTimeout(timer);
      unlink();
      if (!completed) {
        // Consumer abandoned iteration or the transport failed: release it
        controller.abort();
        if (iterator?.return) {
          const closing = iterator.return();
          if (pendingNext) {
            // a provider ignoring the signal never settles its pending next(),
            // and return() queues behind it
            void closing.then(undefined, (closeError: unknown) => {
              this.logger?.debug({ err: closeError }, 'Provider stream close failed');
            });
          } else {
            try {
              await closing;
            } catch (closeError) {
              this.logger?.debug({ err: closeError }, 'Provider stream close failed');
            }
          }
        }
      }
    }
  }

  public getStats(): CompletionClientStats {
    return { ...this.stats };
  }

  /**
   * One attempt with its own timeout and abort controller.
   */
  private async attemptOnce(
    prompt: string,
    context: CompletionContext,
    options: CompletionCallOptions
  ): Promise<string> {
    const { controller, unlink } = linkAbortSignal(options.signal);
    const timeoutError = createTimeoutError(`${this.provider.name}.complete`, this.requestTimeoutMs);
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // reject before aborting so the race settles on the timeout
        reject(timeoutError);
        controller.abort(timeoutError);
      }, this.requestTimeoutMs);
    });

    let onCallerAbort: (() => void) | undefined;
    const cancelled = new Promise<never>((_, reject) => {
      if (options.signal?.aborted) {
        reject(createCancelledError());
        return;
      }
      onCallerAbort = () => reject(createCancelledError());
      options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    });

    try {
      return await Promise.race([
        this.provider.complete({
          prompt,
          context,
          model: options.model,
          timeoutMs: this.requestTimeoutMs,
          signal: controller.signal,
        }),
        timeout,
        cancelled,
      ]);
    } catch (error) {
      // our own controller only aborts on timeout unless the caller aborted
      if (controller.signal.aborted && !options.signal?.aborted) {
        throw timeoutError;
      }
      throw error;
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
      if (onCallerAbort) {
        options.signal?.removeEventListener('abort', onCallerAbort);
      }
      unlink();
    }
  }

  private classify(error: unknown): CompletionError {
    if (error instanceof CompletionError) {
      return error;
    }
    const kind = classifyRemoteError(error);
    if (kind === 'Cancelled') {
      return createCancelledError();
    }
    const message = error instanceof Error ? error.message : String(error);
    return new RemoteError(kind, message, { cause: error });
  }
}

/**
 * Await the next chunk, or reject with the signal's reason once it aborts,
 * whether or not the provider observes the signal.
 */
function nextOrAbort(iterator: AsyncIterator<string>, signal: AbortSignal): Promise<IteratorResult<string>> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }

  return new Promise<IteratorResult<string>>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    void iterator.next().then(
      (result) => {
        signal.removeEventListener('abort', onAbort);
        resolve(result);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
