/**
 * Scripted in-process remote completion provider for tests.
 *
 * complete() consumes one scripted step per call and falls back to echoing
 * the prompt; stream() consumes one stream plan per call.
 */

import type { RemoteCompletionProvider, RemoteCompletionRequest } from '../../src/types/index.js';
import { RemoteError } from '../../src/api/errors.js';

export type CompleteStep =
  | { text: string }
  | { error: unknown }
  /** Never settles on its own; rejects with an AbortError when the signal fires */
  | { hang: true };

export interface StreamPlan {
  chunks: string[];
  /** Throw `error` once this many chunks have been delivered */
  failAfter?: number;
  error?: unknown;
}

export function abortError(): Error {
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

export class ScriptedRemote implements RemoteCompletionProvider {
  public readonly name = 'scripted';
  public readonly calls: RemoteCompletionRequest[] = [];
  public readonly streamCalls: RemoteCompletionRequest[] = [];
  public streamsClosed = 0;

  private readonly steps: CompleteStep[] = [];
  private readonly plans: StreamPlan[] = [];
  private failing?: () => unknown;

  constructor(steps: CompleteStep[] = []) {
    this.steps.push(...steps);
  }

  public enqueue(...steps: CompleteStep[]): this {
    this.steps.push(...steps);
    return this;
  }

  public enqueueStream(...plans: StreamPlan[]): this {
    this.plans.push(...plans);
    return this;
  }

  /**
   * Make every unscripted complete() call throw a fresh error from `factory`.
   */
  public failAlways(factory: () => unknown): this {
    this.failing = factory;
    return this;
  }

  public recover(): this {
    this.failing = undefined;
    return this;
  }

  public async complete(request: RemoteCompletionRequest): Promise<string> {
    this.calls.push(request);
    const step = this.steps.shift();

    if (!step) {
      if (this.failing) {
        throw this.failing();
      }
      return `echo:${request.prompt}`;
    }
    if ('error' in step) {
      throw step.error;
    }
    if ('hang' in step) {
      return new Promise<string>((_, reject) => {
        request.signal.addEventListener('abort', () => reject(abortError()), { once: true });
      });
    }
    return step.text;
  }

  public async *stream(request: RemoteCompletionRequest): AsyncGenerator<string, void, undefined> {
    this.streamCalls.push(request);
    const plan = this.plans.shift() ?? { chunks: [`echo:${request.prompt}`] };

    try {
      for (const [index, chunk] of plan.chunks.entries()) {
        if (plan.failAfter === index) {
          throw plan.error ?? new RemoteError('Transport', 'connection reset');
        }
        yield chunk;
      }
      if (plan.failAfter === plan.chunks.length) {
        throw plan.error ?? new RemoteError('Transport', 'connection reset');
      }
    } finally {
      this.streamsClosed++;
    }
  }
}

export function transportError(message = 'socket hang up'): RemoteError {
  return new RemoteError('Transport', message);
}

/**
 * Promise with externally controlled settlement.
 */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export async function collect(stream: AsyncIterable<string>): Promise<string[]> {
  const chunks: string[] = [];
  for await (const chunk of stream) {
    chunks.push(chunk);
  }
  return chunks;
}
