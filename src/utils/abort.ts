/**
 * Abort-aware timing helpers shared by the client and the task queue.
 */

import { CompletionError } from '../api/errors.js';

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export function createCancelledError(message = 'Operation aborted by caller'): CompletionError {
  return new CompletionError('Cancelled', message);
}

/**
 * Sleep helper aware of AbortSignal. Rejects with a `Cancelled`
 * CompletionError when the signal fires before the delay elapses.
 */
export const abortableDelay: Sleeper = async (ms, signal) => {
  if (signal?.aborted) {
    throw createCancelledError();
  }

  if (ms <= 0) {
    return;
  }

  if (!signal) {
    await new Promise((resolve) => setTimeout(resolve, ms));
    return;
  }

  await new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    const onAbort = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
      reject(createCancelledError());
    };

    signal.addEventListener('abort', onAbort);
  });
};

/**
 * Link a child AbortController to an optional parent signal.
 *
 * @returns the child controller and a function that detaches the listener
 */
export function linkAbortSignal(parent?: AbortSignal): {
  controller: AbortController;
  unlink: () => void;
} {
  const controller = new AbortController();
  if (!parent) {
    return { controller, unlink: () => undefined };
  }

  if (parent.aborted) {
    controller.abort(parent.reason);
    return { controller, unlink: () => undefined };
  }

  const onAbort = (): void => controller.abort(parent.reason);
  parent.addEventListener('abort', onAbort, { once: true });
  return {
    controller,
    unlink: () => parent.removeEventListener('abort', onAbort),
  };
}
