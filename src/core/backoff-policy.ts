/**
 * BackoffPolicy - Exponential backoff with bounded jitter
 *
 * Pure delay computation consulted by the completion client between attempts.
 * Holds no per-call state, so one instance is shared by every concurrent caller.
 *
 * Algorithm:
 * - Base delay     = baseDelayMs * 2^attempt   (attempt is 0-indexed)
 * - Jitter         = random in [0, baseDelayMs * jitterRatio)
 * - Final delay    = min(maxDelayMs, max(base + jitter, retryAfterMs))
 *
 * Because jitter stays below baseDelayMs, delays never decrease from one
 * attempt to the next.
 *
 * Usage:
 * ```typescript
 * const policy = new BackoffPolicy({ baseDelayMs: 100, maxDelayMs: 5000, jitterRatio: 0.5 });
 *
 * const decision = policy.delay(attempt, 'RateLimited');
 * if (decision.retry) {
 *   await sleep(decision.delayMs);
 * }
 * ```
 *
 * @module backoff-policy
 */

import type { CompletionErrorCode } from '../api/errors.js';

/**
 * Backoff policy configuration
 */
export interface BackoffPolicyConfig {
  /** Delay for attempt 0 in milliseconds (default: 500ms) */
  baseDelayMs: number;

  /** Upper bound for any single delay (default: 30000ms) */
  maxDelayMs: number;

  /** Jitter bound as a fraction of baseDelayMs, 0-1 (default: 0.5) */
  jitterRatio: number;

  /** Retry generic transport failures (default: true) */
  retryTransportErrors: boolean;

  /** Random source in [0, 1) (default: Math.random) */
  random?: () => number;
}

/**
 * Outcome of a backoff consultation
 */
export type BackoffDecision =
  | { retry: true; delayMs: number }
  | { retry: false; reason: string };

export const DEFAULT_BACKOFF_CONFIG: BackoffPolicyConfig = {
  baseDelayMs: 500,
  maxDelayMs: 30_000,
  jitterRatio: 0.5,
  retryTransportErrors: true,
};

/**
 * BackoffPolicy - stateless exponential backoff
 */
export class BackoffPolicy {
  private readonly config: BackoffPolicyConfig;
  private readonly random: () => number;

  constructor(config: Partial<BackoffPolicyConfig> = {}) {
    this.config = { ...DEFAULT_BACKOFF_CONFIG, ...config };
    this.random = config.random ?? Math.random;

    if (this.config.baseDelayMs < 0) {
      throw new Error('baseDelayMs must be >= 0');
    }
    if (this.config.maxDelayMs < this.config.baseDelayMs) {
      throw new Error('maxDelayMs must be >= baseDelayMs');
    }
    if (this.config.jitterRatio < 0 || this.config.jitterRatio > 1) {
      throw new Error('jitterRatio must be in range [0, 1]');
    }
  }

  /**
   * Whether an error kind may be retried at all.
   */
  public isRetryable(errorKind: CompletionErrorCode): boolean {
    switch (errorKind) {
      case 'RateLimited':
      case 'Timeout':
        return true;
      case 'Transport':
        return this.config.retryTransportErrors;
      default:
        return false;
    }
  }

  /**
   * Compute the delay before the next attempt.
   *
   * @param attempt - Number of attempts already failed minus one (0-indexed)
   * @param errorKind - Kind of the failure just observed
   * @param retryAfterMs - Optional server hint used as a lower bound
   */
  public delay(
    attempt: number,
    errorKind: CompletionErrorCode,
    retryAfterMs?: number
  ): BackoffDecision {
    if (!Number.isInteger(attempt) || attempt < 0) {
      throw new RangeError(`attempt must be a non-negative integer, got ${attempt}`);
    }

    if (!this.isRetryable(errorKind)) {
      return { retry: false, reason: `${errorKind} is not retryable` };
    }

    const exponential = this.config.baseDelayMs * Math.pow(2, attempt);
    const jitter = this.random() * this.config.baseDelayMs * this.config.jitterRatio;
    const hinted = Math.max(exponential + jitter, retryAfterMs ?? 0);

    return {
      retry: true,
      delayMs: Math.round(Math.min(this.config.maxDelayMs, hinted)),
    };
  }
}
