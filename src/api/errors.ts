/**
 * Completion error utilities.
 *
 * Provides a consistent error type for all public API surfaces and
 * helpers to convert lower-level remote/transport errors into
 * CompletionError instances that callers can reason about.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced to API consumers.
 *
 * The first four are remote failure kinds reported by (or classified from)
 * the wrapped completion provider. The rest are raised by this layer.
 */
export type CompletionErrorCode =
  | 'RateLimited'
  | 'Timeout'
  | 'Transport'
  | 'Other'
  | 'RetriesExhausted'
  | 'StreamInterrupted'
  | 'NoOfflineFallback'
  | 'TaskFailure'
  | 'Cancelled'
  | 'InvalidParams'
  | 'PluginError';

/**
 * Remote failure kinds a provider may report.
 */
export type RemoteErrorKind = Extract<
  CompletionErrorCode,
  'RateLimited' | 'Timeout' | 'Transport' | 'Other'
>;

/**
 * Plain serializable error shape (for JSON responses/logging).
 */
export interface CompletionErrorShape {
  code: CompletionErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Error implementation returned by every component in this package.
 */
export class CompletionError extends Error implements CompletionErrorShape {
  public readonly code: CompletionErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: CompletionErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CompletionError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape (for JSON responses/telemetry).
   */
  public toObject(): CompletionErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Error a remote provider throws to report a classified failure.
 *
 * `retryAfterMs` carries a server hint (e.g. a `Retry-After` header) that the
 * backoff policy honours as a lower bound.
 */
export class RemoteError extends CompletionError {
  public readonly kind: RemoteErrorKind;
  public readonly retryAfterMs?: number;

  constructor(
    kind: RemoteErrorKind,
    message: string,
    options?: { retryAfterMs?: number; status?: number; cause?: unknown }
  ) {
    super(
      kind,
      message,
      {
        ...(options?.retryAfterMs !== undefined && { retryAfterMs: options.retryAfterMs }),
        ...(options?.status !== undefined && { status: options.status }),
      },
      { cause: options?.cause }
    );
    this.name = 'RemoteError';
    this.kind = kind;
    this.retryAfterMs = options?.retryAfterMs;
  }
}

const TRANSPORT_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

function readProperty(error: unknown, key: string): unknown {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  return Reflect.get(error, key);
}

/**
 * Classify an arbitrary throwable into a remote failure kind.
 *
 * Order: explicit RemoteError kind, HTTP status, errno-style code, message.
 * AbortError is not a remote failure and maps to `Cancelled`.
 */
export function classifyRemoteError(error: unknown): RemoteErrorKind | 'Cancelled' {
  if (error instanceof RemoteError) {
    return error.kind;
  }

  if (error instanceof CompletionError) {
    if (error.code === 'Cancelled') return 'Cancelled';
    if (error.code === 'Timeout' || error.code === 'RateLimited' || error.code === 'Transport') {
      return error.code;
    }
    return 'Other';
  }

  if (error instanceof Error && error.name === 'AbortError') {
    return 'Cancelled';
  }

  const status = readProperty(error, 'status') ?? readProperty(error, 'statusCode');
  if (typeof status === 'number') {
    if (status === 429) return 'RateLimited';
    if (status === 408 || status === 504) return 'Timeout';
    if (status >= 500) return 'Transport';
    return 'Other';
  }

  const code = readProperty(error, 'code');
  if (typeof code === 'string') {
    if (code === 'ETIMEDOUT' || code === 'TIMEOUT') return 'Timeout';
    if (TRANSPORT_ERROR_CODES.has(code.toUpperCase())) return 'Transport';
  }

  if (error instanceof Error) {
    if (/(?:timeout|timed\s+out)/i.test(error.message)) return 'Timeout';
    if (/rate.?limit|too many requests/i.test(error.message)) return 'RateLimited';
    if (/network|socket|connection/i.test(error.message)) return 'Transport';
  }

  return 'Other';
}

/**
 * Map unknown errors into CompletionError instances.
 *
 * @param error - Error thrown by a provider or a collaborator
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toCompletionError(
  error: unknown,
  fallbackCode: CompletionErrorCode = 'Other'
): CompletionError {
  if (error instanceof CompletionError) {
    return error;
  }

  if (error instanceof Error) {
    const kind = classifyRemoteError(error);
    const code = kind === 'Other' ? fallbackCode : kind;
    return new CompletionError(code, error.message || 'Operation failed', undefined, {
      cause: error,
    });
  }

  return new CompletionError(fallbackCode, `Unknown error: ${String(error)}`);
}

/**
 * Per-attempt timeout error.
 */
export function createTimeoutError(operation: string, timeoutMs: number): RemoteError {
  return new RemoteError('Timeout', `Request timed out after ${timeoutMs}ms: ${operation}`);
}

/**
 * Convert a zod validation error into an InvalidParams CompletionError.
 *
 * @example
 * ```typescript
 * const result = CompletionRequestSchema.safeParse({ prompt: '' });
 * if (!result.success) {
 *   throw zodErrorToCompletionError(result.error);
 * }
 * // Throws: "Validation error on field 'prompt': Prompt cannot be empty"
 * ```
 */
export function zodErrorToCompletionError(error: ZodError): CompletionError {
  const firstIssue = error.issues[0];
  const field =
    firstIssue !== undefined && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = `Validation error on field '${field}': ${firstIssue?.message ?? 'invalid value'}`;

  return new CompletionError('InvalidParams', message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}
