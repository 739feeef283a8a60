/**
 * Completion request/result types and the remote provider contract.
 */

/**
 * One ordered piece of context supplied alongside a prompt
 * (a file excerpt, a previous draft, a retrieved chunk).
 */
export interface ContextEntry {
  content: string;
  role?: string;
  source?: string;
}

export type CompletionContext = readonly ContextEntry[];

/**
 * Request handed to a remote provider for one attempt.
 */
export interface RemoteCompletionRequest {
  prompt: string;
  context: CompletionContext;
  model?: string;
  /** Budget for this attempt; the client also enforces it */
  timeoutMs: number;
  /** Aborted on timeout, caller cancellation, or stream abandonment */
  signal: AbortSignal;
}

/**
 * Remote completion capability wrapped by the client.
 *
 * Implementations report failures by throwing `RemoteError` (preferred) or any
 * error `classifyRemoteError` understands. No wire format is prescribed.
 */
export interface RemoteCompletionProvider {
  readonly name: string;
  complete(request: RemoteCompletionRequest): Promise<string>;
  stream(request: RemoteCompletionRequest): AsyncIterable<string>;
}

export type CompletionSource = 'remote' | 'cache' | 'offline-cache';

export interface CompletionResult {
  text: string;
  fingerprint: string;
  source: CompletionSource;
  /** True only when served from cache while OFFLINE */
  stale: boolean;
}

export interface CompletionCallOptions {
  model?: string;
  signal?: AbortSignal;
}

export type ServiceMode = 'ONLINE' | 'OFFLINE';
