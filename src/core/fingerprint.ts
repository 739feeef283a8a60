/**
 * Request Fingerprint
 *
 * Deterministic SHA256 digest identifying a logically-equivalent completion
 * request. Shared by the response cache and the single-flight registry.
 *
 * Canonicalization:
 * - Object keys are sorted recursively, so `{ content, role }` and
 *   `{ role, content }` hash identically
 * - Context entry order is preserved (it is part of the request)
 * - Absent context and an empty context list are the same request
 */

import { createHash } from 'node:crypto';
import type { CompletionContext } from '../types/index.js';

export interface FingerprintParams {
  prompt: string;
  context?: CompletionContext;
  model?: string;
}

function sortKeys(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }

  const sorted: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    if (entry !== undefined) {
      sorted[key] = sortKeys(entry);
    }
  }
  return sorted;
}

/**
 * Generate a deterministic fingerprint for a completion request.
 *
 * @returns Hex-encoded SHA256 hash (64 chars)
 */
export function computeFingerprint(params: FingerprintParams): string {
  const canonical = {
    prompt: params.prompt,
    context: params.context ?? [],
    ...(params.model !== undefined && { model: params.model }),
  };

  const payload = JSON.stringify(sortKeys(canonical));
  return createHash('sha256').update(payload).digest('hex');
}
