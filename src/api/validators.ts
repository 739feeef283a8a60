/**
 * API Validators
 *
 * Validates caller-supplied request parameters before any cache lookup or
 * remote call happens.
 */

import { CompletionRequestSchema } from '../types/schemas/index.js';
import type { CompletionContext } from '../types/index.js';
import { zodErrorToCompletionError } from './errors.js';

/**
 * Validate a completion request.
 *
 * @throws CompletionError('InvalidParams') describing the first failing field
 */
export function assertValidCompletionRequest(
  prompt: unknown,
  context: unknown,
  model?: unknown
): asserts prompt is string {
  const result = CompletionRequestSchema.safeParse({
    prompt,
    context,
    ...(model !== undefined && { model }),
  });
  if (!result.success) {
    throw zodErrorToCompletionError(result.error);
  }
}

/**
 * Treat absent context as an empty list.
 */
export function normalizeContext(context: CompletionContext | undefined): CompletionContext {
  return context ?? [];
}
