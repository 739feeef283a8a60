/**
 * Refinement loop
 *
 * Re-prompts with the previous draft as context until consecutive drafts
 * stop changing meaningfully. Improvement between drafts is
 * 1 - Jaccard(word sets); the loop converges once it drops below the
 * threshold.
 *
 * Every iteration goes through the completion service, so a repeated draft
 * (same base prompt, same previous draft) is served from cache.
 */

import type { Logger } from 'pino';
import type { CompletionCallOptions, CompletionContext, CompletionResult } from '../types/index.js';
import { jaccardSimilarity } from '../utils/text.js';

export const DEFAULT_MAX_ITERATIONS = 5;
export const DEFAULT_IMPROVEMENT_THRESHOLD = 0.1;

/**
 * The part of the completion service the loop needs.
 */
export interface CompletionFetcher {
  getCompletion(
    prompt: string,
    context?: CompletionContext,
    options?: CompletionCallOptions
  ): Promise<CompletionResult>;
}

export interface RefinementOptions extends CompletionCallOptions {
  maxIterations?: number;
  /** Stop once 1 - similarity(previous, current) falls below this, in [0, 1] */
  improvementThreshold?: number;
  /** Context sent with every iteration, ahead of the previous draft */
  context?: CompletionContext;
  logger?: Logger;
}

export interface RefinementStep {
  iteration: number;
  text: string;
  source: CompletionResult['source'];
  /** Absent for the first draft */
  improvement?: number;
}

export interface RefinementResult {
  text: string;
  iterations: number;
  converged: boolean;
  history: RefinementStep[];
}

export async function refine(
  service: CompletionFetcher,
  basePrompt: string,
  options: RefinementOptions = {}
): Promise<RefinementResult> {
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  const threshold = options.improvementThreshold ?? DEFAULT_IMPROVEMENT_THRESHOLD;
  const baseContext = options.context ?? [];
  const callOptions: CompletionCallOptions = { model: options.model, signal: options.signal };

  if (!Number.isInteger(maxIterations) || maxIterations < 1) {
    throw new RangeError(`maxIterations must be a positive integer, got ${maxIterations}`);
  }
  if (threshold < 0 || threshold > 1) {
    throw new RangeError(`improvementThreshold must be in [0, 1], got ${threshold}`);
  }

  const history: RefinementStep[] = [];
  let previous: string | undefined;

  for (let iteration = 1; iteration <= maxIterations; iteration++) {
    const context: CompletionContext =
      previous === undefined
        ? baseContext
        : [...baseContext, { role: 'assistant', source: 'previous-draft', content: previous }];

    const result = await service.getCompletion(basePrompt, context, callOptions);
    const improvement = previous === undefined ? undefined : 1 - jaccardSimilarity(previous, result.text);
    history.push({
      iteration,
      text: result.text,
      source: result.source,
      ...(improvement !== undefined && { improvement }),
    });

    options.logger?.debug({ iteration, improvement, source: result.source }, 'Refinement iteration');

    if (improvement !== undefined && improvement < threshold) {
      options.logger?.info({ iterations: iteration, improvement }, 'Refinement converged');
      return { text: result.text, iterations: iteration, converged: true, history };
    }
    previous = result.text;
  }

  return {
    text: previous ?? '',
    iterations: maxIterations,
    converged: false,
    history,
  };
}
