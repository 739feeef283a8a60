import { describe, it, expect, vi } from 'vitest';
import { refine, type CompletionFetcher } from '../../../src/core/refinement-loop.js';
import type { CompletionContext, CompletionResult } from '../../../src/types/index.js';

function scriptedService(drafts: string[]) {
  const getCompletion = vi.fn(async (prompt: string, _context?: CompletionContext): Promise<CompletionResult> => {
    const text = drafts.shift() ?? 'exhausted';
    return { text, fingerprint: `fp-${prompt}`, source: 'remote', stale: false };
  });
  const service: CompletionFetcher = { getCompletion };
  return { service, getCompletion };
}

describe('refine', () => {
  it('stops once consecutive drafts barely change', async () => {
    const { service } = scriptedService([
      'alpha beta gamma',
      'alpha beta gamma delta',
      'Alpha, beta; gamma delta!',
      'never requested',
    ]);

    const result = await refine(service, 'improve this');

    expect(result.converged).toBe(true);
    expect(result.iterations).toBe(3);
    expect(result.text).toBe('Alpha, beta; gamma delta!');
    expect(result.history.map((step) => step.improvement)).toEqual([undefined, 0.25, 0]);
  });

  it('sends the previous draft after the base context', async () => {
    const { service, getCompletion } = scriptedService(['first', 'first']);
    const base = [{ content: 'file contents', source: 'a.ts' }];

    await refine(service, 'improve this', { context: base });

    expect(getCompletion.mock.calls[0]?.[1]).toEqual(base);
    expect(getCompletion.mock.calls[1]?.[1]).toEqual([
      { content: 'file contents', source: 'a.ts' },
      { role: 'assistant', source: 'previous-draft', content: 'first' },
    ]);
  });

  it('gives up after maxIterations without converging', async () => {
    const { service, getCompletion } = scriptedService(['one', 'two', 'three']);

    const result = await refine(service, 'p', { maxIterations: 2 });

    expect(result).toMatchObject({ text: 'two', iterations: 2, converged: false });
    expect(result.history.map((step) => step.improvement)).toEqual([undefined, 1]);
    expect(getCompletion).toHaveBeenCalledTimes(2);
  });

  it('returns the single draft when only one iteration is allowed', async () => {
    const { service } = scriptedService(['only']);

    await expect(refine(service, 'p', { maxIterations: 1 })).resolves.toMatchObject({
      text: 'only',
      iterations: 1,
      converged: false,
    });
  });

  it('propagates completion failures', async () => {
    const service: CompletionFetcher = {
      getCompletion: async () => Promise.reject(new Error('offline')),
    };

    await expect(refine(service, 'p')).rejects.toThrow('offline');
  });

  it('validates its options', async () => {
    const { service } = scriptedService([]);

    await expect(refine(service, 'p', { maxIterations: 0 })).rejects.toThrow(RangeError);
    await expect(refine(service, 'p', { improvementThreshold: 1.5 })).rejects.toThrow(RangeError);
  });
});
