/**
 * Text helpers shared by the chunk index and the refinement loop.
 */

const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

/**
 * Lowercased word tokens in order of appearance.
 */
export function tokenize(text: string): string[] {
  return Array.from(text.toLowerCase().matchAll(WORD_PATTERN), (match) => match[0]);
}

/**
 * Jaccard similarity of the word sets of two texts, in [0, 1].
 * Two texts without words are identical.
 */
export function jaccardSimilarity(a: string, b: string): number {
  const left = new Set(tokenize(a));
  const right = new Set(tokenize(b));
  if (left.size === 0 && right.size === 0) {
    return 1;
  }

  let shared = 0;
  for (const word of left) {
    if (right.has(word)) {
      shared++;
    }
  }
  return shared / (left.size + right.size - shared);
}
