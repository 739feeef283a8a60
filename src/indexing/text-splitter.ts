/**
 * Recursive character text splitter.
 *
 * Splits on the coarsest separator present (paragraphs, then lines, then
 * words, then characters), recursing into pieces that are still too long,
 * and merges small pieces back into chunks of at most chunkSize characters
 * that overlap their predecessor by up to chunkOverlap characters.
 */

import type { SplitOptions } from '../types/index.js';

export const DEFAULT_SPLIT_OPTIONS: SplitOptions = {
  chunkSize: 1000,
  chunkOverlap: 200,
};

const SEPARATORS = ['\n\n', '\n', ' ', ''] as const;

/**
 * @throws RangeError if chunkSize < 1 or chunkOverlap is outside [0, chunkSize)
 */
export function splitText(text: string, options: Partial<SplitOptions> = {}): string[] {
  const { chunkSize, chunkOverlap } = { ...DEFAULT_SPLIT_OPTIONS, ...options };

  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new RangeError(`chunkOverlap must be an integer in [0, ${chunkSize}), got ${chunkOverlap}`);
  }

  return splitRecursive(text, SEPARATORS, chunkSize, chunkOverlap);
}

function splitRecursive(
  text: string,
  separators: readonly string[],
  chunkSize: number,
  chunkOverlap: number
): string[] {
  const index = separators.findIndex((sep) => sep === '' || text.includes(sep));
  const separator = separators[index] ?? '';
  const finer = separators.slice(index + 1);

  const pieces = (separator === '' ? Array.from(text) : text.split(separator)).filter((p) => p !== '');

  const chunks: string[] = [];
  let small: string[] = [];
  for (const piece of pieces) {
    if (piece.length < chunkSize) {
      small.push(piece);
      continue;
    }

    if (small.length > 0) {
      chunks.push(...mergePieces(small, separator, chunkSize, chunkOverlap));
      small = [];
    }
    if (finer.length === 0) {
      chunks.push(piece);
    } else {
      chunks.push(...splitRecursive(piece, finer, chunkSize, chunkOverlap));
    }
  }

  if (small.length > 0) {
    chunks.push(...mergePieces(small, separator, chunkSize, chunkOverlap));
  }
  return chunks;
}

/**
 * Greedily join pieces up to chunkSize, carrying a tail of at most
 * chunkOverlap characters into the next chunk.
 */
function mergePieces(
  pieces: readonly string[],
  separator: string,
  chunkSize: number,
  chunkOverlap: number
): string[] {
  const chunks: string[] = [];
  const current: string[] = [];
  let total = 0;

  const emit = (): void => {
    const chunk = current.join(separator).trim();
    if (chunk !== '') {
      chunks.push(chunk);
    }
  };
  const joinedLength = (length: number): number =>
    total + length + (current.length > 0 ? separator.length : 0);

  for (const piece of pieces) {
    if (joinedLength(piece.length) > chunkSize && current.length > 0) {
      emit();
      while (total > chunkOverlap || (total > 0 && joinedLength(piece.length) > chunkSize)) {
        const dropped = current.shift();
        if (dropped === undefined) {
          break;
        }
        total -= dropped.length + (current.length > 0 ? separator.length : 0);
      }
    }

    total = joinedLength(piece.length);
    current.push(piece);
  }

  emit();
  return chunks;
}
