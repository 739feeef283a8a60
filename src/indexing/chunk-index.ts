/**
 * In-memory chunk index
 *
 * Stores text chunks keyed by source path and ranks them against a query
 * by term frequency. Re-indexing a source replaces its chunks wholesale.
 */

import type { Logger } from 'pino';
import type { IndexSearchHit, TextChunk } from '../types/index.js';
import { tokenize } from '../utils/text.js';

export interface ChunkIndexStats {
  sources: number;
  chunks: number;
}

interface IndexedChunk {
  chunk: TextChunk;
  termCounts: Map<string, number>;
}

export class ChunkIndex {
  private readonly logger?: Logger;
  private readonly sources = new Map<string, IndexedChunk[]>();
  /** Directory each source was indexed from, when known */
  private readonly origins = new Map<string, string>();

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Replace every chunk of `source` with `texts`, numbered from 0.
   * `origin` records the directory the source was read from.
   */
  public replace(source: string, texts: readonly string[], origin?: string): TextChunk[] {
    const chunks = texts.map((text, index) => ({ source, index, text }));
    this.sources.set(
      source,
      chunks.map((chunk) => ({ chunk, termCounts: countTerms(chunk.text) }))
    );
    if (origin === undefined) {
      this.origins.delete(source);
    } else {
      this.origins.set(source, origin);
    }
    this.logger?.debug({ source, chunks: chunks.length }, 'Source indexed');
    return chunks;
  }

  public remove(source: string): boolean {
    this.origins.delete(source);
    return this.sources.delete(source);
  }

  public clear(): void {
    this.sources.clear();
    this.origins.clear();
  }

  /**
   * Sources last indexed from `origin`.
   */
  public sourcesFrom(origin: string): string[] {
    const sources: string[] = [];
    for (const [source, sourceOrigin] of this.origins) {
      if (sourceOrigin === origin) {
        sources.push(source);
      }
    }
    return sources;
  }

  public getChunks(source: string): TextChunk[] {
    return (this.sources.get(source) ?? []).map((entry) => ({ ...entry.chunk }));
  }

  /**
   * Rank chunks by the summed occurrences of each distinct query term.
   * Chunks sharing no term are omitted. Ties keep source then index order.
   */
  public search(query: string, limit = 5): IndexSearchHit[] {
    const terms = new Set(tokenize(query));
    if (terms.size === 0 || limit <= 0) {
      return [];
    }

    const hits: IndexSearchHit[] = [];
    for (const entries of this.sources.values()) {
      for (const { chunk, termCounts } of entries) {
        let score = 0;
        for (const term of terms) {
          score += termCounts.get(term) ?? 0;
        }
        if (score > 0) {
          hits.push({ chunk: { ...chunk }, score });
        }
      }
    }

    return hits
      .sort(
        (a, b) =>
          b.score - a.score ||
          a.chunk.source.localeCompare(b.chunk.source) ||
          a.chunk.index - b.chunk.index
      )
      .slice(0, limit);
  }

  public stats(): ChunkIndexStats {
    let chunks = 0;
    for (const entries of this.sources.values()) {
      chunks += entries.length;
    }
    return { sources: this.sources.size, chunks };
  }
}

function countTerms(text: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const term of tokenize(text)) {
    counts.set(term, (counts.get(term) ?? 0) + 1);
  }
  return counts;
}
