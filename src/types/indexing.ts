/**
 * Indexing types
 */

export interface TextChunk {
  source: string;
  index: number;
  text: string;
}

export interface SplitOptions {
  chunkSize: number;
  chunkOverlap: number;
}

export interface IndexSearchHit {
  chunk: TextChunk;
  score: number;
}

export interface IndexingReport {
  directory: string;
  filesIndexed: number;
  filesSkipped: number;
  chunks: number;
  /** Sources from an earlier run whose files are gone */
  sourcesRemoved: number;
  durationMs: number;
}
