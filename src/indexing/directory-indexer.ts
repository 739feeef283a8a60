/**
 * Directory indexing job
 *
 * Walks a directory tree, splits every eligible text file into chunks and
 * stores them in a ChunkIndex. Meant to run inside the background task
 * queue: it checks the queue's signal between files.
 */

import * as fs from 'node:fs/promises';
import { extname, join, relative, resolve, sep } from 'node:path';
import type { Logger } from 'pino';
import type { IndexingReport, SplitOptions } from '../types/index.js';
import { createCancelledError } from '../utils/abort.js';
import type { ChunkIndex } from './chunk-index.js';
import { splitText } from './text-splitter.js';

export const SKIPPED_DIRECTORIES: ReadonlySet<string> = new Set(['node_modules', 'dist', 'build']);

export interface IndexDirectoryOptions extends SplitOptions {
  /** Lowercase extensions including the dot, e.g. ".ts" */
  extensions: readonly string[];
  maxFileBytes: number;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Index every eligible file under `directory`. Sources are keyed by their
 * path relative to `directory`, with forward slashes. After a complete walk,
 * sources from an earlier run of the same directory that were not seen again
 * are removed.
 *
 * @throws CompletionError('Cancelled') when the signal fires between files
 */
export async function indexDirectory(
  directory: string,
  index: ChunkIndex,
  options: IndexDirectoryOptions
): Promise<IndexingReport> {
  const startTime = Date.now();
  const extensions = new Set(options.extensions.map((ext) => ext.toLowerCase()));
  const origin = resolve(directory);
  const seen = new Set<string>();
  const report: IndexingReport = {
    directory,
    filesIndexed: 0,
    filesSkipped: 0,
    chunks: 0,
    sourcesRemoved: 0,
    durationMs: 0,
  };

  options.logger?.info({ directory, extensions: [...extensions] }, 'Indexing directory');

  for await (const file of walk(directory)) {
    if (options.signal?.aborted) {
      throw createCancelledError(`Indexing of ${directory} aborted`);
    }
    if (!extensions.has(extname(file).toLowerCase())) {
      continue;
    }

    const source = relative(directory, file).split(sep).join('/');
    const stats = await fs.stat(file);
    if (stats.size > options.maxFileBytes) {
      report.filesSkipped++;
      options.logger?.debug({ source, bytes: stats.size, maxFileBytes: options.maxFileBytes }, 'File too large, skipped');
      continue;
    }

    const content = await fs.readFile(file, 'utf-8');
    const chunks = splitText(content, { chunkSize: options.chunkSize, chunkOverlap: options.chunkOverlap });
    index.replace(source, chunks, origin);
    seen.add(source);
    report.filesIndexed++;
    report.chunks += chunks.length;
  }

  for (const source of index.sourcesFrom(origin)) {
    if (!seen.has(source)) {
      index.remove(source);
      report.sourcesRemoved++;
    }
  }

  report.durationMs = Date.now() - startTime;
  options.logger?.info({ ...report }, 'Directory indexed');
  return report;
}

/**
 * Depth-first file walk in name order, skipping dot-entries and build output.
 */
async function* walk(directory: string): AsyncGenerator<string, void, undefined> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    if (entry.name.startsWith('.')) {
      continue;
    }
    const path = join(directory, entry.name);
    if (entry.isDirectory()) {
      if (!SKIPPED_DIRECTORIES.has(entry.name)) {
        yield* walk(path);
      }
    } else if (entry.isFile()) {
      yield path;
    }
  }
}
