/**
 * Response Cache (bounded LRU)
 *
 * Maps request fingerprints to previously obtained completion text. Frequently
 * reused prompts (e.g. repeated refinement of one base prompt) stay resident.
 *
 * Features:
 * - LRU eviction bounded by entry count
 * - Optional TTL expiration (0 = entries never expire)
 * - Optional persistence to a JSON file
 * - Metrics (hit rate, eviction count)
 *
 * LRU Eviction Logic:
 * - Map iteration order === insertion order (oldest first)
 * - On get(): delete + re-insert moves the entry to the end
 * - On put() of a new key at capacity: delete the first key
 *
 * Every operation is synchronous, so a put() is visible to the next get()
 * for the same key regardless of which request flow issued it.
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { Logger } from 'pino';
import { lazyLog } from '../utils/logger-helpers.js';

/**
 * Response cache configuration
 */
export interface ResponseCacheConfig {
  /** Maximum number of entries (LRU capacity) */
  maxEntries: number;

  /** Time-to-live in milliseconds; 0 disables expiration */
  ttlMs?: number;

  /** Persistence configuration (optional) */
  persistence?: {
    enabled: boolean;
    path: string;
  };

  /** Clock (default: Date.now) */
  now?: () => number;

  logger?: Logger;
}

/**
 * Stored entry. Replaced wholesale on overwrite; only access bookkeeping mutates.
 */
interface CacheEntry {
  text: string;
  createdAt: number;
  lastAccessedAt: number;
  accessCount: number;
}

interface PersistedCacheEntry extends CacheEntry {
  key: string;
}

/**
 * Snapshot returned on a cache hit
 */
export interface CacheHit {
  text: string;
  createdAt: number;
  lastAccessedAt: number;
}

export interface ResponseCacheStats {
  size: number;
  maxEntries: number;
  hits: number;
  misses: number;
  evictions: number;
  ttlEvictions: number;
  hitRate: number;
}

export class ResponseCache {
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private readonly persistence?: ResponseCacheConfig['persistence'];
  private readonly now: () => number;
  private readonly logger?: Logger;

  private readonly cache = new Map<string, CacheEntry>();

  private stats = {
    hits: 0,
    misses: 0,
    evictions: 0,
    ttlEvictions: 0,
  };

  constructor(config: ResponseCacheConfig) {
    if (!Number.isInteger(config.maxEntries) || config.maxEntries < 1) {
      throw new Error(`ResponseCache: maxEntries must be a positive integer, got ${config.maxEntries}`);
    }
    if (config.ttlMs !== undefined && config.ttlMs < 0) {
      throw new Error('ResponseCache: ttlMs must be >= 0');
    }

    this.maxEntries = config.maxEntries;
    this.ttlMs = config.ttlMs ?? 0;
    this.persistence = config.persistence;
    this.now = config.now ?? Date.now;
    this.logger = config.logger;

    this.logger?.debug(
      {
        maxEntries: this.maxEntries,
        ttlMs: this.ttlMs,
        persistence: this.persistence?.enabled ?? false,
      },
      'ResponseCache initialized'
    );
  }

  /**
   * Look up a fingerprint. Pure lookup: never triggers computation.
   *
   * On hit, updates lastAccessedAt and marks the entry most recently used.
   */
  public get(fingerprint: string): CacheHit | undefined {
    const entry = this.cache.get(fingerprint);

    if (!entry) {
      this.stats.misses++;
      return undefined;
    }

    const now = this.now();
    if (this.isExpired(entry, now)) {
      this.cache.delete(fingerprint);
      this.stats.ttlEvictions++;
      this.stats.misses++;
      lazyLog(this.logger, 'debug', () => ({ fingerprint, age: now - entry.createdAt }), 'Cache entry expired');
      return undefined;
    }

    entry.lastAccessedAt = now;
    entry.accessCount++;

    this.cache.delete(fingerprint);
    this.cache.set(fingerprint, entry);

    this.stats.hits++;
    lazyLog(
      this.logger,
      'debug',
      () => ({ fingerprint, age: now - entry.createdAt, accessCount: entry.accessCount }),
      'Response cache hit'
    );

    return {
      text: entry.text,
      createdAt: entry.createdAt,
      lastAccessedAt: entry.lastAccessedAt,
    };
  }

  /**
   * Whether a live entry exists. Does not touch LRU order or statistics.
   */
  public has(fingerprint: string): boolean {
    const entry = this.cache.get(fingerprint);
    return entry !== undefined && !this.isExpired(entry, this.now());
  }

  /**
   * Insert or overwrite an entry.
   *
   * A new key at capacity evicts exactly the least recently accessed entry
   * first; overwriting an existing key never evicts.
   */
  public put(fingerprint: string, text: string): void {
    const now = this.now();

    if (this.cache.has(fingerprint)) {
      this.cache.delete(fingerprint);
    } else if (this.cache.size >= this.maxEntries) {
      this.evictLRU();
    }

    this.cache.set(fingerprint, {
      text,
      createdAt: now,
      lastAccessedAt: now,
      accessCount: 0,
    });

    lazyLog(
      this.logger,
      'debug',
      () => ({ fingerprint, chars: text.length, totalEntries: this.cache.size }),
      'Response cached'
    );
  }

  public delete(fingerprint: string): boolean {
    return this.cache.delete(fingerprint);
  }

  /**
   * Empty the cache (explicit invalidation). Statistics are kept.
   */
  public clear(): void {
    const cleared = this.cache.size;
    this.cache.clear();
    this.logger?.info({ cleared }, 'Response cache cleared');
  }

  public get size(): number {
    return this.cache.size;
  }

  /**
   * Remove every expired entry. No-op without a TTL.
   *
   * @returns number of entries removed
   */
  public cleanup(): number {
    if (this.ttlMs === 0) {
      return 0;
    }

    const now = this.now();
    let evicted = 0;
    for (const [fingerprint, entry] of Array.from(this.cache.entries())) {
      if (this.isExpired(entry, now)) {
        this.cache.delete(fingerprint);
        evicted++;
      }
    }

    if (evicted > 0) {
      this.stats.ttlEvictions += evicted;
      this.logger?.debug({ evicted, remaining: this.cache.size }, 'Cleaned up expired entries');
    }
    return evicted;
  }

  public getStats(): ResponseCacheStats {
    const total = this.stats.hits + this.stats.misses;
    return {
      size: this.cache.size,
      maxEntries: this.maxEntries,
      hits: this.stats.hits,
      misses: this.stats.misses,
      evictions: this.stats.evictions,
      ttlEvictions: this.stats.ttlEvictions,
      hitRate: total > 0 ? this.stats.hits / total : 0,
    };
  }

  /**
   * Save live entries to disk in LRU order (oldest first).
   * Logs and returns false on failure.
   */
  public save(): boolean {
    if (!this.persistence?.enabled) {
      return false;
    }

    const path = this.persistence.path;
    try {
      const dir = dirname(path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }

      const now = this.now();
      const entries: PersistedCacheEntry[] = [];
      for (const [key, entry] of this.cache.entries()) {
        if (!this.isExpired(entry, now)) {
          entries.push({ key, ...entry });
        }
      }

      writeFileSync(path, JSON.stringify(entries, null, 2), 'utf-8');
      this.logger?.debug({ path, entries: entries.length }, 'Cache persisted to disk');
      return true;
    } catch (error) {
      this.logger?.warn({ err: error, path }, 'Failed to save cache to disk');
      return false;
    }
  }

  /**
   * Load entries previously written by save(), skipping expired and
   * malformed ones, and respecting maxEntries (most recent entries win).
   *
   * @returns number of entries loaded
   */
  public load(): number {
    if (!this.persistence?.enabled) {
      return 0;
    }

    const path = this.persistence.path;
    if (!existsSync(path)) {
      this.logger?.debug({ path }, 'No persisted cache found');
      return 0;
    }

    try {
      const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
      if (!Array.isArray(parsed)) {
        this.logger?.warn({ path }, 'Persisted cache is not an array, ignoring');
        return 0;
      }

      const now = this.now();
      let loaded = 0;
      for (const candidate of parsed) {
        if (!isPersistedEntry(candidate)) {
          continue;
        }
        const { key, ...entry } = candidate;
        if (this.isExpired(entry, now)) {
          continue;
        }
        if (!this.cache.has(key) && this.cache.size >= this.maxEntries) {
          this.evictLRU();
        }
        this.cache.delete(key);
        this.cache.set(key, entry);
        loaded++;
      }

      this.logger?.info({ path, loaded, total: parsed.length }, 'Cache loaded from disk');
      return loaded;
    } catch (error) {
      this.logger?.warn({ err: error, path }, 'Failed to load cache from disk');
      return 0;
    }
  }

  private isExpired(entry: CacheEntry, now: number): boolean {
    return this.ttlMs > 0 && now - entry.createdAt >= this.ttlMs;
  }

  /**
   * Evict the least recently used entry (first key in the Map).
   */
  private evictLRU(): void {
    const oldest = this.cache.keys().next();
    if (oldest.done) {
      return;
    }

    this.cache.delete(oldest.value);
    this.stats.evictions++;
    lazyLog(this.logger, 'debug', () => ({ fingerprint: oldest.value }), 'Evicted LRU entry');
  }
}

function isPersistedEntry(value: unknown): value is PersistedCacheEntry {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.key === 'string' &&
    typeof record.text === 'string' &&
    typeof record.createdAt === 'number' &&
    typeof record.lastAccessedAt === 'number' &&
    typeof record.accessCount === 'number'
  );
}
