import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as yaml from 'js-yaml';
import {
  deepMerge,
  getConfig,
  initializeConfig,
  loadConfig,
  resetConfig,
  toServiceOptions,
  validateConfig,
} from '../../../src/config/loader.js';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';

describe('Config Loader', () => {
  let testConfigDir: string;

  beforeEach(() => {
    testConfigDir = mkdtempSync(join(tmpdir(), 'config-'));
    resetConfig();
  });

  afterEach(() => {
    rmSync(testConfigDir, { recursive: true, force: true });
    resetConfig();
    vi.unstubAllEnvs();
  });

  function writeConfig(content: unknown): string {
    const path = join(testConfigDir, 'runtime.yaml');
    writeFileSync(path, yaml.dump(content));
    return path;
  }

  describe('loadConfig', () => {
    it('applies the test environment overrides from runtime.yaml', () => {
      const config = loadConfig(undefined, 'test');

      expect(config.client.max_attempts).toBe(3);
      expect(config.client.request_timeout_ms).toBe(1000);
      expect(config.task_queue.drain_timeout_ms).toBe(2000);
      expect(config.logging.level).toBe('silent');
      expect(config.cache.max_entries).toBe(512);
    });

    it('deep-merges production overrides and keeps sibling keys', () => {
      const config = loadConfig(undefined, 'production');

      expect(config.cache.max_entries).toBe(2048);
      expect(config.cache.persistence).toEqual({ enabled: true, path: '.completion-relay/cache.json' });
      expect(config.logging.level).toBe('warn');
      expect(config.client.max_attempts).toBe(5);
    });

    it('matches the in-code defaults outside any environment override', () => {
      const config = loadConfig(undefined, 'development');

      expect(config).toEqual({ ...DEFAULT_CONFIG, logging: { level: 'debug' } });
    });

    it('reads the environment from NODE_ENV', () => {
      vi.stubEnv('NODE_ENV', 'production');

      expect(loadConfig().logging.level).toBe('warn');
    });

    it('treats an unknown NODE_ENV as development', () => {
      vi.stubEnv('NODE_ENV', 'staging');

      expect(loadConfig().logging.level).toBe('debug');
    });

    it('loads a custom file without environments', () => {
      const path = writeConfig({ ...DEFAULT_CONFIG, service: { single_flight: true } });

      expect(loadConfig(path, 'test').service.single_flight).toBe(true);
    });

    it('fails for a missing file', () => {
      const path = join(testConfigDir, 'absent.yaml');

      expect(() => loadConfig(path)).toThrow(`Configuration file not found: ${path}`);
    });

    it('fails for a file that is not a mapping', () => {
      const path = writeConfig(['not', 'a', 'mapping']);

      expect(() => loadConfig(path)).toThrow(`Failed to load configuration: ${path} does not contain a mapping`);
    });
  });

  describe('validateConfig', () => {
    it('accepts the defaults', () => {
      expect(validateConfig(DEFAULT_CONFIG)).toEqual(DEFAULT_CONFIG);
    });

    it('rejects an overlap that reaches the chunk size', () => {
      const invalid = { ...DEFAULT_CONFIG, indexing: { ...DEFAULT_CONFIG.indexing, chunk_overlap: 1000 } };

      expect(() => validateConfig(invalid)).toThrow(
        'Configuration validation failed:\nindexing.chunk_overlap must be < chunk_size'
      );
    });

    it('rejects a max backoff below the base', () => {
      const invalid = {
        ...DEFAULT_CONFIG,
        client: { ...DEFAULT_CONFIG.client, base_backoff_ms: 100, max_backoff_ms: 10 },
      };

      expect(() => validateConfig(invalid)).toThrow('client.max_backoff_ms must be >= base_backoff_ms');
    });

    it('rejects non-positive attempts', () => {
      const invalid = { ...DEFAULT_CONFIG, client: { ...DEFAULT_CONFIG.client, max_attempts: 0 } };

      expect(() => validateConfig(invalid)).toThrow('client.max_attempts Must be a positive integer');
    });
  });

  describe('global config', () => {
    it('caches the loaded configuration until reset', () => {
      const path = writeConfig(DEFAULT_CONFIG);

      const initialized = initializeConfig(path, 'test');
      expect(getConfig()).toBe(initialized);

      resetConfig();
      vi.stubEnv('NODE_ENV', 'test');
      expect(getConfig()).not.toBe(initialized);
      expect(getConfig().logging.level).toBe('silent');
    });
  });

  describe('toServiceOptions', () => {
    it('maps snake_case configuration to component options', () => {
      const options = toServiceOptions(DEFAULT_CONFIG);

      expect(options.client).toEqual({
        maxAttempts: 5,
        requestTimeoutMs: 30_000,
        backoff: { baseDelayMs: 500, maxDelayMs: 30_000, jitterRatio: 0.5, retryTransportErrors: true },
      });
      expect(options.cache).toEqual({
        maxEntries: 512,
        ttlMs: 0,
        persistence: { enabled: false, path: '.completion-relay/cache.json' },
      });
      expect(options.singleFlight).toBe(false);
      expect(options.taskQueue).toEqual({ maxHistory: 100, drainTimeoutMs: 30_000 });
      expect(options.indexing.chunkSize).toBe(1000);
      expect(options.refinement).toEqual({ maxIterations: 5, improvementThreshold: 0.1 });
      expect(options.logLevel).toBe('info');
    });
  });

  describe('deepMerge', () => {
    it('merges nested records and replaces arrays', () => {
      expect(deepMerge({ a: { b: 1, c: [1, 2] }, d: 1 }, { a: { c: [3] }, e: 2 })).toEqual({
        a: { b: 1, c: [3] },
        d: 1,
        e: 2,
      });
    });
  });
});
