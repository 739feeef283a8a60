/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides,
 * validates it with zod and converts it into component options.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import type { LevelWithSilent } from 'pino';
import type { BackoffPolicyConfig } from '../core/backoff-policy.js';
import { RuntimeConfigSchema, type RuntimeConfig } from '../types/schemas/config.js';

/**
 * Validated configuration (matches runtime.yaml structure, minus `environments`)
 */
export type Config = RuntimeConfig;

export type ConfigEnvironment = 'production' | 'development' | 'test';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. Arrays and scalars from `source` replace.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = output[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

export function getDefaultConfigPath(): string {
  return join(findPackageRoot(), 'config', 'runtime.yaml');
}

function resolveEnvironment(environment?: ConfigEnvironment): ConfigEnvironment {
  const env = environment ?? process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
}

/**
 * Load and validate configuration from a YAML file.
 *
 * @param configPath - defaults to `config/runtime.yaml` in the package root
 * @param environment - defaults to NODE_ENV (anything else means development)
 */
export function loadConfig(configPath?: string, environment?: ConfigEnvironment): Config {
  const finalPath = configPath ?? getDefaultConfigPath();

  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(finalPath, 'utf8'));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new Error(
        `Configuration file not found: ${finalPath}. ` +
          `Please ensure config/runtime.yaml exists in the project root.`,
        { cause: error }
      );
    }
    throw new Error(`Failed to load configuration: ${String(error)}`, { cause: error });
  }

  if (!isPlainObject(parsed)) {
    throw new Error(`Failed to load configuration: ${finalPath} does not contain a mapping`);
  }

  const { environments, ...base } = parsed;
  const env = resolveEnvironment(environment);
  const overrides = isPlainObject(environments) ? environments[env] : undefined;
  const merged = isPlainObject(overrides) ? deepMerge(base, overrides) : base;

  return validateConfig(merged);
}

/**
 * Validate configuration values.
 *
 * @throws Error listing every failing field path
 */
export function validateConfig(config: unknown): Config {
  const parseResult = RuntimeConfigSchema.safeParse(config);
  if (!parseResult.success) {
    const errors = parseResult.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${field} ${issue.message}`;
    });

    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }
  return parseResult.data;
}

/**
 * Global configuration instance
 */
let globalConfig: Config | null = null;

export function initializeConfig(configPath?: string, environment?: ConfigEnvironment): Config {
  globalConfig = loadConfig(configPath, environment);
  return globalConfig;
}

/**
 * Get global configuration, loading the default file on first use.
 */
export function getConfig(): Config {
  if (!globalConfig) {
    globalConfig = initializeConfig();
  }
  return globalConfig;
}

/**
 * Reset global configuration (for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}

/**
 * Component options derived from configuration (camelCase).
 */
export interface ServiceOptions {
  client: {
    maxAttempts: number;
    requestTimeoutMs: number;
    backoff: BackoffPolicyConfig;
  };
  cache: {
    maxEntries: number;
    ttlMs: number;
    persistence: { enabled: boolean; path: string };
  };
  singleFlight: boolean;
  taskQueue: {
    maxHistory: number;
    drainTimeoutMs: number;
  };
  indexing: {
    chunkSize: number;
    chunkOverlap: number;
    extensions: string[];
    maxFileBytes: number;
  };
  refinement: {
    maxIterations: number;
    improvementThreshold: number;
  };
  logLevel: LevelWithSilent;
}

/**
 * Convert YAML config (snake_case) to component options (camelCase)
 */
export function toServiceOptions(config: Config): ServiceOptions {
  return {
    client: {
      maxAttempts: config.client.max_attempts,
      requestTimeoutMs: config.client.request_timeout_ms,
      backoff: {
        baseDelayMs: config.client.base_backoff_ms,
        maxDelayMs: config.client.max_backoff_ms,
        jitterRatio: config.client.jitter_ratio,
        retryTransportErrors: config.client.retry_transport_errors,
      },
    },
    cache: {
      maxEntries: config.cache.max_entries,
      ttlMs: config.cache.ttl_ms,
      persistence: { ...config.cache.persistence },
    },
    singleFlight: config.service.single_flight,
    taskQueue: {
      maxHistory: config.task_queue.max_history,
      drainTimeoutMs: config.task_queue.drain_timeout_ms,
    },
    indexing: {
      chunkSize: config.indexing.chunk_size,
      chunkOverlap: config.indexing.chunk_overlap,
      extensions: [...config.indexing.extensions],
      maxFileBytes: config.indexing.max_file_bytes,
    },
    refinement: {
      maxIterations: config.refinement.max_iterations,
      improvementThreshold: config.refinement.improvement_threshold,
    },
    logLevel: config.logging.level,
  };
}
