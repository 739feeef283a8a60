/**
 * Plugin registry types
 */

import type { Logger } from 'pino';

/**
 * Capability object exposed to callers through the registry.
 */
export interface AssistantPlugin {
  readonly name: string;
  readonly description: string;
  run(args: readonly string[], options?: { signal?: AbortSignal }): Promise<string>;
}

/**
 * Static manifest entry. The factory is invoked once during preload.
 */
export interface PluginManifestEntry<TDeps = unknown> {
  name: string;
  description?: string;
  dependencies?: string[];
  create(deps: TDeps, logger?: Logger): AssistantPlugin;
}

export interface PluginLoadResult {
  name: string;
  success: boolean;
  loadTimeMs: number;
  error?: Error;
}

export interface PluginPreloadReport {
  total: number;
  successful: number;
  failed: number;
  results: PluginLoadResult[];
}
