/**
 * Plugin Registry
 *
 * Builds optional assistant capabilities from a static manifest once, at
 * startup, and serves them read-only afterward.
 *
 * - A throwing factory is logged and recorded as a failure; siblings still load
 * - A plugin whose declared dependency is missing, failed or circular is not
 *   registered
 * - Dependencies load before their dependents regardless of manifest order
 * - preload() runs once; later calls return the first report
 */

import type { Logger } from 'pino';
import { CompletionError } from '../api/errors.js';
import type {
  AssistantPlugin,
  PluginLoadResult,
  PluginManifestEntry,
  PluginPreloadReport,
} from '../types/index.js';

export interface PluginRegistryConfig<TDeps> {
  manifest: readonly PluginManifestEntry<TDeps>[];

  /** Collaborators handed to every factory */
  deps: TDeps;

  logger?: Logger;
}

export class PluginRegistry<TDeps = unknown> {
  private readonly manifest: Map<string, PluginManifestEntry<TDeps>>;
  private readonly deps: TDeps;
  private readonly logger?: Logger;

  private readonly plugins = new Map<string, AssistantPlugin>();
  private preloading?: Promise<PluginPreloadReport>;
  private report?: PluginPreloadReport;

  constructor(config: PluginRegistryConfig<TDeps>) {
    this.manifest = new Map();
    for (const entry of config.manifest) {
      if (this.manifest.has(entry.name)) {
        throw new Error(`PluginRegistry: duplicate plugin name '${entry.name}' in manifest`);
      }
      this.manifest.set(entry.name, entry);
    }
    this.deps = config.deps;
    this.logger = config.logger;
  }

  /**
   * Construct every manifest entry. Never rejects: failures are reported.
   */
  public preload(): Promise<PluginPreloadReport> {
    this.preloading ??= this.preloadAll();
    return this.preloading;
  }

  public get(name: string): AssistantPlugin | undefined {
    return this.plugins.get(name);
  }

  /**
   * Names of registered plugins in load order.
   */
  public list(): string[] {
    return Array.from(this.plugins.keys());
  }

  /**
   * Declared dependencies of a manifest entry (empty for unknown names).
   */
  public getDependencies(name: string): string[] {
    return [...(this.manifest.get(name)?.dependencies ?? [])];
  }

  /**
   * Manifest entries that declare `name` as a dependency.
   */
  public getDependents(name: string): string[] {
    const dependents: string[] = [];
    for (const entry of this.manifest.values()) {
      if (entry.dependencies?.includes(name)) {
        dependents.push(entry.name);
      }
    }
    return dependents;
  }

  public getReport(): PluginPreloadReport | undefined {
    return this.report;
  }

  private async preloadAll(): Promise<PluginPreloadReport> {
    this.logger?.info({ pluginCount: this.manifest.size }, 'Starting plugin preload');

    const outcomes = new Map<string, PluginLoadResult>();
    for (const entry of this.manifest.values()) {
      await this.load(entry, [], outcomes);
    }

    // report in manifest order
    const results = Array.from(this.manifest.keys()).flatMap((name) => {
      const result = outcomes.get(name);
      return result ? [result] : [];
    });
    const successful = results.filter((r) => r.success).length;

    this.report = {
      total: results.length,
      successful,
      failed: results.length - successful,
      results,
    };

    this.logger?.info(
      { successful, failed: this.report.failed, total: this.report.total },
      `Plugin preload complete: ${successful}/${this.report.total} successful`
    );
    return this.report;
  }

  private async load(
    entry: PluginManifestEntry<TDeps>,
    chain: readonly string[],
    outcomes: Map<string, PluginLoadResult>
  ): Promise<PluginLoadResult> {
    const known = outcomes.get(entry.name);
    if (known) {
      return known;
    }

    const startTime = performance.now();
    const settle = (result: PluginLoadResult): PluginLoadResult => {
      outcomes.set(entry.name, result);
      return result;
    };

    if (chain.includes(entry.name)) {
      return this.fail(entry.name, startTime, `circular dependency: ${[...chain, entry.name].join(' -> ')}`);
    }

    for (const dependency of entry.dependencies ?? []) {
      const dependencyEntry = this.manifest.get(dependency);
      if (!dependencyEntry) {
        return settle(this.fail(entry.name, startTime, `missing dependency '${dependency}'`));
      }
      const outcome = await this.load(dependencyEntry, [...chain, entry.name], outcomes);
      if (!outcome.success) {
        return settle(this.fail(entry.name, startTime, `dependency '${dependency}' failed to load`));
      }
    }

    try {
      const plugin = entry.create(this.deps, this.logger?.child({ plugin: entry.name }));
      this.plugins.set(entry.name, plugin);
      const loadTimeMs = performance.now() - startTime;
      this.logger?.debug({ plugin: entry.name, loadTimeMs: Math.round(loadTimeMs) }, 'Plugin loaded');
      return settle({ name: entry.name, success: true, loadTimeMs });
    } catch (error) {
      return settle(this.fail(entry.name, startTime, 'factory threw', error));
    }
  }

  private fail(name: string, startTime: number, reason: string, cause?: unknown): PluginLoadResult {
    const causeMessage = cause instanceof Error ? `: ${cause.message}` : cause === undefined ? '' : `: ${String(cause)}`;
    const error = new CompletionError(
      'PluginError',
      `Plugin '${name}' not registered, ${reason}${causeMessage}`,
      { plugin: name },
      { cause }
    );
    this.logger?.error({ plugin: name, err: error }, `Failed to load plugin: ${name}`);
    return { name, success: false, loadTimeMs: performance.now() - startTime, error };
  }
}
