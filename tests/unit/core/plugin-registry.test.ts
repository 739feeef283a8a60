import { describe, it, expect, vi } from 'vitest';
import { pino } from 'pino';
import { CompletionError } from '../../../src/api/errors.js';
import { PluginRegistry } from '../../../src/core/plugin-registry.js';
import type { AssistantPlugin, PluginManifestEntry } from '../../../src/types/index.js';

const logger = pino({ level: 'silent' });

interface Deps {
  greeting: string;
}

function plugin(name: string, output = name): AssistantPlugin {
  return {
    name,
    description: `${name} plugin`,
    run: async () => output,
  };
}

function entry(name: string, dependencies?: string[]): PluginManifestEntry<Deps> {
  return { name, dependencies, create: () => plugin(name) };
}

function broken(name: string, message = 'kaput'): PluginManifestEntry<Deps> {
  return {
    name,
    create: () => {
      throw new Error(message);
    },
  };
}

describe('PluginRegistry', () => {
  it('constructs every manifest entry once and serves it by name', async () => {
    const create = vi.fn((deps: Deps) => plugin('greet', deps.greeting));
    const registry = new PluginRegistry<Deps>({
      manifest: [{ name: 'greet', create }, entry('other')],
      deps: { greeting: 'hello' },
      logger,
    });

    const report = await registry.preload();

    expect(report).toMatchObject({ total: 2, successful: 2, failed: 0 });
    expect(registry.list()).toEqual(['greet', 'other']);
    await expect(registry.get('greet')?.run([])).resolves.toBe('hello');
    expect(registry.get('missing')).toBeUndefined();
    expect(create).toHaveBeenCalledOnce();
  });

  it('records a throwing factory and keeps its siblings', async () => {
    const registry = new PluginRegistry<Deps>({
      manifest: [entry('first'), broken('bad'), entry('last')],
      deps: { greeting: '' },
      logger,
    });

    const report = await registry.preload();

    expect(report).toMatchObject({ total: 3, successful: 2, failed: 1 });
    expect(registry.list()).toEqual(['first', 'last']);

    const failure = report.results.find((r) => r.name === 'bad');
    expect(failure?.success).toBe(false);
    expect(failure?.error).toBeInstanceOf(CompletionError);
    expect(failure?.error?.message).toBe("Plugin 'bad' not registered, factory threw: kaput");
  });

  it('does not register a plugin whose dependency failed', async () => {
    const registry = new PluginRegistry<Deps>({
      manifest: [broken('base'), entry('dependent', ['base'])],
      deps: { greeting: '' },
      logger,
    });

    const report = await registry.preload();

    expect(registry.get('dependent')).toBeUndefined();
    expect(report.results.map((r) => [r.name, r.success])).toEqual([
      ['base', false],
      ['dependent', false],
    ]);
    expect(report.results[1]?.error?.message).toBe(
      "Plugin 'dependent' not registered, dependency 'base' failed to load"
    );
  });

  it('does not register a plugin with a missing dependency', async () => {
    const registry = new PluginRegistry<Deps>({
      manifest: [entry('orphan', ['ghost'])],
      deps: { greeting: '' },
      logger,
    });

    const report = await registry.preload();

    expect(registry.list()).toEqual([]);
    expect(report.results[0]?.error?.message).toBe("Plugin 'orphan' not registered, missing dependency 'ghost'");
  });

  it('loads dependencies before dependents regardless of manifest order', async () => {
    const registry = new PluginRegistry<Deps>({
      manifest: [entry('top', ['base']), entry('base')],
      deps: { greeting: '' },
    });

    const report = await registry.preload();

    expect(registry.list()).toEqual(['base', 'top']);
    expect(report.results.map((r) => r.name)).toEqual(['top', 'base']);
  });

  it('rejects circular dependencies', async () => {
    const registry = new PluginRegistry<Deps>({
      manifest: [entry('a', ['b']), entry('b', ['a'])],
      deps: { greeting: '' },
      logger,
    });

    const report = await registry.preload();

    expect(report.failed).toBe(2);
    expect(registry.list()).toEqual([]);
  });

  it('runs preload only once', async () => {
    const create = vi.fn(() => plugin('once'));
    const registry = new PluginRegistry<Deps>({ manifest: [{ name: 'once', create }], deps: { greeting: '' } });

    const first = await registry.preload();
    const second = await registry.preload();

    expect(second).toBe(first);
    expect(registry.getReport()).toBe(first);
    expect(create).toHaveBeenCalledOnce();
  });

  it('answers dependency queries from the manifest', () => {
    const registry = new PluginRegistry<Deps>({
      manifest: [entry('base'), entry('left', ['base']), entry('right', ['base', 'left'])],
      deps: { greeting: '' },
    });

    expect(registry.getDependencies('right')).toEqual(['base', 'left']);
    expect(registry.getDependencies('unknown')).toEqual([]);
    expect(registry.getDependents('base')).toEqual(['left', 'right']);
    expect(registry.getDependents('right')).toEqual([]);
    expect(registry.getReport()).toBeUndefined();
  });

  it('rejects duplicate names', () => {
    expect(
      () => new PluginRegistry<Deps>({ manifest: [entry('dup'), entry('dup')], deps: { greeting: '' } })
    ).toThrow("PluginRegistry: duplicate plugin name 'dup' in manifest");
  });
});
