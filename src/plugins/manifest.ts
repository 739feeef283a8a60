/**
 * Static manifest of built-in plugins.
 */

import type { CompletionFetcher } from '../core/refinement-loop.js';
import type { PluginManifestEntry } from '../types/index.js';
import { createExplainPlugin } from './explain.js';
import { createRefinePlugin } from './refine.js';

/**
 * Collaborators handed to built-in plugin factories.
 */
export interface PluginDeps {
  service: CompletionFetcher;
  refinement?: {
    maxIterations?: number;
    improvementThreshold?: number;
  };
}

export const BUILTIN_PLUGINS: readonly PluginManifestEntry<PluginDeps>[] = [
  {
    name: 'explain',
    description: 'Explain a code snippet',
    create: createExplainPlugin,
  },
  {
    name: 'refine',
    description: 'Iterative answer refinement',
    create: createRefinePlugin,
  },
];
