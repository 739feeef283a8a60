/**
 * `refine` plugin: runs the refinement loop on a prompt and returns the
 * final draft.
 */

import type { Logger } from 'pino';
import { CompletionError } from '../api/errors.js';
import { refine } from '../core/refinement-loop.js';
import type { AssistantPlugin } from '../types/index.js';
import type { PluginDeps } from './manifest.js';

export function createRefinePlugin(deps: PluginDeps, logger?: Logger): AssistantPlugin {
  return {
    name: 'refine',
    description: 'Iteratively refine an answer until drafts stop changing',
    async run(args, options = {}) {
      const prompt = args.join(' ').trim();
      if (prompt === '') {
        throw new CompletionError('InvalidParams', 'refine: no prompt given');
      }

      const result = await refine(deps.service, prompt, {
        ...deps.refinement,
        signal: options.signal,
        logger,
      });
      return result.text;
    },
  };
}
