/**
 * `explain` plugin: asks for an explanation of a code snippet.
 */

import type { Logger } from 'pino';
import { CompletionError } from '../api/errors.js';
import type { AssistantPlugin } from '../types/index.js';
import type { PluginDeps } from './manifest.js';

export const EXPLAIN_PROMPT_PREFIX = 'Explain the following code:\n\n';

export function createExplainPlugin(deps: PluginDeps, logger?: Logger): AssistantPlugin {
  return {
    name: 'explain',
    description: 'Explain a code snippet in plain language',
    async run(args, options = {}) {
      const code = args.join(' ').trim();
      if (code === '') {
        throw new CompletionError('InvalidParams', 'explain: no code given');
      }

      logger?.debug({ chars: code.length }, 'Explaining code');
      const result = await deps.service.getCompletion(`${EXPLAIN_PROMPT_PREFIX}${code}`, [], {
        signal: options.signal,
      });
      return result.text;
    },
  };
}
