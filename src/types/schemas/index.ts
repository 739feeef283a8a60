/**
 * Zod schema exports
 */

export * from './common.js';
export * from './completion.js';
export * from './config.js';
