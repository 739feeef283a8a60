/**
 * Main type exports
 */

export * from './completion.js';
export * from './tasks.js';
export * from './plugins.js';
export * from './indexing.js';
