/**
 * Schema barrel
 */

export * from './types.js';
export * from './catalogs.js';
export * from './clients.js';
export * from './flags.js';
export * from './opinions.js';
export * from './votes.js';
