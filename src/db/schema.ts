/**
 * Database Schema
 *
 * Re-exports all schema definitions from the modular schema/ directory.
 * Import from this file for convenience.
 */

import type * as tables from './schema/index.js';

export * from './schema/index.js';

export type AppSchema = typeof tables;
