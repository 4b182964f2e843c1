/**
 * Core/shared types used across the CLI and services.
 */

import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type Database from 'better-sqlite3';
import type { AppSchema } from '../db/schema.js';

/**
 * Type-safe Drizzle database with full schema type information.
 */
export type AppDb = BetterSQLite3Database<AppSchema>;

/**
 * Database dependencies for repository factory functions.
 * Passed to repository factories instead of using service locator pattern.
 */
export interface DatabaseDeps {
  /** Drizzle ORM database instance with schema types */
  db: AppDb;
  /** Raw better-sqlite3 database instance for transactions and raw SQL */
  sqlite?: Database.Database;
}

/**
 * Unix time in seconds, fractional
 */
export type UnixSeconds = number;

/**
 * Source of the current time; injectable so runs can be replayed in tests
 */
export type Clock = () => UnixSeconds;

export const systemClock: Clock = () => Date.now() / 1000;
