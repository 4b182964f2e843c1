/**
 * Migration Loader Utility
 *
 * Applies the SQL migrations to a test database without the `_migrations`
 * bookkeeping, so tests exercise the same DDL as production.
 */

import type Database from 'better-sqlite3';
import { readFileSync } from 'node:fs';
import { getMigrationFiles, splitStatements } from '../../src/db/init.js';

/**
 * Apply all migrations to a SQLite database instance.
 *
 * @param sqlite - The better-sqlite3 database instance
 */
export function applyMigrations(sqlite: Database.Database): void {
  for (const migration of getMigrationFiles()) {
    for (const statement of splitStatements(readFileSync(migration.path, 'utf-8'))) {
      sqlite.exec(statement);
    }
  }
}
