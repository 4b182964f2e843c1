/**
 * Database initialization and migration module
 *
 * Applies the SQL migrations in src/db/migrations in order and records
 * each one in a `_migrations` table so reopening a database is a no-op.
 */

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import type Database from 'better-sqlite3';
import { createComponentLogger } from '../utils/logger.js';

const logger = createComponentLogger('init');

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export interface InitResult {
  success: boolean;
  alreadyInitialized: boolean;
  migrationsApplied: string[];
  errors: string[];
}

/**
 * Create the migrations tracking table if it doesn't exist
 */
function ensureMigrationTable(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      applied_at TEXT DEFAULT CURRENT_TIMESTAMP NOT NULL
    )
  `);
}

function getAppliedMigrations(sqlite: Database.Database): Set<string> {
  ensureMigrationTable(sqlite);

  const rows = sqlite.prepare('SELECT name FROM _migrations ORDER BY id').all() as {
    name: string;
  }[];
  return new Set(rows.map((r) => r.name));
}

/**
 * Get all migration files from the migrations directory
 */
export function getMigrationFiles(): Array<{ name: string; path: string }> {
  // src/db/migrations when running from sources, dist/db -> src/db/migrations after a build
  const possiblePaths = [
    resolve(__dirname, 'migrations'),
    resolve(__dirname, '../../src/db/migrations'),
  ];

  const migrationsDir = possiblePaths.find((path) => existsSync(path));
  if (!migrationsDir) {
    return [];
  }

  return readdirSync(migrationsDir)
    .filter((f) => f.endsWith('.sql'))
    .sort()
    .map((file) => ({ name: file, path: resolve(migrationsDir, file) }));
}

/**
 * Split a migration file on drizzle-kit's statement-breakpoint markers
 */
export function splitStatements(sql: string): string[] {
  return sql
    .split(/-->\s*statement-breakpoint/i)
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
}

/**
 * Initialize the database with all pending migrations.
 *
 * Idempotent: only migrations missing from `_migrations` are applied, all
 * of them inside one transaction.
 */
export function initializeDatabase(
  sqlite: Database.Database,
  options: { verbose?: boolean } = {}
): InitResult {
  const result: InitResult = {
    success: false,
    alreadyInitialized: false,
    migrationsApplied: [],
    errors: [],
  };

  try {
    const appliedMigrations = getAppliedMigrations(sqlite);
    const migrationFiles = getMigrationFiles();

    if (migrationFiles.length === 0) {
      result.errors.push('No migration files found in src/db/migrations/');
      return result;
    }

    const pendingMigrations = migrationFiles.filter((m) => !appliedMigrations.has(m.name));

    if (pendingMigrations.length === 0) {
      result.success = true;
      result.alreadyInitialized = true;
      return result;
    }

    sqlite.transaction(() => {
      for (const migration of pendingMigrations) {
        if (options.verbose) {
          logger.info({ migration: migration.name }, 'Applying migration');
        }
        for (const statement of splitStatements(readFileSync(migration.path, 'utf-8'))) {
          sqlite.exec(statement);
        }
        sqlite.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
        result.migrationsApplied.push(migration.name);
      }
    })();

    result.success = true;
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    result.errors.push(message);
    logger.error({ error: message }, 'Database initialization failed');
  }

  return result;
}
