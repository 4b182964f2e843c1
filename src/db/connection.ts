/**
 * Database Connection Module
 *
 * Opens the SQLite database, applies migrations and provides the
 * transaction helper every mutating repository call goes through.
 */

import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import * as schema from './schema.js';
import type { DatabaseDeps } from '../core/types.js';
import { createComponentLogger } from '../utils/logger.js';
import { config } from '../config/index.js';
import { DatabaseError, ErrorCodes } from '../core/errors.js';
import { initializeDatabase } from './init.js';

const logger = createComponentLogger('connection');

export interface ConnectionOptions {
  dbPath?: string;
  readonly?: boolean;
  skipInit?: boolean;
}

export interface DatabaseConnection extends DatabaseDeps {
  sqlite: Database.Database;
}

/**
 * Open a database connection with WAL and foreign keys enabled, applying
 * pending migrations unless skipped.
 */
export function openDatabase(options: ConnectionOptions = {}): DatabaseConnection {
  const dbPath = options.dbPath ?? config.database.path;

  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath, {
    readonly: options.readonly ?? false,
  });
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma(`busy_timeout = ${config.database.busyTimeoutMs}`);

  const skipInit = options.skipInit ?? config.database.skipInit;
  if (!skipInit && !options.readonly) {
    const result = initializeDatabase(sqlite, { verbose: config.database.verbose });
    if (!result.success) {
      sqlite.close();
      throw new DatabaseError(
        `Database initialization failed: ${result.errors.join('; ')}`,
        ErrorCodes.MIGRATION_ERROR,
        { dbPath }
      );
    }
    if (result.migrationsApplied.length > 0) {
      logger.info({ migrations: result.migrationsApplied }, 'Applied migrations');
    }
  }

  const db = drizzle(sqlite, { schema });
  return { db, sqlite };
}

/**
 * Close a connection opened by openDatabase.
 */
export function closeDatabase(connection: DatabaseConnection): void {
  if (connection.sqlite.open) {
    connection.sqlite.close();
  }
}

// =============================================================================
// TRANSACTION RETRY LOGIC
// =============================================================================

/**
 * Error codes that indicate transient database contention issues
 * that may succeed on retry.
 */
const RETRYABLE_ERROR_PATTERNS = [
  'SQLITE_BUSY',
  'SQLITE_LOCKED',
  'SQLITE_PROTOCOL',
  'database is locked',
  'database is busy',
];

/**
 * Check if an error is retryable (transient database contention).
 */
export function isRetryableDbError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const message = error.message.toLowerCase();
  const code = 'code' in error ? String(error.code).toUpperCase() : '';

  return RETRYABLE_ERROR_PATTERNS.some(
    (pattern) => message.includes(pattern.toLowerCase()) || code.includes(pattern.toUpperCase())
  );
}

export interface TransactionRetryOptions {
  /** Maximum number of retry attempts (default: config.transaction.maxRetries) */
  maxRetries?: number;
  /** Initial delay in ms before first retry (default: config.transaction.initialDelayMs) */
  initialDelayMs?: number;
  /** Maximum delay cap in ms (default: config.transaction.maxDelayMs) */
  maxDelayMs?: number;
  /** Backoff multiplier for exponential delay (default: config.transaction.backoffMultiplier) */
  backoffMultiplier?: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run a transaction with exponential backoff retry for transient errors.
 *
 * `fn` runs inside better-sqlite3's synchronous transaction(); any throw
 * rolls back everything it wrote. Without a raw sqlite handle the function
 * runs directly.
 *
 * @throws The last error if all retries fail
 */
export async function transactionWithRetry<T>(
  sqlite: Database.Database | undefined,
  fn: () => T,
  options?: TransactionRetryOptions
): Promise<T> {
  if (!sqlite) {
    return fn();
  }

  const maxRetries = options?.maxRetries ?? config.transaction.maxRetries;
  const initialDelay = options?.initialDelayMs ?? config.transaction.initialDelayMs;
  const maxDelay = options?.maxDelayMs ?? config.transaction.maxDelayMs;
  const multiplier = options?.backoffMultiplier ?? config.transaction.backoffMultiplier;

  let lastError: unknown;
  let delay = initialDelay;

  for (let attempt = 1; attempt <= maxRetries + 1; attempt++) {
    try {
      return sqlite.transaction(fn)();
    } catch (error) {
      lastError = error;

      const isRetryable = isRetryableDbError(error);
      const hasMoreAttempts = attempt <= maxRetries;

      if (!isRetryable || !hasMoreAttempts) {
        logger.debug(
          {
            error: error instanceof Error ? error.message : String(error),
            attempt,
            retryable: isRetryable,
          },
          'Transaction failed'
        );
        throw error;
      }

      logger.debug({ attempt, nextDelayMs: delay }, 'Retrying transaction after transient error');

      await sleep(delay);
      delay = Math.min(delay * multiplier, maxDelay);
    }
  }

  throw lastError ?? new Error('Transaction failed with unknown error');
}

export { schema };
