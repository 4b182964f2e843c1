import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import * as schema from '../../src/db/schema.js';
import { applyMigrations } from './migration-loader.js';
import { cleanupDbFiles, ensureDataDirectory } from './db-utils.js';
import { createRepositories } from '../../src/core/factory/repositories.js';
import { createAppContext } from '../../src/core/factory.js';
import type { AppContext } from '../../src/core/context.js';
import type { AppDb, Clock } from '../../src/core/types.js';
import type { Repositories } from '../../src/core/interfaces/repositories.js';
import { config } from '../../src/config/index.js';

// Re-export schema for use in tests
export { schema };

export interface TestDb {
  sqlite: Database.Database;
  db: AppDb;
  path: string;
}

/**
 * Create a fresh database file with all migrations applied
 */
export function setupTestDb(dbPath: string): TestDb {
  ensureDataDirectory();
  cleanupDbFiles(dbPath);

  const sqlite = new Database(dbPath);
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');

  const db = drizzle(sqlite, { schema });

  applyMigrations(sqlite);

  return { sqlite, db, path: dbPath };
}

/**
 * Close the test database and delete its files
 */
export function cleanupTestDb(testDb: TestDb): void {
  if (testDb.sqlite.open) {
    testDb.sqlite.close();
  }
  cleanupDbFiles(testDb.path);
}

/**
 * Create repositories for unit tests that don't need full AppContext.
 */
export function createTestRepositories(testDb: TestDb): Repositories {
  return createRepositories({ db: testDb.db, sqlite: testDb.sqlite });
}

/**
 * Create an AppContext over a test database with a controllable clock
 */
export function createTestContext(testDb: TestDb, clock: Clock): AppContext {
  return createAppContext(config, {
    connection: { db: testDb.db, sqlite: testDb.sqlite },
    clock,
  });
}

/**
 * Manually advanced clock, in Unix seconds
 */
export interface FakeClock {
  now: Clock;
  set(time: number): void;
  advance(seconds: number): void;
}

export function createFakeClock(start: number): FakeClock {
  let current = start;
  return {
    now: () => current,
    set(time) {
      current = time;
    },
    advance(seconds) {
      current += seconds;
    },
  };
}

// =============================================================================
// ENTITY FACTORIES
// =============================================================================

export function createTestRevision(db: AppDb, name: string = 'r1'): schema.Revision {
  return db.insert(schema.revisions).values({ name }).returning().get();
}

export function createTestOpinionType(db: AppDb, name: string = 'manual'): schema.OpinionType {
  return db.insert(schema.opinionTypes).values({ name }).returning().get();
}

export function createTestFlagType(db: AppDb, name: string = 'vote'): schema.FlagType {
  return db.insert(schema.flagTypes).values({ name }).returning().get();
}

export function createTestUser(db: AppDb, userName: string): schema.User {
  return db.insert(schema.users).values({ userName }).returning().get();
}

export function createTestClient(
  db: AppDb,
  clientName: string = 'test-client',
  clientVersion: string = '1.0'
): schema.Client {
  return db.insert(schema.clients).values({ clientName, clientVersion }).returning().get();
}

export interface TestOpinionInput {
  typeId: number;
  userId: number;
  revisionId: number;
  clientId: number;
  lsd: number;
  decision: schema.Decision;
  time: number;
  metadata?: schema.DataMetadata;
}

/**
 * Insert an opinion row directly, bypassing the service
 */
export function createTestOpinion(db: AppDb, input: TestOpinionInput): schema.OpinionRow {
  return db
    .insert(schema.opinions)
    .values({
      typeId: input.typeId,
      userId: input.userId,
      revisionId: input.revisionId,
      clientId: input.clientId,
      lsd: input.lsd,
      decision: input.decision,
      creationTime: input.time,
      lastEdit: input.time,
      metadata: input.metadata ?? null,
    })
    .returning()
    .get();
}
