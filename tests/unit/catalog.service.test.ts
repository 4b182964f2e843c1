/**
 * Unit tests for CatalogService
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  setupTestDb,
  cleanupTestDb,
  createTestContext,
  createFakeClock,
  type TestDb,
} from '../fixtures/test-helpers.js';
import type { AppContext } from '../../src/core/context.js';
import { ConflictError } from '../../src/core/errors.js';

const TEST_DB_PATH = './data/test-catalog-service.db';

let testDb: TestDb;
let ctx: AppContext;

describe('CatalogService', () => {
  beforeEach(() => {
    testDb = setupTestDb(TEST_DB_PATH);
    ctx = createTestContext(testDb, createFakeClock(0).now);
  });

  afterEach(() => {
    cleanupTestDb(testDb);
  });

  describe('revisions', () => {
    it('should create and list revisions in creation order', async () => {
      await ctx.services.catalog.createRevision('rev_02', 'second pass');
      await ctx.services.catalog.createRevision('rev_01');

      const revisions = await ctx.services.catalog.listRevisions();

      expect(revisions.map((r) => r.name)).toEqual(['rev_02', 'rev_01']);
      expect(revisions[0]?.description).toBe('second pass');
    });

    it('should reject duplicate names', async () => {
      await ctx.services.catalog.createRevision('r1');

      await expect(ctx.services.catalog.createRevision('r1')).rejects.toBeInstanceOf(ConflictError);
    });

    it('should bound the name length', async () => {
      await expect(ctx.services.catalog.createRevision('x'.repeat(33))).rejects.toMatchObject({
        code: 'E1005',
      });
      await expect(ctx.services.catalog.createRevision('   ')).rejects.toMatchObject({
        code: 'E1000',
      });
    });

    it('should report a missing revision', async () => {
      await expect(ctx.services.catalog.getRevision('r9')).rejects.toThrow('revision not found: r9');
    });
  });

  describe('types', () => {
    it('should keep flag and opinion types apart', async () => {
      await ctx.services.catalog.createFlagType({ name: 'rfi', metadata: { source: 'wiki' } });
      await ctx.services.catalog.createOpinionType({ name: 'rfi' });

      expect(await ctx.services.catalog.getFlagType('rfi')).toMatchObject({
        name: 'rfi',
        description: null,
        metadata: { source: 'wiki' },
      });
      expect(await ctx.services.catalog.listOpinionTypes()).toHaveLength(1);
    });

    it('should list types by name', async () => {
      await ctx.services.catalog.createFlagType({ name: 'vote' });
      await ctx.services.catalog.createFlagType({ name: 'rain' });

      const types = await ctx.services.catalog.listFlagTypes();

      expect(types.map((t) => t.name)).toEqual(['rain', 'vote']);
    });

    it('should require object metadata', async () => {
      await expect(
        ctx.services.catalog.createOpinionType({ name: 'auto', metadata: 'x' })
      ).rejects.toMatchObject({ code: 'E1002' });
    });

    it('should bound type names at 64 characters', async () => {
      await expect(
        ctx.services.catalog.createFlagType({ name: 'x'.repeat(65) })
      ).rejects.toMatchObject({ code: 'E1005' });
    });
  });

  describe('users and categories', () => {
    it('should normalise user names', async () => {
      const user = await ctx.services.catalog.addUser(' carol');

      expect(user.userName).toBe('Carol');
      await expect(ctx.services.catalog.addUser('Carol')).rejects.toBeInstanceOf(ConflictError);
    });

    it('should reject an empty user name', async () => {
      await expect(ctx.services.catalog.addUser('  ')).rejects.toMatchObject({ code: 'E1000' });
    });

    it('should create categories', async () => {
      await ctx.services.catalog.createCategory('rfi', 'radio interference');

      expect(await ctx.services.catalog.listCategories()).toMatchObject([
        { name: 'rfi', description: 'radio interference' },
      ]);
    });
  });
});
