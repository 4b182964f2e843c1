/**
 * Unit tests for FlagService
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
import { NotFoundError } from '../../src/core/errors.js';

const TEST_DB_PATH = './data/test-flag-service.db';

let testDb: TestDb;
let ctx: AppContext;

describe('FlagService', () => {
  beforeEach(async () => {
    testDb = setupTestDb(TEST_DB_PATH);
    ctx = createTestContext(testDb, createFakeClock(1_700_000_000).now);
    await ctx.services.catalog.createFlagType({ name: 'rain', description: 'Rain on the feeds' });
    await ctx.services.catalog.createFlagType({ name: 'vote' });
  });

  afterEach(() => {
    cleanupTestDb(testDb);
  });

  describe('createFlag', () => {
    it('should store and read back a flag', async () => {
      const created = await ctx.services.flags.createFlag({
        type: 'rain',
        startTime: 100,
        finishTime: 200,
        metadata: { instrument: 'chime', freq: [3, 5], description: 'storm' },
      });

      const fetched = await ctx.services.flags.getFlag(created.id);

      expect(fetched).toEqual({
        id: created.id,
        typeId: created.typeId,
        typeName: 'rain',
        startTime: 100,
        finishTime: 200,
        metadata: { instrument: 'chime', freq: [3, 5], description: 'storm' },
      });
    });

    it('should allow an open-ended flag', async () => {
      const flag = await ctx.services.flags.createFlag({ type: 'rain', startTime: 100 });

      expect(flag.finishTime).toBeNull();
      expect(flag.metadata).toBeNull();
    });

    it('should treat null metadata as absent', async () => {
      const flag = await ctx.services.flags.createFlag({
        type: 'rain',
        startTime: 100,
        metadata: null,
      });

      expect(flag.metadata).toBeNull();
    });

    it('should reject a finish before the start', async () => {
      await expect(
        ctx.services.flags.createFlag({ type: 'rain', startTime: 200, finishTime: 100 })
      ).rejects.toMatchObject({ code: 'E1003' });
    });

    it('should accept a zero-length flag', async () => {
      const flag = await ctx.services.flags.createFlag({
        type: 'rain',
        startTime: 100,
        finishTime: 100,
      });

      expect(flag.finishTime).toBe(100);
    });

    it('should reject inputs beyond the instrument', async () => {
      await expect(
        ctx.services.flags.createFlag({
          type: 'rain',
          startTime: 0,
          metadata: { instrument: 'pathfinder', inputs: [256] },
        })
      ).rejects.toThrow('Validation error: metadata.inputs - index 256 outside 0-255 for pathfinder');
    });

    it('should report an unknown flag type', async () => {
      await expect(
        ctx.services.flags.createFlag({ type: 'snow', startTime: 0 })
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('getMasks', () => {
    it('should expand freq and inputs into dense masks', async () => {
      const flag = await ctx.services.flags.createFlag({
        type: 'rain',
        startTime: 0,
        metadata: { instrument: 'chime', freq: [3, 5] },
      });

      const masks = await ctx.services.flags.getMasks(flag.id);

      expect(masks.freqMask).toHaveLength(1024);
      expect(masks.freqMask.filter(Boolean)).toHaveLength(2);
      expect(masks.freqMask[3]).toBe(true);
      expect(masks.freqMask[4]).toBe(false);
      expect(masks.inputMask).toHaveLength(2048);
      expect(masks.inputMask?.every(Boolean)).toBe(true);
    });

    it('should give no input mask without an instrument', async () => {
      const flag = await ctx.services.flags.createFlag({ type: 'rain', startTime: 0 });

      const masks = await ctx.services.flags.getMasks(flag.id);

      expect(masks.inputMask).toBeNull();
      expect(masks.freqMask.every(Boolean)).toBe(true);
    });
  });

  describe('editFlag', () => {
    it('should merge metadata and keep untouched fields', async () => {
      const flag = await ctx.services.flags.createFlag({
        type: 'rain',
        startTime: 100,
        finishTime: 200,
        metadata: { instrument: 'chime', description: 'storm' },
      });

      const edited = await ctx.services.flags.editFlag(flag.id, {
        finishTime: 300,
        metadata: { freq: [7] },
      });

      expect(edited.startTime).toBe(100);
      expect(edited.finishTime).toBe(300);
      expect(edited.metadata).toEqual({ instrument: 'chime', description: 'storm', freq: [7] });
    });

    it('should leave metadata unchanged when given null', async () => {
      const flag = await ctx.services.flags.createFlag({
        type: 'rain',
        startTime: 100,
        metadata: { description: 'storm' },
      });

      const edited = await ctx.services.flags.editFlag(flag.id, { metadata: null });

      expect(edited.metadata).toEqual({ description: 'storm' });
    });

    it('should check the range against the stored start', async () => {
      const flag = await ctx.services.flags.createFlag({ type: 'rain', startTime: 100 });

      await expect(ctx.services.flags.editFlag(flag.id, { finishTime: 50 })).rejects.toMatchObject({
        code: 'E1003',
      });
    });

    it('should change the type by name', async () => {
      const flag = await ctx.services.flags.createFlag({ type: 'rain', startTime: 100 });

      const edited = await ctx.services.flags.editFlag(flag.id, { type: 'vote' });

      expect(edited.typeName).toBe('vote');
    });
  });

  describe('listFlags', () => {
    it('should return flags overlapping a window', async () => {
      await ctx.services.flags.createFlag({ type: 'rain', startTime: 0, finishTime: 100 });
      const b = await ctx.services.flags.createFlag({ type: 'rain', startTime: 200, finishTime: 300 });
      const c = await ctx.services.flags.createFlag({ type: 'vote', startTime: 250 });

      const window = await ctx.services.flags.listFlags({ start: 150, finish: 260 });
      expect(window.map((f) => f.id)).toEqual([b.id, c.id]);

      const late = await ctx.services.flags.listFlags({ start: 400 });
      expect(late.map((f) => f.id)).toEqual([c.id]);

      const rain = await ctx.services.flags.listFlags({ type: 'rain' });
      expect(rain).toHaveLength(2);
    });
  });
});
