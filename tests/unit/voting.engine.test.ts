/**
 * Unit tests for the voting engine (hypnotoad mode)
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  setupTestDb,
  cleanupTestDb,
  createTestContext,
  createFakeClock,
  createTestFlagType,
  schema,
  type TestDb,
  type FakeClock,
} from '../fixtures/test-helpers.js';
import type { AppContext } from '../../src/core/context.js';
import {
  InvalidConfigurationError,
  NotFoundError,
  PersistenceError,
  UnknownModeError,
} from '../../src/core/errors.js';
import { lsdToUnix } from '../../src/utils/sidereal.js';
import { VERSION } from '../../src/version.js';

const TEST_DB_PATH = './data/test-voting-engine.db';
const T0 = 2_000_000_000;

let testDb: TestDb;
let clock: FakeClock;
let ctx: AppContext;

async function seedCatalogs(options: { withFlagType?: boolean } = {}): Promise<void> {
  await ctx.services.catalog.createRevision('r1');
  await ctx.services.catalog.createRevision('r2');
  await ctx.services.catalog.createOpinionType({ name: 'manual' });
  if (options.withFlagType ?? true) {
    createTestFlagType(testDb.db, 'vote');
  }
  await ctx.services.catalog.addUser('alice');
  await ctx.services.catalog.addUser('bob');
}

function opine(
  user: string,
  decision: string,
  lsd: number,
  revision = 'r1',
  metadata?: Record<string, unknown>
) {
  return ctx.services.opinions.createOpinion({
    user,
    type: 'manual',
    decision,
    lsd,
    revision,
    clientName: 'test-client',
    clientVersion: '1.0',
    metadata,
  });
}

describe('VotingEngine', () => {
  beforeEach(async () => {
    testDb = setupTestDb(TEST_DB_PATH);
    clock = createFakeClock(T0);
    ctx = createTestContext(testDb, clock.now);
    await seedCatalogs();
  });

  afterEach(() => {
    cleanupTestDb(testDb);
  });

  describe('single opinion', () => {
    it('should flag the sidereal day of a lone bad opinion', async () => {
      const opinion = await opine('alice', 'bad', 2112);
      clock.advance(10);

      const flags = await ctx.services.voting.runVote('hypnotoad', 'r1');

      expect(flags).toHaveLength(1);
      expect(flags[0]?.typeName).toBe('vote');
      expect(flags[0]?.startTime).toBe(lsdToUnix(2112));
      expect(flags[0]?.finishTime).toBe(lsdToUnix(2113));
      expect(flags[0]?.metadata).toEqual({ user: 'Alice' });

      const votes = await ctx.repos.votes.list();
      expect(votes).toHaveLength(1);
      expect(votes[0]).toMatchObject({
        time: T0 + 10,
        mode: 'hypnotoad',
        lsd: 2112,
        flagId: flags[0]?.id,
        opinionIds: [opinion.id],
      });
    });

    it('should record the engine client on the vote', async () => {
      await opine('alice', 'bad', 1);
      await ctx.services.voting.runVote('hypnotoad', 'r1');

      const votes = await ctx.repos.votes.list();
      const client = await ctx.repos.clients.getById(votes[0]?.clientId ?? -1);
      expect(client?.clientName).toBe('dataflag.vote');
      expect(client?.clientVersion).toBe(VERSION);
    });

    it('should carry instrument, freq and inputs into the flag metadata', async () => {
      await opine('alice', 'bad', 5, 'r1', {
        instrument: 'chime',
        freq: [3, 5],
        inputs: [1],
        description: 'not copied',
      });

      const flags = await ctx.services.voting.runVote('hypnotoad', 'r1');

      expect(flags[0]?.metadata).toEqual({
        instrument: 'chime',
        freq: [3, 5],
        inputs: [1],
        user: 'Alice',
      });
    });

    it('should record a vote without a flag for good and unsure opinions', async () => {
      await opine('alice', 'good', 10);
      await opine('bob', 'unsure', 11);

      const flags = await ctx.services.voting.runVote('hypnotoad', 'r1');

      expect(flags).toEqual([]);
      const votes = await ctx.repos.votes.list();
      expect(votes).toHaveLength(2);
      expect(votes.map((v) => v.flagId)).toEqual([null, null]);
    });

    it('should accept a revision record as well as a name', async () => {
      await opine('alice', 'bad', 3);
      const revision = await ctx.services.catalog.getRevision('r1');

      const flags = await ctx.services.voting.runVote('hypnotoad', revision);

      expect(flags).toHaveLength(1);
    });
  });

  describe('idempotence', () => {
    it('should create nothing on an immediate second run', async () => {
      await opine('alice', 'bad', 2112);
      clock.advance(10);
      await ctx.services.voting.runVote('hypnotoad', 'r1');

      clock.advance(5);
      const second = await ctx.services.voting.runVote('hypnotoad', 'r1');

      expect(second).toEqual([]);
      expect(await ctx.repos.votes.list()).toHaveLength(1);
      expect(await ctx.repos.flags.list()).toHaveLength(1);
    });

    it('should complete with an empty result when there are no opinions', async () => {
      const result = await ctx.services.voting.run('hypnotoad', 'r1');

      expect(result.flags).toEqual([]);
      expect(result.summary).toEqual({
        mode: 'hypnotoad',
        revision: 'r1',
        lowWaterMark: 0,
        candidates: 0,
        flagged: 0,
        contested: 0,
      });
    });

    it('should reconsider an opinion edited after its vote', async () => {
      const opinion = await opine('alice', 'good', 7);
      clock.advance(10);
      expect(await ctx.services.voting.runVote('hypnotoad', 'r1')).toEqual([]);

      clock.set(T0 + 100);
      await ctx.services.opinions.editOpinion(opinion.id, { decision: 'bad' });
      clock.set(T0 + 110);
      const flags = await ctx.services.voting.runVote('hypnotoad', 'r1');

      expect(flags).toHaveLength(1);
      const votes = await ctx.repos.votes.list({ lsd: 7 });
      expect(votes.map((v) => v.time)).toEqual([T0 + 10, T0 + 110]);
    });

    it('should not flag an LSD again after a notes-only edit', async () => {
      const opinion = await opine('alice', 'bad', 7);
      clock.advance(10);
      const [flag] = await ctx.services.voting.runVote('hypnotoad', 'r1');

      clock.set(T0 + 100);
      await ctx.services.opinions.editOpinion(opinion.id, { notes: 'rechecked' });
      clock.set(T0 + 110);
      const second = await ctx.services.voting.runVote('hypnotoad', 'r1');

      expect(second).toEqual([]);
      expect(await ctx.repos.flags.list()).toHaveLength(1);
      const votes = await ctx.repos.votes.list({ lsd: 7 });
      expect(votes.map((v) => [v.time, v.flagId])).toEqual([
        [T0 + 10, flag?.id],
        [T0 + 110, flag?.id],
      ]);
    });

    it('should reconsider a resubmission that carries an older creation time', async () => {
      await opine('alice', 'good', 3);
      clock.advance(10);
      expect(await ctx.services.voting.runVote('hypnotoad', 'r1')).toEqual([]);

      clock.advance(10);
      await ctx.services.opinions.createOpinion({
        user: 'alice',
        type: 'manual',
        decision: 'bad',
        lsd: 3,
        revision: 'r1',
        clientName: 'test-client',
        clientVersion: '1.0',
        creationTime: T0 + 5,
      });
      clock.advance(10);
      const flags = await ctx.services.voting.runVote('hypnotoad', 'r1');

      expect(flags.map((f) => f.startTime)).toEqual([lsdToUnix(3)]);
      const votes = await ctx.repos.votes.list({ lsd: 3 });
      expect(votes.map((v) => v.time)).toEqual([T0 + 10, T0 + 30]);
    });
  });

  describe('unanimity', () => {
    it('should not flag a contested LSD but mark both opinions considered', async () => {
      const bad = await opine('alice', 'bad', 100);
      const good = await opine('bob', 'good', 100);

      const result = await ctx.services.voting.run('hypnotoad', 'r1');

      expect(result.flags).toEqual([]);
      expect(result.summary.contested).toBe(2);
      const votes = await ctx.repos.votes.list();
      expect(votes.map((v) => v.opinionIds)).toEqual([[bad.id], [good.id]]);
      expect(votes.every((v) => v.flagId === null)).toBe(true);

      clock.advance(1);
      expect(await ctx.services.voting.runVote('hypnotoad', 'r1')).toEqual([]);
      expect(await ctx.repos.votes.list()).toHaveLength(2);
    });

    it('should create one flag when every opinion on the LSD agrees', async () => {
      const first = await opine('alice', 'bad', 100);
      const second = await opine('bob', 'bad', 100);

      const flags = await ctx.services.voting.runVote('hypnotoad', 'r1');

      expect(flags).toHaveLength(1);
      expect(flags[0]?.metadata?.user).toBe('Alice, Bob');
      expect(await ctx.repos.flags.list()).toHaveLength(1);
      const votes = await ctx.repos.votes.list();
      expect(votes.map((v) => v.opinionIds)).toEqual([[first.id], [second.id]]);
      expect(votes.map((v) => v.flagId)).toEqual([flags[0]?.id, flags[0]?.id]);
    });

    it('should merge the metadata of agreeing opinions into the shared flag', async () => {
      await opine('alice', 'bad', 100, 'r1', { instrument: 'chime', freq: [5, 3] });
      await opine('bob', 'bad', 100, 'r1', { instrument: 'chime', freq: [4], inputs: [2] });

      const flags = await ctx.services.voting.runVote('hypnotoad', 'r1');

      // alice names no inputs, so the flag covers all of them
      expect(flags[0]?.metadata).toEqual({
        instrument: 'chime',
        freq: [3, 4, 5],
        user: 'Alice, Bob',
      });
    });

    it('should link a later agreeing opinion to the existing flag', async () => {
      await opine('alice', 'bad', 9);
      clock.advance(10);
      const [flag] = await ctx.services.voting.runVote('hypnotoad', 'r1');

      clock.advance(10);
      await opine('bob', 'bad', 9);
      clock.advance(10);
      const second = await ctx.services.voting.runVote('hypnotoad', 'r1');

      expect(second).toEqual([]);
      expect(await ctx.repos.flags.list()).toHaveLength(1);
      const votes = await ctx.repos.votes.list({ lsd: 9 });
      expect(votes.map((v) => v.flagId)).toEqual([flag?.id, flag?.id]);
    });

    it('should resolve the same LSD independently per revision', async () => {
      await opine('alice', 'bad', 100, 'r1');
      await opine('bob', 'good', 100, 'r2');

      clock.advance(10);
      const r1Flags = await ctx.services.voting.runVote('hypnotoad', 'r1');
      clock.advance(10);
      const r2Flags = await ctx.services.voting.runVote('hypnotoad', 'r2');

      expect(r1Flags).toHaveLength(1);
      expect(r2Flags).toEqual([]);
      const r2 = await ctx.services.catalog.getRevision('r2');
      expect(await ctx.repos.votes.list({ revisionId: r2.id })).toHaveLength(1);
    });
  });

  describe('low-water mark', () => {
    it('should be shared by every revision of a mode', async () => {
      await opine('alice', 'bad', 1, 'r1');
      await opine('bob', 'bad', 1, 'r2');

      clock.set(T0 + 1000);
      await ctx.services.voting.runVote('hypnotoad', 'r1');
      clock.set(T0 + 1001);
      const result = await ctx.services.voting.run('hypnotoad', 'r2');

      // the r2 opinion predates the window opened by the r1 vote
      expect(result.summary.lowWaterMark).toBe(T0 + 940);
      expect(result.summary.candidates).toBe(0);
    });
  });

  describe('errors', () => {
    it('should reject a mode name longer than 32 characters', async () => {
      await expect(ctx.services.voting.runVote('x'.repeat(33), 'r1')).rejects.toBeInstanceOf(
        InvalidConfigurationError
      );
    });

    it('should reject an unregistered mode', async () => {
      await expect(ctx.services.voting.runVote('majority', 'r1')).rejects.toThrow(
        `Invalid value for 'mode': "majority" (choose one of hypnotoad)`
      );
      await expect(ctx.services.voting.runVote('majority', 'r1')).rejects.toBeInstanceOf(
        UnknownModeError
      );
    });

    it('should reject an unknown revision', async () => {
      await expect(ctx.services.voting.runVote('hypnotoad', 'r9')).rejects.toBeInstanceOf(
        NotFoundError
      );
    });
  });

  describe('persistence failures', () => {
    it('should roll back only the failing candidate', async () => {
      await opine('alice', 'bad', 1);
      const second = await opine('bob', 'bad', 2);
      testDb.sqlite.exec(`
        CREATE TRIGGER refuse_link BEFORE INSERT ON vote_opinions
        WHEN NEW.opinion_id = ${second.id}
        BEGIN SELECT RAISE(ABORT, 'link refused'); END
      `);

      clock.advance(10);
      const failure = await ctx.services.voting.runVote('hypnotoad', 'r1').catch((e: unknown) => e);

      expect(failure).toBeInstanceOf(PersistenceError);
      expect(failure).toMatchObject({ message: 'Transaction failed during vote: link refused' });
      const flags = await ctx.repos.flags.list();
      expect(flags.map((f) => f.startTime)).toEqual([lsdToUnix(1)]);
      expect(await ctx.repos.votes.list()).toHaveLength(1);

      testDb.sqlite.exec('DROP TRIGGER refuse_link');
      clock.advance(10);
      const retry = await ctx.services.voting.runVote('hypnotoad', 'r1');

      expect(retry.map((f) => f.startTime)).toEqual([lsdToUnix(2)]);
      expect(await ctx.repos.votes.list()).toHaveLength(2);
    });
  });
});

describe('VotingEngine without a vote flag type', () => {
  beforeEach(async () => {
    testDb = setupTestDb(TEST_DB_PATH);
    clock = createFakeClock(T0);
    ctx = createTestContext(testDb, clock.now);
    await seedCatalogs({ withFlagType: false });
  });

  afterEach(() => {
    cleanupTestDb(testDb);
  });

  it('should fail before writing anything when a flag is needed', async () => {
    await opine('alice', 'bad', 1);

    await expect(ctx.services.voting.runVote('hypnotoad', 'r1')).rejects.toThrow(
      'flag type not found: vote'
    );
    expect(await ctx.repos.votes.list()).toEqual([]);
    expect(testDb.db.select().from(schema.flags).all()).toEqual([]);
  });

  it('should still vote when no outcome needs a flag', async () => {
    await opine('alice', 'good', 1);

    expect(await ctx.services.voting.runVote('hypnotoad', 'r1')).toEqual([]);
    expect(await ctx.repos.votes.list()).toHaveLength(1);
  });
});
