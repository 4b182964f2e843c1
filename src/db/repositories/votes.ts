/**
 * Vote Repository
 *
 * Votes are the audit trail of the voting engine. A vote, its opinion links
 * and the flag it produced are only ever written together. Each LSD has at
 * most one flag per (mode, revision); later votes on it share that flag.
 */

import { and, asc, desc, eq, inArray, isNotNull, max, type SQL } from 'drizzle-orm';
import { flags, votes, voteOpinions, type FlagRow } from '../schema.js';
import type { DatabaseDeps } from '../../core/types.js';
import { transactionWithRetry } from '../connection.js';
import type {
  IVoteRepository,
  ListVotesFilter,
  Vote,
} from '../../core/interfaces/repositories.js';

function buildFilter(filter: ListVotesFilter): SQL | undefined {
  const conditions: SQL[] = [];
  if (filter.mode !== undefined) conditions.push(eq(votes.mode, filter.mode));
  if (filter.revisionId !== undefined) conditions.push(eq(votes.revisionId, filter.revisionId));
  if (filter.lsd !== undefined) conditions.push(eq(votes.lsd, filter.lsd));
  return conditions.length > 0 ? and(...conditions) : undefined;
}

/**
 * Create a vote repository instance
 */
export function createVoteRepository(deps: DatabaseDeps): IVoteRepository {
  const { db, sqlite } = deps;

  // The flag an earlier vote of this mode produced for the LSD, if any
  function findCanonicalFlag(mode: string, revisionId: number, lsd: number): FlagRow | undefined {
    const row = db
      .select({ flag: flags })
      .from(votes)
      .innerJoin(flags, eq(votes.flagId, flags.id))
      .where(
        and(
          eq(votes.mode, mode),
          eq(votes.revisionId, revisionId),
          eq(votes.lsd, lsd),
          isNotNull(votes.flagId)
        )
      )
      .orderBy(desc(votes.time), desc(votes.id))
      .limit(1)
      .get();
    return row?.flag;
  }

  return {
    async latestTime(mode) {
      const row = db
        .select({ latest: max(votes.time) })
        .from(votes)
        .where(eq(votes.mode, mode))
        .get();
      return row?.latest ?? undefined;
    },

    async record(input) {
      return transactionWithRetry(sqlite, () => {
        let flag: FlagRow | undefined;
        let flagCreated = false;
        if (input.flag) {
          flag = findCanonicalFlag(input.mode, input.revisionId, input.lsd);
          if (!flag) {
            flag = db.insert(flags).values(input.flag).returning().get();
            flagCreated = true;
          }
        }

        const vote = db
          .insert(votes)
          .values({
            time: input.time,
            mode: input.mode,
            clientId: input.clientId,
            revisionId: input.revisionId,
            lsd: input.lsd,
            flagId: flag?.id ?? null,
          })
          .returning()
          .get();

        for (const opinionId of input.opinionIds) {
          db.insert(voteOpinions).values({ voteId: vote.id, opinionId }).run();
        }

        return { vote, flag, flagCreated };
      });
    },

    async list(filter = {}) {
      const rows = db
        .select()
        .from(votes)
        .where(buildFilter(filter))
        .orderBy(asc(votes.time), asc(votes.id))
        .all();
      if (rows.length === 0) {
        return [];
      }

      const links = db
        .select()
        .from(voteOpinions)
        .where(
          inArray(
            voteOpinions.voteId,
            rows.map((row) => row.id)
          )
        )
        .orderBy(asc(voteOpinions.opinionId))
        .all();

      return rows.map(
        (row): Vote => ({
          ...row,
          opinionIds: links.filter((link) => link.voteId === row.id).map((link) => link.opinionId),
        })
      );
    },
  };
}
