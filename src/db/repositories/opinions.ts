/**
 * Opinion Repository
 *
 * One row per (type, user, lsd, revision). Re-submitting an opinion for the
 * same key updates it in place at the edit time; last_edit only ever moves
 * forward and creation_time is kept.
 */

import { and, asc, count, eq, gte, ne, notExists, sql, type SQL } from 'drizzle-orm';
import {
  opinions,
  opinionTypes,
  users,
  revisions,
  opinionCategories,
  categoryTypes,
  votes,
  voteOpinions,
  type OpinionRow,
} from '../schema.js';
import type { DatabaseDeps } from '../../core/types.js';
import type { DrizzleDb } from './base.js';
import { transactionWithRetry } from '../connection.js';
import type {
  IOpinionRepository,
  ListOpinionsFilter,
  Opinion,
} from '../../core/interfaces/repositories.js';

function selectOpinions(db: DrizzleDb) {
  return db
    .select({
      opinion: opinions,
      typeName: opinionTypes.name,
      userName: users.userName,
      revisionName: revisions.name,
    })
    .from(opinions)
    .innerJoin(opinionTypes, eq(opinions.typeId, opinionTypes.id))
    .innerJoin(users, eq(opinions.userId, users.id))
    .innerJoin(revisions, eq(opinions.revisionId, revisions.id));
}

interface OpinionSelection {
  opinion: OpinionRow;
  typeName: string;
  userName: string;
  revisionName: string;
}

function toOpinion(row: OpinionSelection): Opinion {
  return {
    ...row.opinion,
    typeName: row.typeName,
    userName: row.userName,
    revisionName: row.revisionName,
  };
}

function buildFilter(filter: ListOpinionsFilter): SQL | undefined {
  const conditions: SQL[] = [];
  if (filter.revisionId !== undefined) conditions.push(eq(opinions.revisionId, filter.revisionId));
  if (filter.typeId !== undefined) conditions.push(eq(opinions.typeId, filter.typeId));
  if (filter.userId !== undefined) conditions.push(eq(opinions.userId, filter.userId));
  if (filter.lsd !== undefined) conditions.push(eq(opinions.lsd, filter.lsd));
  if (filter.decision !== undefined) conditions.push(eq(opinions.decision, filter.decision));
  return conditions.length > 0 ? and(...conditions) : undefined;
}

/**
 * Create an opinion repository instance
 */
export function createOpinionRepository(deps: DatabaseDeps): IOpinionRepository {
  const { db, sqlite } = deps;

  const repo: IOpinionRepository = {
    async upsert(input) {
      const id = await transactionWithRetry(sqlite, () => {
        const row = db
          .insert(opinions)
          .values({
            typeId: input.typeId,
            userId: input.userId,
            lsd: input.lsd,
            revisionId: input.revisionId,
            decision: input.decision,
            clientId: input.clientId,
            creationTime: input.creationTime,
            lastEdit: input.creationTime,
            notes: input.notes ?? null,
            metadata: input.metadata ?? null,
          })
          .onConflictDoUpdate({
            target: [opinions.typeId, opinions.userId, opinions.lsd, opinions.revisionId],
            set: {
              decision: input.decision,
              clientId: input.clientId,
              notes: input.notes ?? null,
              metadata: input.metadata ?? null,
              lastEdit: sql`max(${opinions.lastEdit}, ${input.editTime})`,
            },
          })
          .returning({ id: opinions.id })
          .get();

        for (const categoryId of input.categoryIds ?? []) {
          db.insert(opinionCategories)
            .values({ opinionId: row.id, categoryId })
            .onConflictDoNothing()
            .run();
        }
        return row.id;
      });

      const opinion = await repo.getById(id);
      if (!opinion) {
        throw new Error(`Opinion ${id} missing after upsert`);
      }
      return opinion;
    },

    async getById(id) {
      const row = selectOpinions(db).where(eq(opinions.id, id)).get();
      return row ? toOpinion(row) : undefined;
    },

    async getByKey(key) {
      const row = selectOpinions(db)
        .where(
          and(
            eq(opinions.typeId, key.typeId),
            eq(opinions.userId, key.userId),
            eq(opinions.lsd, key.lsd),
            eq(opinions.revisionId, key.revisionId)
          )
        )
        .get();
      return row ? toOpinion(row) : undefined;
    },

    async update(id, input) {
      db.update(opinions)
        .set({
          ...(input.typeId !== undefined && { typeId: input.typeId }),
          ...(input.lsd !== undefined && { lsd: input.lsd }),
          ...(input.decision !== undefined && { decision: input.decision }),
          ...(input.notes !== undefined && { notes: input.notes }),
          lastEdit: sql`max(${opinions.lastEdit}, ${input.lastEdit})`,
        })
        .where(eq(opinions.id, id))
        .run();
      return repo.getById(id);
    },

    async list(filter = {}) {
      return selectOpinions(db)
        .where(buildFilter(filter))
        .orderBy(asc(opinions.lsd), asc(opinions.id))
        .all()
        .map(toOpinion);
    },

    async listCandidates(filter) {
      const considered = db
        .select({ one: sql`1` })
        .from(voteOpinions)
        .innerJoin(votes, eq(voteOpinions.voteId, votes.id))
        .where(
          and(
            eq(voteOpinions.opinionId, opinions.id),
            eq(votes.mode, filter.unconsideredBy),
            gte(votes.time, opinions.lastEdit)
          )
        );

      return selectOpinions(db)
        .where(
          and(
            eq(opinions.revisionId, filter.revisionId),
            gte(opinions.lastEdit, filter.minLastEdit),
            notExists(considered)
          )
        )
        .orderBy(asc(opinions.id))
        .all()
        .map(toOpinion);
    },

    async countConflicting(lsd, revisionId, decision) {
      const row = db
        .select({ total: count() })
        .from(opinions)
        .where(
          and(
            eq(opinions.lsd, lsd),
            eq(opinions.revisionId, revisionId),
            ne(opinions.decision, decision)
          )
        )
        .get();
      return row?.total ?? 0;
    },

    async getCategories(opinionId) {
      return db
        .select({
          id: categoryTypes.id,
          name: categoryTypes.name,
          description: categoryTypes.description,
        })
        .from(opinionCategories)
        .innerJoin(categoryTypes, eq(opinionCategories.categoryId, categoryTypes.id))
        .where(eq(opinionCategories.opinionId, opinionId))
        .orderBy(asc(categoryTypes.name))
        .all();
    },
  };

  return repo;
}
