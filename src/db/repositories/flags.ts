/**
 * Flag Repository
 *
 * Flags are never deleted; the only mutation is the administrative edit path.
 */

import { and, asc, eq, gte, isNull, lte, or, type SQL } from 'drizzle-orm';
import { flags, flagTypes } from '../schema.js';
import type { DatabaseDeps } from '../../core/types.js';
import type { DrizzleDb } from './base.js';
import type { Flag, IFlagRepository, ListFlagsFilter } from '../../core/interfaces/repositories.js';

function selectFlags(db: DrizzleDb) {
  return db
    .select({ flag: flags, typeName: flagTypes.name })
    .from(flags)
    .innerJoin(flagTypes, eq(flags.typeId, flagTypes.id));
}

function buildFilter(filter: ListFlagsFilter): SQL | undefined {
  const conditions: SQL[] = [];
  if (filter.typeId !== undefined) {
    conditions.push(eq(flags.typeId, filter.typeId));
  }
  if (filter.start !== undefined) {
    // open-ended flags are still active
    const active = or(isNull(flags.finishTime), gte(flags.finishTime, filter.start));
    if (active) conditions.push(active);
  }
  if (filter.finish !== undefined) {
    conditions.push(lte(flags.startTime, filter.finish));
  }
  return conditions.length > 0 ? and(...conditions) : undefined;
}

export function createFlagRepository(deps: DatabaseDeps): IFlagRepository {
  const { db } = deps;

  const repo: IFlagRepository = {
    async create(input) {
      const row = db.insert(flags).values(input).returning().get();
      const created = await repo.getById(row.id);
      if (!created) {
        throw new Error(`Flag ${row.id} missing after insert`);
      }
      return created;
    },

    async getById(id): Promise<Flag | undefined> {
      const row = selectFlags(db).where(eq(flags.id, id)).get();
      return row ? { ...row.flag, typeName: row.typeName } : undefined;
    },

    async update(id, input) {
      if (Object.keys(input).length === 0) {
        return repo.getById(id);
      }
      db.update(flags).set(input).where(eq(flags.id, id)).run();
      return repo.getById(id);
    },

    async list(filter = {}) {
      return selectFlags(db)
        .where(buildFilter(filter))
        .orderBy(asc(flags.startTime), asc(flags.id))
        .all()
        .map((row) => ({ ...row.flag, typeName: row.typeName }));
    },
  };

  return repo;
}
