/**
 * Catalog Repositories
 *
 * Revisions, flag types, opinion types and category types: small named
 * tables created administratively and referenced by everything else.
 */

import { asc, eq } from 'drizzle-orm';
import { revisions, flagTypes, opinionTypes, categoryTypes } from '../schema.js';
import type { DatabaseDeps } from '../../core/types.js';
import { createConflictError } from '../../core/errors.js';
import type {
  IRevisionRepository,
  IFlagTypeRepository,
  IOpinionTypeRepository,
  ICategoryRepository,
} from '../../core/interfaces/repositories.js';

/**
 * Create a revision repository instance
 */
export function createRevisionRepository(deps: DatabaseDeps): IRevisionRepository {
  const { db } = deps;

  const repo: IRevisionRepository = {
    async create(input) {
      if (await repo.getByName(input.name)) {
        throw createConflictError('revision', `"${input.name}" already exists`);
      }
      return db.insert(revisions).values(input).returning().get();
    },

    async getById(id) {
      return db.select().from(revisions).where(eq(revisions.id, id)).get();
    },

    async getByName(name) {
      return db.select().from(revisions).where(eq(revisions.name, name)).get();
    },

    async list() {
      return db.select().from(revisions).orderBy(asc(revisions.id)).all();
    },
  };

  return repo;
}

export function createFlagTypeRepository(deps: DatabaseDeps): IFlagTypeRepository {
  const { db } = deps;

  const repo: IFlagTypeRepository = {
    async create(input) {
      if (await repo.getByName(input.name)) {
        throw createConflictError('flag type', `"${input.name}" already exists`);
      }
      return db.insert(flagTypes).values(input).returning().get();
    },

    async getById(id) {
      return db.select().from(flagTypes).where(eq(flagTypes.id, id)).get();
    },

    async getByName(name) {
      return db.select().from(flagTypes).where(eq(flagTypes.name, name)).get();
    },

    async list() {
      return db.select().from(flagTypes).orderBy(asc(flagTypes.name)).all();
    },
  };

  return repo;
}

export function createOpinionTypeRepository(deps: DatabaseDeps): IOpinionTypeRepository {
  const { db } = deps;

  const repo: IOpinionTypeRepository = {
    async create(input) {
      if (await repo.getByName(input.name)) {
        throw createConflictError('opinion type', `"${input.name}" already exists`);
      }
      return db.insert(opinionTypes).values(input).returning().get();
    },

    async getById(id) {
      return db.select().from(opinionTypes).where(eq(opinionTypes.id, id)).get();
    },

    async getByName(name) {
      return db.select().from(opinionTypes).where(eq(opinionTypes.name, name)).get();
    },

    async list() {
      return db.select().from(opinionTypes).orderBy(asc(opinionTypes.name)).all();
    },
  };

  return repo;
}

export function createCategoryRepository(deps: DatabaseDeps): ICategoryRepository {
  const { db } = deps;

  const repo: ICategoryRepository = {
    async create(input) {
      if (await repo.getByName(input.name)) {
        throw createConflictError('category', `"${input.name}" already exists`);
      }
      return db.insert(categoryTypes).values(input).returning().get();
    },

    async getById(id) {
      return db.select().from(categoryTypes).where(eq(categoryTypes.id, id)).get();
    },

    async getByName(name) {
      return db.select().from(categoryTypes).where(eq(categoryTypes.name, name)).get();
    },

    async list() {
      return db.select().from(categoryTypes).orderBy(asc(categoryTypes.name)).all();
    },
  };

  return repo;
}
