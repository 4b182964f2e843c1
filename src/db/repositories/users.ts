/**
 * User and Client Repositories
 */

import { and, asc, eq } from 'drizzle-orm';
import { users, clients } from '../schema.js';
import type { DatabaseDeps } from '../../core/types.js';
import { createConflictError } from '../../core/errors.js';
import type { IUserRepository, IClientRepository } from '../../core/interfaces/repositories.js';

export function createUserRepository(deps: DatabaseDeps): IUserRepository {
  const { db } = deps;

  const repo: IUserRepository = {
    async add(userName) {
      if (await repo.getByName(userName)) {
        throw createConflictError('user', `"${userName}" already exists`);
      }
      return db.insert(users).values({ userName }).returning().get();
    },

    async getByName(userName) {
      return db.select().from(users).where(eq(users.userName, userName)).get();
    },

    async list() {
      return db.select().from(users).orderBy(asc(users.userName)).all();
    },
  };

  return repo;
}

/**
 * Clients are created on first use, keyed by (name, version)
 */
export function createClientRepository(deps: DatabaseDeps): IClientRepository {
  const { db } = deps;

  return {
    async getOrCreate(clientName, clientVersion) {
      db.insert(clients)
        .values({ clientName, clientVersion })
        .onConflictDoNothing({ target: [clients.clientName, clients.clientVersion] })
        .run();

      const client = db
        .select()
        .from(clients)
        .where(and(eq(clients.clientName, clientName), eq(clients.clientVersion, clientVersion)))
        .get();
      if (!client) {
        throw new Error(`Client ${clientName} ${clientVersion} missing after insert`);
      }
      return client;
    },

    async getById(id) {
      return db.select().from(clients).where(eq(clients.id, id)).get();
    },
  };
}
