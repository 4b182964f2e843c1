/**
 * Repository factory functions
 *
 * Creates all repository instances with injected database dependencies.
 */

import type { DatabaseDeps } from '../types.js';
import type { Repositories } from '../interfaces/repositories.js';
import {
  createRevisionRepository,
  createFlagTypeRepository,
  createOpinionTypeRepository,
  createCategoryRepository,
  createUserRepository,
  createClientRepository,
  createFlagRepository,
  createOpinionRepository,
  createVoteRepository,
} from '../../db/repositories/index.js';

/**
 * Create all repositories with injected dependencies
 *
 * @param deps - Database dependencies (db, sqlite)
 * @returns All repository instances
 */
export function createRepositories(deps: DatabaseDeps): Repositories {
  return {
    revisions: createRevisionRepository(deps),
    flagTypes: createFlagTypeRepository(deps),
    opinionTypes: createOpinionTypeRepository(deps),
    categories: createCategoryRepository(deps),
    users: createUserRepository(deps),
    clients: createClientRepository(deps),
    flags: createFlagRepository(deps),
    opinions: createOpinionRepository(deps),
    votes: createVoteRepository(deps),
  };
}
