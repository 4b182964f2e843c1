export {
  createRevisionRepository,
  createFlagTypeRepository,
  createOpinionTypeRepository,
  createCategoryRepository,
} from './catalogs.js';
export { createUserRepository, createClientRepository } from './users.js';
export { createFlagRepository } from './flags.js';
export { createOpinionRepository } from './opinions.js';
export { createVoteRepository } from './votes.js';
