/**
 * Catalog service
 *
 * Administrative creation and lookup of revisions, flag and opinion types,
 * opinion categories and users.
 */

import type { Repositories } from '../core/interfaces/repositories.js';
import type {
  Revision,
  FlagType,
  OpinionType,
  CategoryType,
  User,
  JsonObject,
} from '../db/schema.js';
import { MAX_REVISION_NAME_LENGTH, MAX_TYPE_NAME_LENGTH } from '../db/schema.js';
import {
  createNotFoundError,
  createSizeLimitError,
  createValidationError,
  ErrorCodes,
} from '../core/errors.js';
import { isObject } from '../utils/type-guards.js';
import { normalizeUserName } from '../utils/names.js';
import { createComponentLogger } from '../utils/logger.js';

const logger = createComponentLogger('catalog');

export interface CreateTypeInput {
  name: string;
  description?: string;
  metadata?: unknown;
}

function validateName(field: string, name: string, maxLength: number): string {
  const trimmed = name.trim();
  if (trimmed.length === 0) {
    throw createValidationError(field, 'is required', undefined, ErrorCodes.MISSING_REQUIRED_FIELD);
  }
  if (trimmed.length > maxLength) {
    throw createSizeLimitError(field, maxLength, trimmed.length);
  }
  return trimmed;
}

function validateTypeMetadata(metadata: unknown): JsonObject | null {
  if (metadata === undefined || metadata === null) {
    return null;
  }
  if (!isObject(metadata)) {
    throw createValidationError(
      'metadata',
      'must be a key-value mapping',
      undefined,
      ErrorCodes.INVALID_METADATA
    );
  }
  return metadata;
}

export class CatalogService {
  constructor(private readonly repos: Repositories) {}

  // ---------------------------------------------------------------------------
  // Revisions
  // ---------------------------------------------------------------------------

  async createRevision(name: string, description?: string): Promise<Revision> {
    const revision = await this.repos.revisions.create({
      name: validateName('name', name, MAX_REVISION_NAME_LENGTH),
      description: description ?? null,
    });
    logger.info({ revision: revision.name }, 'Created revision');
    return revision;
  }

  async getRevision(name: string): Promise<Revision> {
    const revision = await this.repos.revisions.getByName(name);
    if (!revision) {
      throw createNotFoundError('revision', name);
    }
    return revision;
  }

  listRevisions(): Promise<Revision[]> {
    return this.repos.revisions.list();
  }

  // ---------------------------------------------------------------------------
  // Flag and opinion types
  // ---------------------------------------------------------------------------

  async createFlagType(input: CreateTypeInput): Promise<FlagType> {
    const flagType = await this.repos.flagTypes.create({
      name: validateName('name', input.name, MAX_TYPE_NAME_LENGTH),
      description: input.description ?? null,
      metadata: validateTypeMetadata(input.metadata),
    });
    logger.info({ flagType: flagType.name }, 'Created flag type');
    return flagType;
  }

  async getFlagType(name: string): Promise<FlagType> {
    const flagType = await this.repos.flagTypes.getByName(name);
    if (!flagType) {
      throw createNotFoundError('flag type', name);
    }
    return flagType;
  }

  listFlagTypes(): Promise<FlagType[]> {
    return this.repos.flagTypes.list();
  }

  async createOpinionType(input: CreateTypeInput): Promise<OpinionType> {
    const opinionType = await this.repos.opinionTypes.create({
      name: validateName('name', input.name, MAX_TYPE_NAME_LENGTH),
      description: input.description ?? null,
      metadata: validateTypeMetadata(input.metadata),
    });
    logger.info({ opinionType: opinionType.name }, 'Created opinion type');
    return opinionType;
  }

  async getOpinionType(name: string): Promise<OpinionType> {
    const opinionType = await this.repos.opinionTypes.getByName(name);
    if (!opinionType) {
      throw createNotFoundError('opinion type', name);
    }
    return opinionType;
  }

  listOpinionTypes(): Promise<OpinionType[]> {
    return this.repos.opinionTypes.list();
  }

  // ---------------------------------------------------------------------------
  // Categories
  // ---------------------------------------------------------------------------

  async createCategory(name: string, description?: string): Promise<CategoryType> {
    return this.repos.categories.create({
      name: validateName('name', name, MAX_TYPE_NAME_LENGTH),
      description: description ?? null,
    });
  }

  listCategories(): Promise<CategoryType[]> {
    return this.repos.categories.list();
  }

  // ---------------------------------------------------------------------------
  // Users
  // ---------------------------------------------------------------------------

  async addUser(name: string): Promise<User> {
    const userName = normalizeUserName(name);
    if (userName.length === 0) {
      throw createValidationError('user', 'is required', undefined, ErrorCodes.MISSING_REQUIRED_FIELD);
    }
    return this.repos.users.add(userName);
  }

  listUsers(): Promise<User[]> {
    return this.repos.users.list();
  }
}
