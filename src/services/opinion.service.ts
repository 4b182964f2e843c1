/**
 * Opinion service
 *
 * Records user judgements about one LSD under one revision. Submitting an
 * opinion for an existing (type, user, lsd, revision) updates it in place.
 * Authorship is immutable and last_edit never decreases.
 */

import type {
  ListOpinionsFilter,
  Opinion,
  OpinionKey,
  Repositories,
} from '../core/interfaces/repositories.js';
import type { Clock, UnixSeconds } from '../core/types.js';
import { DECISIONS, type Decision, type DataMetadata } from '../db/schema.js';
import {
  createConflictError,
  createNotFoundError,
  createValidationError,
  ErrorCodes,
} from '../core/errors.js';
import { isUniqueConstraintError } from '../db/repositories/base.js';
import { validateMetadata } from '../utils/metadata.js';
import { isDecision, isInteger, isNumber } from '../utils/type-guards.js';
import { normalizeUserName } from '../utils/names.js';
import { createComponentLogger } from '../utils/logger.js';

const logger = createComponentLogger('opinions');

export interface CreateOpinionInput {
  user: string;
  type: string;
  decision: string;
  lsd: number;
  revision: string;
  clientName: string;
  clientVersion: string;
  creationTime?: UnixSeconds;
  notes?: string;
  metadata?: unknown;
  categories?: string[];
}

export interface EditOpinionInput {
  decision?: string;
  type?: string;
  lsd?: number;
  notes?: string | null;
  /** Accepted only when it names the current author */
  user?: string;
}

export interface ListOpinionsInput {
  revision?: string;
  type?: string;
  user?: string;
  lsd?: number;
  decision?: string;
}

export interface OpinionDetail extends Opinion {
  categories: string[];
}

function checkDecision(decision: string): Decision {
  if (!isDecision(decision)) {
    throw createValidationError(
      'decision',
      `"${decision}" is not a valid decision`,
      `use one of ${DECISIONS.join(', ')}`,
      ErrorCodes.INVALID_DECISION
    );
  }
  return decision;
}

function checkCreationTime(time: unknown, now: UnixSeconds): UnixSeconds {
  if (!isNumber(time) || !Number.isFinite(time)) {
    throw createValidationError('creationTime', 'must be a Unix timestamp');
  }
  if (time > now) {
    throw createValidationError('creationTime', `${time} is in the future (now ${now})`);
  }
  return time;
}

function checkLsd(lsd: unknown): number {
  if (!isInteger(lsd)) {
    throw createValidationError('lsd', 'must be an integer');
  }
  return lsd;
}

export class OpinionService {
  constructor(
    private readonly repos: Repositories,
    private readonly clock: Clock
  ) {}

  private async resolveTypeId(name: string): Promise<number> {
    const opinionType = await this.repos.opinionTypes.getByName(name);
    if (!opinionType) {
      throw createNotFoundError('opinion type', name);
    }
    return opinionType.id;
  }

  private async resolveRevisionId(name: string): Promise<number> {
    const revision = await this.repos.revisions.getByName(name);
    if (!revision) {
      throw createNotFoundError('revision', name);
    }
    return revision.id;
  }

  private async resolveUserId(name: string): Promise<number> {
    const userName = normalizeUserName(name);
    const user = await this.repos.users.getByName(userName);
    if (!user) {
      throw createNotFoundError('user', userName);
    }
    return user.id;
  }

  private async resolveCategoryIds(names: string[]): Promise<number[]> {
    const ids: number[] = [];
    for (const name of names) {
      const category = await this.repos.categories.getByName(name);
      if (!category) {
        throw createNotFoundError('category', name);
      }
      ids.push(category.id);
    }
    return ids;
  }

  /**
   * Create an opinion, or update the one already recorded for the same key.
   * `creationTime` may backdate a new opinion but never lies in the future;
   * a resubmission always advances last_edit to now.
   */
  async createOpinion(input: CreateOpinionInput): Promise<OpinionDetail> {
    const decision = checkDecision(input.decision);
    const lsd = checkLsd(input.lsd);
    const now = this.clock();
    const creationTime =
      input.creationTime === undefined ? now : checkCreationTime(input.creationTime, now);
    const metadata: DataMetadata | null =
      input.metadata === undefined || input.metadata === null
        ? null
        : validateMetadata(input.metadata);

    const typeId = await this.resolveTypeId(input.type);
    const revisionId = await this.resolveRevisionId(input.revision);
    const userId = await this.resolveUserId(input.user);
    const categoryIds = await this.resolveCategoryIds(input.categories ?? []);

    const client = await this.repos.clients.getOrCreate(input.clientName, input.clientVersion);

    const opinion = await this.repos.opinions.upsert({
      typeId,
      userId,
      lsd,
      revisionId,
      decision,
      clientId: client.id,
      creationTime,
      editTime: now,
      notes: input.notes ?? null,
      metadata,
      categoryIds,
    });

    logger.info(
      { opinionId: opinion.id, user: opinion.userName, lsd, decision },
      'Recorded opinion'
    );
    return this.withCategories(opinion);
  }

  /**
   * Edit decision, type, lsd or notes of an existing opinion
   */
  async editOpinion(id: number, input: EditOpinionInput): Promise<OpinionDetail> {
    const existing = await this.repos.opinions.getById(id);
    if (!existing) {
      throw createNotFoundError('opinion', id);
    }

    if (input.user !== undefined && normalizeUserName(input.user) !== existing.userName) {
      throw createValidationError(
        'user',
        `cannot reassign opinion ${id} from ${existing.userName}`,
        undefined,
        ErrorCodes.IMMUTABLE_FIELD
      );
    }

    const decision = input.decision === undefined ? undefined : checkDecision(input.decision);
    const lsd = input.lsd === undefined ? undefined : checkLsd(input.lsd);
    const typeId = input.type === undefined ? undefined : await this.resolveTypeId(input.type);

    const target: OpinionKey = {
      typeId: typeId ?? existing.typeId,
      userId: existing.userId,
      lsd: lsd ?? existing.lsd,
      revisionId: existing.revisionId,
    };
    const clash = await this.repos.opinions.getByKey(target);
    if (clash && clash.id !== id) {
      throw createConflictError(
        'opinion',
        `opinion ${clash.id} already exists for ${existing.userName} on LSD ${target.lsd}`
      );
    }

    let updated: Opinion | undefined;
    try {
      updated = await this.repos.opinions.update(id, {
        typeId,
        lsd,
        decision,
        notes: input.notes,
        lastEdit: this.clock(),
      });
    } catch (error) {
      if (isUniqueConstraintError(error)) {
        throw createConflictError('opinion', `duplicate opinion for LSD ${target.lsd}`);
      }
      throw error;
    }
    if (!updated) {
      throw createNotFoundError('opinion', id);
    }

    logger.info({ opinionId: id }, 'Edited opinion');
    return this.withCategories(updated);
  }

  async getOpinion(id: number): Promise<OpinionDetail> {
    const opinion = await this.repos.opinions.getById(id);
    if (!opinion) {
      throw createNotFoundError('opinion', id);
    }
    return this.withCategories(opinion);
  }

  async listOpinions(input: ListOpinionsInput = {}): Promise<Opinion[]> {
    const filter: ListOpinionsFilter = {};
    if (input.revision !== undefined) filter.revisionId = await this.resolveRevisionId(input.revision);
    if (input.type !== undefined) filter.typeId = await this.resolveTypeId(input.type);
    if (input.user !== undefined) filter.userId = await this.resolveUserId(input.user);
    if (input.lsd !== undefined) filter.lsd = checkLsd(input.lsd);
    if (input.decision !== undefined) filter.decision = checkDecision(input.decision);
    return this.repos.opinions.list(filter);
  }

  private async withCategories(opinion: Opinion): Promise<OpinionDetail> {
    const categories = await this.repos.opinions.getCategories(opinion.id);
    return { ...opinion, categories: categories.map((c) => c.name) };
  }
}
