/**
 * Flag service
 *
 * Administrative creation and editing of flags, plus the dense mask views
 * downstream tools read.
 */

import type { Flag, ListFlagsFilter, Repositories } from '../core/interfaces/repositories.js';
import type { DataMetadata } from '../db/schema.js';
import type { UnixSeconds } from '../core/types.js';
import { createNotFoundError, createValidationError, ErrorCodes } from '../core/errors.js';
import { validateMetadata } from '../utils/metadata.js';
import { freqMask, inputMask } from '../utils/masks.js';
import { isNumber } from '../utils/type-guards.js';
import { createComponentLogger } from '../utils/logger.js';

const logger = createComponentLogger('flags');

export interface CreateFlagInput {
  type: string;
  startTime: UnixSeconds;
  finishTime?: UnixSeconds | null;
  metadata?: unknown;
}

export interface EditFlagInput {
  type?: string;
  startTime?: UnixSeconds;
  finishTime?: UnixSeconds | null;
  /** Merged into the stored metadata; null leaves it unchanged */
  metadata?: unknown;
}

export interface ListFlagsInput {
  type?: string;
  start?: UnixSeconds;
  finish?: UnixSeconds;
}

export interface FlagMasks {
  freqMask: boolean[];
  inputMask: boolean[] | null;
}

function checkTimeRange(startTime: unknown, finishTime: unknown): void {
  if (!isNumber(startTime) || !Number.isFinite(startTime)) {
    throw createValidationError('startTime', 'must be a Unix timestamp', undefined, ErrorCodes.INVALID_TIME_RANGE);
  }
  if (finishTime === null || finishTime === undefined) {
    return;
  }
  if (!isNumber(finishTime) || !Number.isFinite(finishTime)) {
    throw createValidationError('finishTime', 'must be a Unix timestamp', undefined, ErrorCodes.INVALID_TIME_RANGE);
  }
  if (finishTime < startTime) {
    throw createValidationError(
      'finishTime',
      `${finishTime} is before start time ${startTime}`,
      undefined,
      ErrorCodes.INVALID_TIME_RANGE
    );
  }
}

export class FlagService {
  constructor(private readonly repos: Repositories) {}

  private async resolveTypeId(name: string): Promise<number> {
    const flagType = await this.repos.flagTypes.getByName(name);
    if (!flagType) {
      throw createNotFoundError('flag type', name);
    }
    return flagType.id;
  }

  async createFlag(input: CreateFlagInput): Promise<Flag> {
    checkTimeRange(input.startTime, input.finishTime);
    const metadata =
      input.metadata === undefined || input.metadata === null ? null : validateMetadata(input.metadata);
    const typeId = await this.resolveTypeId(input.type);

    const flag = await this.repos.flags.create({
      typeId,
      startTime: input.startTime,
      finishTime: input.finishTime ?? null,
      metadata,
    });
    logger.info({ flagId: flag.id, type: flag.typeName }, 'Created flag');
    return flag;
  }

  async getFlag(id: number): Promise<Flag> {
    const flag = await this.repos.flags.getById(id);
    if (!flag) {
      throw createNotFoundError('flag', id);
    }
    return flag;
  }

  async editFlag(id: number, input: EditFlagInput): Promise<Flag> {
    const existing = await this.getFlag(id);

    const startTime = input.startTime ?? existing.startTime;
    const finishTime = input.finishTime === undefined ? existing.finishTime : input.finishTime;
    checkTimeRange(startTime, finishTime);

    let metadata: DataMetadata | undefined;
    if (input.metadata !== undefined && input.metadata !== null) {
      const patch = validateMetadata(input.metadata);
      metadata = validateMetadata({ ...existing.metadata, ...patch });
    }

    const typeId = input.type === undefined ? undefined : await this.resolveTypeId(input.type);

    const updated = await this.repos.flags.update(id, {
      ...(typeId !== undefined && { typeId }),
      ...(input.startTime !== undefined && { startTime }),
      ...(input.finishTime !== undefined && { finishTime }),
      ...(metadata !== undefined && { metadata }),
    });
    if (!updated) {
      throw createNotFoundError('flag', id);
    }
    logger.info({ flagId: id }, 'Edited flag');
    return updated;
  }

  async listFlags(input: ListFlagsInput = {}): Promise<Flag[]> {
    const filter: ListFlagsFilter = {
      start: input.start,
      finish: input.finish,
    };
    if (input.type !== undefined) {
      filter.typeId = await this.resolveTypeId(input.type);
    }
    return this.repos.flags.list(filter);
  }

  async getMasks(id: number): Promise<FlagMasks> {
    const flag = await this.getFlag(id);
    return {
      freqMask: freqMask(flag.metadata),
      inputMask: inputMask(flag.metadata),
    };
  }
}
