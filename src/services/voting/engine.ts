/**
 * Voting engine
 *
 * Turns unconsidered opinions into flags under a named aggregation mode.
 * Each run scans the ledger once, lets the mode's strategy decide every
 * candidate, then writes one vote per candidate (with its flag, if any) in
 * its own transaction. An LSD gets at most one flag per mode and revision:
 * votes after the first link to it. A failed candidate rolls back alone; the ones before
 * it stay committed and a rerun picks up the rest.
 */

import type { Flag, Repositories } from '../../core/interfaces/repositories.js';
import type { Revision, FlagType, NewFlagRow } from '../../db/schema.js';
import { MAX_MODE_NAME_LENGTH } from '../../db/schema.js';
import type { Clock, UnixSeconds } from '../../core/types.js';
import type { SiderealCalendar } from '../../utils/sidereal.js';
import {
  InvalidConfigurationError,
  PersistenceError,
  UnknownModeError,
  createNotFoundError,
} from '../../core/errors.js';
import { createComponentLogger } from '../../utils/logger.js';
import { VERSION } from '../../version.js';
import { getStrategy } from './strategies/index.js';
import {
  VOTING_MODES,
  isVotingMode,
  type VoteOutcome,
  type VotingMode,
  type VotingRunContext,
  type VotingRunSummary,
} from './types.js';

const logger = createComponentLogger('voting');

export interface VotingEngineDeps {
  repos: Repositories;
  clock: Clock;
  /** Seconds subtracted from the latest vote time to form the low-water mark */
  graceSeconds: number;
  /** Flag type given to flags created by votes */
  flagTypeName: string;
  /** Client name recorded on votes; the version is the package version */
  clientName: string;
  calendar: SiderealCalendar;
}

export interface VotingRunResult {
  flags: Flag[];
  summary: VotingRunSummary;
}

/**
 * Reject a mode before anything touches the database
 */
export function assertVotingMode(mode: string): VotingMode {
  if (mode.length > MAX_MODE_NAME_LENGTH) {
    throw new InvalidConfigurationError(
      `Voting mode name "${mode}" exceeds ${MAX_MODE_NAME_LENGTH} characters`,
      { mode, maxLength: MAX_MODE_NAME_LENGTH }
    );
  }
  if (!isVotingMode(mode)) {
    throw new UnknownModeError(mode, VOTING_MODES);
  }
  return mode;
}

export class VotingEngine {
  constructor(private readonly deps: VotingEngineDeps) {}

  /**
   * Run a vote and return the flags it created. Votes linked to a flag an
   * earlier vote already produced do not repeat it.
   */
  async runVote(mode: string, revision: Revision | string): Promise<Flag[]> {
    const result = await this.run(mode, revision);
    return result.flags;
  }

  /**
   * Run a vote, returning the created flags and a summary of the run
   */
  async run(mode: string, revision: Revision | string): Promise<VotingRunResult> {
    const votingMode = assertVotingMode(mode);
    const { repos } = this.deps;

    const target = await this.resolveRevision(revision);
    const runTime = this.deps.clock();
    const lowWaterMark = await this.lowWaterMark(votingMode);

    const candidates = await repos.opinions.listCandidates({
      revisionId: target.id,
      minLastEdit: lowWaterMark,
      unconsideredBy: votingMode,
    });

    logger.info(
      { mode: votingMode, revision: target.name, lowWaterMark, candidates: candidates.length },
      'Starting vote'
    );

    const summary: VotingRunSummary = {
      mode: votingMode,
      revision: target.name,
      lowWaterMark,
      candidates: candidates.length,
      flagged: 0,
      contested: 0,
    };

    if (candidates.length === 0) {
      logger.info(summary, 'Nothing to vote on');
      return { flags: [], summary };
    }

    const context: VotingRunContext = {
      mode: votingMode,
      revision: target,
      runTime,
      lowWaterMark,
      calendar: this.deps.calendar,
      opinions: repos.opinions,
    };
    const outcomes = await getStrategy(votingMode).evaluate(candidates, context);

    // Resolve everything the writes need before the first one
    const flagType = outcomes.some((o) => o.kind === 'flag')
      ? await this.resolveFlagType()
      : undefined;
    const client = await repos.clients.getOrCreate(this.deps.clientName, VERSION);

    const flags: Flag[] = [];
    for (const outcome of outcomes) {
      const flag = await this.persist(outcome, context, client.id, flagType);
      if (flag) {
        flags.push(flag);
      }
      if (outcome.kind === 'no-flag' && outcome.reason === 'contested') {
        summary.contested++;
      }
    }
    summary.flagged = flags.length;

    logger.info(summary, 'Vote complete');
    return { flags, summary };
  }

  private async resolveRevision(revision: Revision | string): Promise<Revision> {
    const found =
      typeof revision === 'string'
        ? await this.deps.repos.revisions.getByName(revision)
        : await this.deps.repos.revisions.getById(revision.id);
    if (!found) {
      throw createNotFoundError('revision', typeof revision === 'string' ? revision : revision.name);
    }
    return found;
  }

  private async resolveFlagType(): Promise<FlagType> {
    const flagType = await this.deps.repos.flagTypes.getByName(this.deps.flagTypeName);
    if (!flagType) {
      throw createNotFoundError('flag type', this.deps.flagTypeName);
    }
    return flagType;
  }

  /**
   * Latest vote time for the mode across all revisions, less the grace window
   */
  private async lowWaterMark(mode: VotingMode): Promise<UnixSeconds> {
    const latest = await this.deps.repos.votes.latestTime(mode);
    return latest === undefined ? 0 : latest - this.deps.graceSeconds;
  }

  private async persist(
    outcome: VoteOutcome,
    context: VotingRunContext,
    clientId: number,
    flagType: FlagType | undefined
  ): Promise<Flag | undefined> {
    let newFlag: NewFlagRow | undefined;
    if (outcome.kind === 'flag') {
      if (!flagType) {
        throw createNotFoundError('flag type', this.deps.flagTypeName);
      }
      newFlag = {
        typeId: flagType.id,
        startTime: outcome.flag.startTime,
        finishTime: outcome.flag.finishTime,
        metadata: outcome.flag.metadata,
      };
    }

    try {
      const recorded = await this.deps.repos.votes.record({
        time: context.runTime,
        mode: context.mode,
        clientId,
        revisionId: context.revision.id,
        lsd: outcome.lsd,
        opinionIds: outcome.opinionIds,
        flag: newFlag,
      });
      if (recorded.flag && recorded.flagCreated && flagType) {
        return { ...recorded.flag, typeName: flagType.name };
      }
      return undefined;
    } catch (error) {
      throw new PersistenceError('vote', error, {
        mode: context.mode,
        revision: context.revision.name,
        lsd: outcome.lsd,
        opinionIds: outcome.opinionIds,
      });
    }
  }
}
