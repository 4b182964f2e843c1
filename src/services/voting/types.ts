/**
 * Voting Engine Types
 */

import type { Opinion } from '../../core/interfaces/repositories.js';
import type { DataMetadata, Decision, Revision } from '../../db/schema.js';
import type { UnixSeconds } from '../../core/types.js';
import type { SiderealCalendar } from '../../utils/sidereal.js';

// =============================================================================
// MODES
// =============================================================================

export const VOTING_MODES = ['hypnotoad'] as const;

/**
 * Registered aggregation strategies. Adding a mode means adding a member
 * here and an entry in the strategy registry.
 */
export type VotingMode = (typeof VOTING_MODES)[number];

export function isVotingMode(value: string): value is VotingMode {
  return VOTING_MODES.some((mode) => mode === value);
}

// =============================================================================
// RUN CONTEXT
// =============================================================================

/**
 * Read access a strategy has to the opinion ledger
 */
export interface OpinionLookup {
  countConflicting(lsd: number, revisionId: number, decision: Decision): Promise<number>;
}

/**
 * Everything a strategy may depend on, computed once per run
 */
export interface VotingRunContext {
  mode: VotingMode;
  revision: Revision;
  /** Timestamp recorded on every vote of this run */
  runTime: UnixSeconds;
  /** Opinions edited before this were settled by earlier runs */
  lowWaterMark: UnixSeconds;
  calendar: SiderealCalendar;
  opinions: OpinionLookup;
}

// =============================================================================
// OUTCOMES
// =============================================================================

export interface ProposedFlag {
  startTime: UnixSeconds;
  finishTime: UnixSeconds;
  metadata: DataMetadata;
}

interface BaseOutcome {
  lsd: number;
  /** Opinions the vote records as considered */
  opinionIds: number[];
}

export interface FlagOutcome extends BaseOutcome {
  kind: 'flag';
  flag: ProposedFlag;
}

export interface NoFlagOutcome extends BaseOutcome {
  kind: 'no-flag';
  reason: 'not-bad' | 'contested';
}

export type VoteOutcome = FlagOutcome | NoFlagOutcome;

// =============================================================================
// RUN RESULT
// =============================================================================

export interface VotingRunSummary {
  mode: VotingMode;
  revision: string;
  lowWaterMark: UnixSeconds;
  candidates: number;
  flagged: number;
  contested: number;
}

export type { Opinion };
