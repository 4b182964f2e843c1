/**
 * Voting - aggregation of opinions into flags
 */

export { VotingEngine, assertVotingMode } from './engine.js';
export type { VotingEngineDeps, VotingRunResult } from './engine.js';
export { strategyRegistry, getStrategy, HypnotoadStrategy } from './strategies/index.js';
export type { VotingStrategy } from './strategy.interface.js';
export { VOTING_MODES, isVotingMode } from './types.js';
export type {
  VotingMode,
  VotingRunContext,
  VoteOutcome,
  FlagOutcome,
  NoFlagOutcome,
  ProposedFlag,
  OpinionLookup,
  VotingRunSummary,
} from './types.js';
