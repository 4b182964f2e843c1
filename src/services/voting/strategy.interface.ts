/**
 * Voting Strategy Interface
 *
 * Defines the contract that all voting strategies must implement.
 */

import type { Opinion, VoteOutcome, VotingMode, VotingRunContext } from './types.js';

/**
 * Strategy interface for opinion aggregation
 */
export interface VotingStrategy {
  /**
   * The mode name recorded on every vote this strategy produces
   */
  readonly name: VotingMode;

  /**
   * Decide the outcome for every candidate opinion.
   *
   * Every candidate must appear in exactly one outcome, and outcomes may only
   * depend on the opinion set as read at scan time.
   *
   * @param candidates - Unconsidered opinions for the run's revision, ascending by id
   * @param context - Per-run parameters and read access to the ledger
   */
  evaluate(candidates: readonly Opinion[], context: VotingRunContext): Promise<VoteOutcome[]>;
}
