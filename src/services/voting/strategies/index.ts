/**
 * Voting Strategy Registry
 *
 * Provides access to all voting strategies via a registry pattern.
 */

import type { VotingStrategy } from '../strategy.interface.js';
import type { VotingMode } from '../types.js';
import { HypnotoadStrategy } from './hypnotoad.strategy.js';

/**
 * Strategy registry - maps voting modes to implementations
 */
export const strategyRegistry: Record<VotingMode, VotingStrategy> = {
  hypnotoad: new HypnotoadStrategy(),
};

/**
 * Get a strategy by mode
 */
export function getStrategy(mode: VotingMode): VotingStrategy {
  return strategyRegistry[mode];
}

export { HypnotoadStrategy };
