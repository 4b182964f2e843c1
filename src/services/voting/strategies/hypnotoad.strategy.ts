/**
 * Hypnotoad strategy
 *
 * Unanimity: an LSD is flagged for one sidereal day only when no opinion on
 * it under the same revision disagrees, and the agreed decision is "bad".
 * Every candidate gets its own vote, flagged or not. Unanimous bad opinions
 * on one LSD share a single proposed flag whose metadata merges theirs:
 * - freq and inputs are the union, or absent (everything) if any opinion
 *   leaves them out
 * - instrument is kept only when all opinions name the same one
 * - user lists the authors in candidate order
 */

import type { VotingStrategy } from '../strategy.interface.js';
import type { Opinion, ProposedFlag, VoteOutcome, VotingRunContext } from '../types.js';
import type { DataMetadata, Instrument } from '../../../db/schema.js';
import { lsdWindow } from '../../../utils/sidereal.js';
import { createComponentLogger } from '../../../utils/logger.js';

const logger = createComponentLogger('voting:hypnotoad');

function mergeIndices(lists: ReadonlyArray<readonly number[] | undefined>): number[] | undefined {
  const merged = new Set<number>();
  for (const list of lists) {
    if (list === undefined) return undefined;
    for (const index of list) merged.add(index);
  }
  return [...merged].sort((a, b) => a - b);
}

function commonInstrument(group: readonly Opinion[]): Instrument | undefined {
  const first = group[0]?.metadata?.instrument;
  return group.every((o) => o.metadata?.instrument === first) ? first : undefined;
}

function mergeFlagMetadata(group: readonly Opinion[]): DataMetadata {
  const metadata: DataMetadata = {};
  const instrument = commonInstrument(group);
  if (instrument !== undefined) metadata.instrument = instrument;

  const freq = mergeIndices(group.map((o) => o.metadata?.freq));
  if (freq !== undefined) metadata.freq = freq;

  const inputs = mergeIndices(group.map((o) => o.metadata?.inputs));
  if (inputs !== undefined) metadata.inputs = inputs;

  metadata.user = [...new Set(group.map((o) => o.userName))].join(', ');
  return metadata;
}

function proposeFlag(lsd: number, group: readonly Opinion[], context: VotingRunContext): ProposedFlag {
  const window = lsdWindow(lsd, context.calendar);
  return {
    startTime: window.start,
    finishTime: window.finish,
    metadata: mergeFlagMetadata(group),
  };
}

export class HypnotoadStrategy implements VotingStrategy {
  readonly name = 'hypnotoad' as const;

  async evaluate(candidates: readonly Opinion[], context: VotingRunContext): Promise<VoteOutcome[]> {
    const contested = new Set<number>();
    const unanimousBad = new Map<number, Opinion[]>();

    for (const opinion of candidates) {
      const conflicting = await context.opinions.countConflicting(
        opinion.lsd,
        opinion.revisionId,
        opinion.decision
      );
      if (conflicting > 0) {
        logger.debug(
          { opinionId: opinion.id, lsd: opinion.lsd, conflicting },
          'LSD contested, no flag'
        );
        contested.add(opinion.id);
      } else if (opinion.decision === 'bad') {
        const group = unanimousBad.get(opinion.lsd) ?? [];
        group.push(opinion);
        unanimousBad.set(opinion.lsd, group);
      }
    }

    const proposed = new Map<number, ProposedFlag>();
    for (const [lsd, group] of unanimousBad) {
      proposed.set(lsd, proposeFlag(lsd, group, context));
    }

    return candidates.map((opinion): VoteOutcome => {
      const base = { lsd: opinion.lsd, opinionIds: [opinion.id] };
      if (contested.has(opinion.id)) {
        return { ...base, kind: 'no-flag', reason: 'contested' };
      }
      const flag = opinion.decision === 'bad' ? proposed.get(opinion.lsd) : undefined;
      return flag ? { ...base, kind: 'flag', flag } : { ...base, kind: 'no-flag', reason: 'not-bad' };
    });
  }
}
