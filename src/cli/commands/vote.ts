/**
 * Vote CLI Command
 *
 * Runs the voting engine and lists its audit trail.
 */

import type { Command } from 'commander';
import { runCommand } from '../utils/context.js';
import { typedAction } from '../utils/typed-action.js';
import { parseInteger } from '../utils/parse.js';
import { VOTING_MODES } from '../../services/voting/index.js';
import { createNotFoundError } from '../../core/errors.js';

interface VoteRunOptions extends Record<string, unknown> {
  mode: string;
  revision: string;
  verbose?: boolean;
}

interface VoteListOptions extends Record<string, unknown> {
  mode?: string;
  revision?: string;
  lsd?: number;
}

export function addVoteCommand(program: Command): void {
  const vote = program.command('vote').description('Aggregate opinions into flags');

  vote
    .command('run')
    .description('Run a vote over unconsidered opinions of a revision')
    .requiredOption('--mode <mode>', `Voting mode (${VOTING_MODES.join(', ')})`)
    .requiredOption('--revision <name>', 'Revision')
    .option('--verbose', 'Include the created flags in the output', false)
    .action(
      typedAction<VoteRunOptions>(async (options, globalOpts) => {
        await runCommand(globalOpts, async (ctx) => {
          const { flags, summary } = await ctx.services.voting.run(options.mode, options.revision);
          return options.verbose ? { ...summary, flags } : summary;
        });
      })
    );

  vote
    .command('list')
    .description('List votes')
    .option('--mode <mode>', 'Voting mode')
    .option('--revision <name>', 'Revision')
    .option('--lsd <n>', 'Local sidereal day', parseInteger)
    .action(
      typedAction<VoteListOptions>(async (options, globalOpts) => {
        await runCommand(globalOpts, async (ctx) => {
          let revisionId: number | undefined;
          if (options.revision !== undefined) {
            const revision = await ctx.repos.revisions.getByName(options.revision);
            if (!revision) {
              throw createNotFoundError('revision', options.revision);
            }
            revisionId = revision.id;
          }
          const votes = await ctx.repos.votes.list({
            mode: options.mode,
            revisionId,
            lsd: options.lsd,
          });
          return { votes, count: votes.length };
        });
      })
    );
}
