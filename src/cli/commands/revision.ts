/**
 * Revision CLI Command
 */

import type { Command } from 'commander';
import { runCommand } from '../utils/context.js';
import { typedAction } from '../utils/typed-action.js';

interface RevisionCreateOptions extends Record<string, unknown> {
  description?: string;
}

export function addRevisionCommand(program: Command): void {
  const revision = program.command('revision').description('Manage processing revisions');

  revision
    .command('create <name>')
    .description('Create a revision')
    .option('--description <text>', 'Free-text description')
    .action(
      typedAction<RevisionCreateOptions>(async (options, globalOpts, [name = '']) => {
        await runCommand(globalOpts, (ctx) =>
          ctx.services.catalog.createRevision(name, options.description)
        );
      })
    );

  revision
    .command('list')
    .description('List revisions')
    .action(
      typedAction(async (_options, globalOpts) => {
        await runCommand(globalOpts, async (ctx) => {
          const revisions = await ctx.services.catalog.listRevisions();
          return { revisions, count: revisions.length };
        });
      })
    );

  revision
    .command('show <name>')
    .description('Show a revision')
    .action(
      typedAction(async (_options, globalOpts, [name = '']) => {
        await runCommand(globalOpts, (ctx) => ctx.services.catalog.getRevision(name));
      })
    );
}
