/**
 * Flag type and opinion type CLI Commands
 */

import type { Command } from 'commander';
import { runCommand } from '../utils/context.js';
import { typedAction } from '../utils/typed-action.js';
import { parseJson } from '../utils/parse.js';

interface TypeCreateOptions extends Record<string, unknown> {
  description?: string;
  metadata?: unknown;
}

export function addFlagTypeCommand(program: Command): void {
  const type = program.command('type').description('Manage flag types');

  type
    .command('create <name>')
    .description('Create a flag type')
    .option('--description <text>', 'Free-text description')
    .option('--metadata <json>', 'JSON object of extra metadata', parseJson)
    .action(
      typedAction<TypeCreateOptions>(async (options, globalOpts, [name = '']) => {
        await runCommand(globalOpts, (ctx) =>
          ctx.services.catalog.createFlagType({
            name,
            description: options.description,
            metadata: options.metadata,
          })
        );
      })
    );

  type
    .command('list')
    .description('List flag types')
    .action(
      typedAction(async (_options, globalOpts) => {
        await runCommand(globalOpts, async (ctx) => {
          const flagTypes = await ctx.services.catalog.listFlagTypes();
          return { flagTypes, count: flagTypes.length };
        });
      })
    );

  type
    .command('show <name>')
    .description('Show a flag type')
    .action(
      typedAction(async (_options, globalOpts, [name = '']) => {
        await runCommand(globalOpts, (ctx) => ctx.services.catalog.getFlagType(name));
      })
    );
}

export function addOpinionTypeCommand(program: Command): void {
  const type = program.command('opinion-type').description('Manage opinion types');

  type
    .command('create <name>')
    .description('Create an opinion type')
    .option('--description <text>', 'Free-text description')
    .option('--metadata <json>', 'JSON object of extra metadata', parseJson)
    .action(
      typedAction<TypeCreateOptions>(async (options, globalOpts, [name = '']) => {
        await runCommand(globalOpts, (ctx) =>
          ctx.services.catalog.createOpinionType({
            name,
            description: options.description,
            metadata: options.metadata,
          })
        );
      })
    );

  type
    .command('list')
    .description('List opinion types')
    .action(
      typedAction(async (_options, globalOpts) => {
        await runCommand(globalOpts, async (ctx) => {
          const opinionTypes = await ctx.services.catalog.listOpinionTypes();
          return { opinionTypes, count: opinionTypes.length };
        });
      })
    );

  type
    .command('show <name>')
    .description('Show an opinion type')
    .action(
      typedAction(async (_options, globalOpts, [name = '']) => {
        await runCommand(globalOpts, (ctx) => ctx.services.catalog.getOpinionType(name));
      })
    );
}
