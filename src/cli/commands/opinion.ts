/**
 * Opinion CLI Command
 */

import type { Command } from 'commander';
import { runCommand } from '../utils/context.js';
import { typedAction } from '../utils/typed-action.js';
import {
  buildMetadata,
  collect,
  parseIndexList,
  parseInteger,
  parseJson,
  type MetadataOptions,
} from '../utils/parse.js';
import { VERSION } from '../../version.js';

interface OpinionCreateOptions extends Record<string, unknown>, MetadataOptions {
  user: string;
  type: string;
  decision: string;
  lsd: number;
  revision: string;
  notes?: string;
  category?: string[];
  clientName: string;
  clientVersion: string;
}

interface OpinionEditOptions extends Record<string, unknown> {
  decision?: string;
  type?: string;
  lsd?: number;
  notes?: string;
  user?: string;
}

interface OpinionListOptions extends Record<string, unknown> {
  revision?: string;
  type?: string;
  user?: string;
  lsd?: number;
  decision?: string;
}

export function addOpinionCommand(program: Command): void {
  const opinion = program.command('opinion').description('Record and review opinions');

  opinion
    .command('create')
    .description('Record an opinion; an existing one for the same key is updated')
    .requiredOption('--user <name>', 'Author')
    .requiredOption('--type <name>', 'Opinion type')
    .requiredOption('--decision <decision>', 'good, bad or unsure')
    .requiredOption('--lsd <n>', 'Local sidereal day', parseInteger)
    .requiredOption('--revision <name>', 'Revision')
    .option('--notes <text>', 'Free-text notes')
    .option('--category <name>', 'Category (repeatable)', collect)
    .option('--metadata <json>', 'JSON object of metadata', parseJson)
    .option('--instrument <name>', 'Instrument (chime, pathfinder)')
    .option('--freq <list>', 'Comma-separated frequency indices', parseIndexList)
    .option('--inputs <list>', 'Comma-separated input indices', parseIndexList)
    .option('--client-name <name>', 'Client recorded with the opinion', 'dataflag')
    .option('--client-version <version>', 'Client version', VERSION)
    .action(
      typedAction<OpinionCreateOptions>(async (options, globalOpts) => {
        await runCommand(globalOpts, (ctx) =>
          ctx.services.opinions.createOpinion({
            user: options.user,
            type: options.type,
            decision: options.decision,
            lsd: options.lsd,
            revision: options.revision,
            clientName: options.clientName,
            clientVersion: options.clientVersion,
            notes: options.notes,
            categories: options.category,
            metadata: buildMetadata(options),
          })
        );
      })
    );

  opinion
    .command('edit <id>')
    .description('Edit an opinion (the author cannot change)')
    .option('--decision <decision>', 'good, bad or unsure')
    .option('--type <name>', 'Opinion type')
    .option('--lsd <n>', 'Local sidereal day', parseInteger)
    .option('--notes <text>', 'Free-text notes')
    .option('--user <name>', 'Author (must match the current author)')
    .action(
      typedAction<OpinionEditOptions>(async (options, globalOpts, [id = '']) => {
        await runCommand(globalOpts, (ctx) =>
          ctx.services.opinions.editOpinion(parseInteger(id), {
            decision: options.decision,
            type: options.type,
            lsd: options.lsd,
            notes: options.notes,
            user: options.user,
          })
        );
      })
    );

  opinion
    .command('list')
    .description('List opinions')
    .option('--revision <name>', 'Revision')
    .option('--type <name>', 'Opinion type')
    .option('--user <name>', 'Author')
    .option('--lsd <n>', 'Local sidereal day', parseInteger)
    .option('--decision <decision>', 'good, bad or unsure')
    .action(
      typedAction<OpinionListOptions>(async (options, globalOpts) => {
        await runCommand(globalOpts, async (ctx) => {
          const opinions = await ctx.services.opinions.listOpinions({
            revision: options.revision,
            type: options.type,
            user: options.user,
            lsd: options.lsd,
            decision: options.decision,
          });
          return { opinions, count: opinions.length };
        });
      })
    );

  opinion
    .command('show <id>')
    .description('Show an opinion')
    .action(
      typedAction(async (_options, globalOpts, [id = '']) => {
        await runCommand(globalOpts, (ctx) => ctx.services.opinions.getOpinion(parseInteger(id)));
      })
    );
}
