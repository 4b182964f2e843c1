/**
 * Flag CLI Command
 *
 * Administrative path for flags; the voting engine creates flags on its own.
 */

import type { Command } from 'commander';
import { runCommand } from '../utils/context.js';
import { typedAction } from '../utils/typed-action.js';
import {
  buildMetadata,
  parseIndexList,
  parseInteger,
  parseJson,
  parseTimestamp,
  type MetadataOptions,
} from '../utils/parse.js';

interface FlagCreateOptions extends Record<string, unknown>, MetadataOptions {
  type: string;
  start: number;
  finish?: number;
}

interface FlagEditOptions extends Record<string, unknown>, MetadataOptions {
  type?: string;
  start?: number;
  finish?: number;
  openEnded?: boolean;
}

interface FlagListOptions extends Record<string, unknown> {
  type?: string;
  start?: number;
  finish?: number;
}

function addMetadataOptions(command: Command): Command {
  return command
    .option('--metadata <json>', 'JSON object of metadata', parseJson)
    .option('--instrument <name>', 'Instrument (chime, pathfinder)')
    .option('--freq <list>', 'Comma-separated frequency indices', parseIndexList)
    .option('--inputs <list>', 'Comma-separated input indices', parseIndexList)
    .option('--description <text>', 'Free-text description');
}

export function addFlagCommand(program: Command): void {
  const flag = program.command('flag').description('Manage data flags');

  addMetadataOptions(
    flag
      .command('create')
      .description('Create a flag')
      .requiredOption('--type <name>', 'Flag type')
      .requiredOption('--start <time>', 'Start (Unix seconds)', parseTimestamp)
      .option('--finish <time>', 'Finish (Unix seconds); omit for open-ended', parseTimestamp)
  ).action(
    typedAction<FlagCreateOptions>(async (options, globalOpts) => {
      await runCommand(globalOpts, (ctx) =>
        ctx.services.flags.createFlag({
          type: options.type,
          startTime: options.start,
          finishTime: options.finish,
          metadata: buildMetadata(options),
        })
      );
    })
  );

  flag
    .command('list')
    .description('List flags, optionally overlapping a time range')
    .option('--type <name>', 'Flag type')
    .option('--start <time>', 'Range start (Unix seconds)', parseTimestamp)
    .option('--finish <time>', 'Range end (Unix seconds)', parseTimestamp)
    .action(
      typedAction<FlagListOptions>(async (options, globalOpts) => {
        await runCommand(globalOpts, async (ctx) => {
          const flags = await ctx.services.flags.listFlags({
            type: options.type,
            start: options.start,
            finish: options.finish,
          });
          return { flags, count: flags.length };
        });
      })
    );

  flag
    .command('show <id>')
    .description('Show a flag')
    .action(
      typedAction(async (_options, globalOpts, [id = '']) => {
        await runCommand(globalOpts, (ctx) => ctx.services.flags.getFlag(parseInteger(id)));
      })
    );

  addMetadataOptions(
    flag
      .command('edit <id>')
      .description('Edit a flag; metadata is merged into the stored value')
      .option('--type <name>', 'Flag type')
      .option('--start <time>', 'Start (Unix seconds)', parseTimestamp)
      .option('--finish <time>', 'Finish (Unix seconds)', parseTimestamp)
      .option('--open-ended', 'Clear the finish time')
  ).action(
    typedAction<FlagEditOptions>(async (options, globalOpts, [id = '']) => {
      await runCommand(globalOpts, (ctx) =>
        ctx.services.flags.editFlag(parseInteger(id), {
          type: options.type,
          startTime: options.start,
          finishTime: options.openEnded ? null : options.finish,
          metadata: buildMetadata(options),
        })
      );
    })
  );

  flag
    .command('mask <id>')
    .description('Show the dense frequency and input masks of a flag')
    .action(
      typedAction(async (_options, globalOpts, [id = '']) => {
        await runCommand(globalOpts, async (ctx) => {
          const masks = await ctx.services.flags.getMasks(parseInteger(id));
          return {
            freq: masks.freqMask.flatMap((on, i) => (on ? [i] : [])),
            freqCount: masks.freqMask.filter(Boolean).length,
            inputs: masks.inputMask?.flatMap((on, i) => (on ? [i] : [])) ?? null,
          };
        });
      })
    );
}
