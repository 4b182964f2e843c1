/**
 * Type-safe action wrapper for Commander.js
 *
 * Commander.js action handlers have implicit 'any' types; this wrapper gives
 * each handler typed options.
 */

import type { Command } from 'commander';
import type { OutputFormat } from './output.js';

/**
 * Global CLI options available to all commands via --option flags
 */
export interface GlobalOptions {
  /** Output format: json or table */
  format?: OutputFormat;
  /** Database file, overriding DATAFLAG_DB_PATH */
  db?: string;
}

/**
 * Type-safe action wrapper for Commander.js handlers
 *
 * @example
 * ```typescript
 * program
 *   .command('list')
 *   .option('--revision <name>')
 *   .action(typedAction<ListOptions>(async (options, globalOpts) => {
 *     console.log(options.revision);
 *   }));
 * ```
 */
export function typedAction<TOptions extends Record<string, unknown>>(
  handler: (options: TOptions, globalOpts: GlobalOptions, args: string[]) => Promise<void>
): (...actionArgs: unknown[]) => Promise<void> {
  return async (...actionArgs: unknown[]) => {
    // Commander passes positional arguments first, then options, then the command
    const cmd = actionArgs[actionArgs.length - 1];
    const options = actionArgs[actionArgs.length - 2];
    const args = actionArgs.slice(0, -2).filter((a): a is string => typeof a === 'string');
    if (!isCommand(cmd)) {
      throw new Error('Commander action invoked without a command');
    }
    // Type assertion is necessary: Commander.js returns loose types from optsWithGlobals()
    const globalOpts = cmd.optsWithGlobals() as GlobalOptions;
    await handler(options as TOptions, globalOpts, args);
  };
}

function isCommand(value: unknown): value is Command {
  return typeof value === 'object' && value !== null && 'optsWithGlobals' in value;
}
