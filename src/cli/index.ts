/**
 * CLI Main Program
 *
 * Commander.js program setup for the dataflag CLI.
 */

import { Command, Option } from 'commander';
import { VERSION } from '../version.js';

import { addRevisionCommand } from './commands/revision.js';
import { addFlagTypeCommand, addOpinionTypeCommand } from './commands/type.js';
import { addUserCommand, addCategoryCommand } from './commands/user.js';
import { addFlagCommand } from './commands/flag.js';
import { addOpinionCommand } from './commands/opinion.js';
import { addVoteCommand } from './commands/vote.js';

/**
 * Create the Commander.js program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('dataflag')
    .description('Data flags, opinions and voting for sidereal-day data quality')
    .version(VERSION)
    .addOption(
      new Option('--format <format>', 'Output format').choices(['json', 'table']).default('json')
    )
    .option('--db <path>', 'SQLite database file (overrides DATAFLAG_DB_PATH)');

  registerCommands(program);

  return program;
}

/**
 * Register all subcommands
 */
function registerCommands(program: Command): void {
  // Catalogs
  addRevisionCommand(program);
  addFlagTypeCommand(program);
  addOpinionTypeCommand(program);
  addCategoryCommand(program);
  addUserCommand(program);

  // Ledgers
  addFlagCommand(program);
  addOpinionCommand(program);

  // Voting
  addVoteCommand(program);
}

/**
 * Run the CLI program
 */
export async function runCli(argv: string[]): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv, { from: 'user' });
}
