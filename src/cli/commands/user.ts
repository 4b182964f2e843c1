/**
 * User and category CLI Commands
 */

import type { Command } from 'commander';
import { runCommand } from '../utils/context.js';
import { typedAction } from '../utils/typed-action.js';

interface CategoryCreateOptions extends Record<string, unknown> {
  description?: string;
}

export function addUserCommand(program: Command): void {
  const user = program.command('user').description('Manage users');

  user
    .command('add <name>')
    .description('Add a user (the first letter is upper-cased)')
    .action(
      typedAction(async (_options, globalOpts, [name = '']) => {
        await runCommand(globalOpts, (ctx) => ctx.services.catalog.addUser(name));
      })
    );

  user
    .command('list')
    .description('List users')
    .action(
      typedAction(async (_options, globalOpts) => {
        await runCommand(globalOpts, async (ctx) => {
          const users = await ctx.services.catalog.listUsers();
          return { users, count: users.length };
        });
      })
    );
}

export function addCategoryCommand(program: Command): void {
  const category = program.command('category').description('Manage opinion categories');

  category
    .command('create <name>')
    .description('Create a category')
    .option('--description <text>', 'Free-text description')
    .action(
      typedAction<CategoryCreateOptions>(async (options, globalOpts, [name = '']) => {
        await runCommand(globalOpts, (ctx) =>
          ctx.services.catalog.createCategory(name, options.description)
        );
      })
    );

  category
    .command('list')
    .description('List categories')
    .action(
      typedAction(async (_options, globalOpts) => {
        await runCommand(globalOpts, async (ctx) => {
          const categories = await ctx.services.catalog.listCategories();
          return { categories, count: categories.length };
        });
      })
    );
}
