/**
 * CLI Context Utilities
 *
 * Provides lazy initialization of AppContext for CLI commands.
 * Context is cached for reuse within a single CLI invocation.
 */

import type { AppContext } from '../../core/context.js';
import type { GlobalOptions } from './typed-action.js';
import { formatOutput } from './output.js';
import { handleCliError } from './errors.js';

let cachedContext: AppContext | null = null;

/**
 * Initialize AppContext for CLI usage (lazy, cached)
 */
export async function getCliContext(globalOpts: GlobalOptions = {}): Promise<AppContext> {
  if (cachedContext) return cachedContext;

  // Load environment before config is built
  const { loadEnv } = await import('../../config/env.js');
  const path = await import('node:path');
  const { fileURLToPath } = await import('node:url');

  const __filename = fileURLToPath(import.meta.url);
  const projectRoot = path.resolve(path.dirname(__filename), '../../..');
  loadEnv(projectRoot);

  const { config } = await import('../../config/index.js');
  if (globalOpts.db !== undefined) {
    config.database.path = path.resolve(globalOpts.db);
  }

  const { createAppContext } = await import('../../core/factory.js');
  cachedContext = createAppContext(config);

  return cachedContext;
}

/**
 * Shutdown CLI context cleanly
 */
export async function shutdownCliContext(): Promise<void> {
  if (cachedContext) {
    const { shutdownAppContext } = await import('../../core/factory.js');
    shutdownAppContext(cachedContext);
    cachedContext = null;
  }
}

/**
 * Run a command body against the CLI context, print its result and
 * report any error on stderr.
 */
export async function runCommand(
  globalOpts: GlobalOptions,
  body: (context: AppContext) => Promise<unknown>
): Promise<void> {
  try {
    const context = await getCliContext(globalOpts);
    const result = await body(context);
    // eslint-disable-next-line no-console
    console.log(formatOutput(result, globalOpts.format));
  } catch (error) {
    await shutdownCliContext();
    handleCliError(error);
  } finally {
    await shutdownCliContext();
  }
}
