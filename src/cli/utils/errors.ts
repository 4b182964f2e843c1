/**
 * CLI Error Handling
 *
 * Provides consistent error handling for CLI commands.
 */

import { mapError } from '../../utils/error-mapper.js';

/**
 * Render an error as the JSON document written to stderr
 */
export function formatCliError(error: unknown): string {
  const mapped = mapError(error);
  const output = {
    error: mapped.message,
    code: mapped.code,
    ...(mapped.details ? { details: mapped.details } : {}),
  };
  return JSON.stringify(output, null, 2);
}

/**
 * Handle CLI errors consistently
 */
export function handleCliError(error: unknown): never {
  console.error(formatCliError(error));
  process.exit(1);
}
