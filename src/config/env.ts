import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { existsSync } from 'node:fs';

/**
 * Load environment variables from a .env file in the project root.
 *
 * Call before anything reads configuration.
 */
export function loadEnv(projectRoot: string): void {
  if (process.env.__DATAFLAG_ENV_LOADED) return;

  const envPath = resolve(projectRoot, '.env');
  if (existsSync(envPath)) {
    dotenvConfig({ path: envPath });
  }

  process.env.__DATAFLAG_ENV_LOADED = '1';
}
