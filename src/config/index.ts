/**
 * Centralized configuration module for dataflag
 *
 * Configuration is built from the registry at src/config/registry/.
 * Each option declares envKey, default, description, schema, and parser.
 *
 * To add a new config option:
 *   1. Find or create the section in src/config/registry/sections/
 *   2. Add the option with envKey, defaultValue, description, schema
 *   3. Optionally add parse: 'int' | 'boolean' | 'path' | custom function
 *
 * Usage:
 *   import { config } from './config/index.js';
 *   console.log(config.database.path);
 */

import {
  configRegistry,
  buildConfigSchema,
  buildConfigFromRegistry,
  validateConfig,
} from './registry/index.js';
import { projectRoot } from './registry/parsers.js';

// =============================================================================
// CONFIGURATION INTERFACE
// =============================================================================

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface Config {
  database: {
    path: string;
    skipInit: boolean;
    verbose: boolean;
    busyTimeoutMs: number;
  };
  logging: {
    level: LogLevel;
    pretty: boolean;
  };
  transaction: {
    maxRetries: number;
    initialDelayMs: number;
    maxDelayMs: number;
    backoffMultiplier: number;
  };
  runtime: {
    nodeEnv: string;
    dataDir: string;
    projectRoot: string;
  };
  voting: {
    graceSeconds: number;
    flagType: string;
    clientName: string;
  };
  sidereal: {
    epoch: number;
    dayLengthSeconds: number;
  };
}

const configSchema = buildConfigSchema(configRegistry);

// =============================================================================
// BUILD CONFIGURATION
// =============================================================================

/**
 * Build configuration from registry metadata.
 * Throws a validation error listing every invalid option.
 */
export function buildConfig(): Config {
  const parsed = validateConfig(buildConfigFromRegistry(configRegistry), configSchema);

  // The registry schema is built dynamically, so its parsed shape is only
  // known as a record; the interface above mirrors the registered sections.
  const baseConfig = parsed as unknown as Config;

  return {
    ...baseConfig,
    runtime: {
      ...baseConfig.runtime,
      projectRoot,
    },
  };
}

// Create the singleton config instance
export const config: Config = buildConfig();

/**
 * Reload configuration from environment variables.
 * WARNING: This mutates the config object. Only use in tests.
 */
export function reloadConfig(): void {
  const newConfig = buildConfig();
  for (const key of Object.keys(newConfig) as Array<keyof Config>) {
    Object.assign(config[key], newConfig[key]);
  }
}

// =============================================================================
// TEST UTILITIES - Config snapshot and restore for test isolation
// =============================================================================

function deepClone<T>(obj: T): T {
  return JSON.parse(JSON.stringify(obj)) as T;
}

/**
 * Create a snapshot of the current config state.
 * Use with restoreConfig() for test isolation.
 */
export function snapshotConfig(): Config {
  return deepClone(config);
}

/**
 * Restore config from a previously saved snapshot.
 * Does NOT modify environment variables - only the config object.
 */
export function restoreConfig(snapshot: Config): void {
  for (const key of Object.keys(snapshot) as Array<keyof Config>) {
    Object.assign(config[key], snapshot[key]);
  }
}

/**
 * Run a function with temporary environment variable overrides.
 * Saves config state, applies env changes, reloads, and restores on completion.
 *
 * @example
 * await withTestEnv({ DATAFLAG_VOTE_GRACE_SECONDS: '5' }, () => {
 *   expect(config.voting.graceSeconds).toBe(5);
 * });
 */
export async function withTestEnv<T>(
  envOverrides: Record<string, string | undefined>,
  testFn: () => T | Promise<T>
): Promise<T> {
  const configSnapshot = snapshotConfig();
  const envSnapshot: Record<string, string | undefined> = {};

  for (const key of Object.keys(envOverrides)) {
    envSnapshot[key] = process.env[key];
  }

  try {
    for (const [key, value] of Object.entries(envOverrides)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }

    reloadConfig();

    return await testFn();
  } finally {
    for (const [key, value] of Object.entries(envSnapshot)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }

    restoreConfig(configSnapshot);
  }
}

export { configRegistry } from './registry/index.js';
export { getAllEnvVars } from './registry/schema-builder.js';

export default config;
