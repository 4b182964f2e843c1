/**
 * Database Configuration Section
 *
 * SQLite database settings.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const databaseSection: ConfigSectionMeta = {
  name: 'database',
  description: 'SQLite database configuration.',
  options: {
    path: {
      envKey: 'DATAFLAG_DB_PATH',
      defaultValue: 'dataflag.db',
      description:
        'Path to SQLite database file. Supports ~ expansion and ":memory:". Relative paths resolved from DATAFLAG_DATA_DIR.',
      schema: z.string(),
      parse: 'path',
    },
    skipInit: {
      envKey: 'DATAFLAG_SKIP_INIT',
      defaultValue: false,
      description: 'Skip applying migrations on startup.',
      schema: z.boolean(),
    },
    verbose: {
      envKey: 'DATAFLAG_DB_VERBOSE',
      defaultValue: false,
      description: 'Log migration progress when opening the database.',
      schema: z.boolean(),
    },
    busyTimeoutMs: {
      envKey: 'DATAFLAG_DB_BUSY_TIMEOUT_MS',
      defaultValue: 5000,
      description: 'SQLite busy timeout in milliseconds. How long to wait for locks.',
      schema: z.number().int().positive(),
      parse: 'int',
    },
  },
};
