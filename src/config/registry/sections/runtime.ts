/**
 * Runtime Configuration Section
 *
 * Process environment and where dataflag keeps its files.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';
import { getDataDir } from '../parsers.js';

export const runtimeSection: ConfigSectionMeta = {
  name: 'runtime',
  description: 'Process environment and data directory.',
  options: {
    nodeEnv: {
      envKey: 'NODE_ENV',
      defaultValue: 'development',
      description: 'development, production or test. Pretty logging is off in production.',
      schema: z.string(),
    },
    dataDir: {
      envKey: 'DATAFLAG_DATA_DIR',
      defaultValue: 'data',
      description:
        'Directory holding the database. Defaults to ~/.dataflag for an installed package, ./data otherwise.',
      schema: z.string(),
      parse: () => getDataDir(),
    },
  },
};
