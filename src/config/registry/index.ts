/**
 * Config Registry
 *
 * Assembles all configuration sections into a complete registry.
 * This is the single source of truth for config metadata.
 */

import type { ConfigRegistry } from './types.js';

import { databaseSection } from './sections/database.js';
import { loggingSection } from './sections/logging.js';
import { transactionSection } from './sections/transaction.js';
import { runtimeSection } from './sections/runtime.js';
import { votingSection } from './sections/voting.js';
import { siderealSection } from './sections/sidereal.js';

/**
 * The complete config registry with all sections.
 */
export const configRegistry: ConfigRegistry = {
  sections: {
    database: databaseSection,
    logging: loggingSection,
    transaction: transactionSection,
    runtime: runtimeSection,
    voting: votingSection,
    sidereal: siderealSection,
  },
};

export type { ConfigRegistry, ConfigSectionMeta, ConfigOptionMeta } from './types.js';
export {
  buildConfigSchema,
  buildConfigFromRegistry,
  validateConfig,
  getAllEnvVars,
  formatZodErrors,
} from './schema-builder.js';
