/**
 * Sidereal Calendar Configuration Section
 *
 * LSD <-> Unix time conversion parameters.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const siderealSection: ConfigSectionMeta = {
  name: 'sidereal',
  description: 'Local sidereal day calendar.',
  options: {
    epoch: {
      envKey: 'DATAFLAG_LSD_EPOCH',
      defaultValue: 1384489049.96,
      description: 'Unix time at which LSD 0 begins.',
      schema: z.number(),
    },
    dayLengthSeconds: {
      envKey: 'DATAFLAG_SIDEREAL_DAY_SECONDS',
      defaultValue: 86164.09054,
      description: 'Length of one sidereal day in SI seconds.',
      schema: z.number().positive(),
    },
  },
};
