/**
 * Voting Configuration Section
 *
 * Settings for translating opinions into flags.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const votingSection: ConfigSectionMeta = {
  name: 'voting',
  description: 'Voting engine configuration.',
  options: {
    graceSeconds: {
      envKey: 'DATAFLAG_VOTE_GRACE_SECONDS',
      defaultValue: 60,
      description:
        'Seconds subtracted from the last vote time of a mode. Opinions edited inside this window are scanned again.',
      schema: z.number().min(0),
    },
    flagType: {
      envKey: 'DATAFLAG_VOTE_FLAG_TYPE',
      defaultValue: 'vote',
      description: 'Name of the flag type given to flags created by a vote. Must exist.',
      schema: z.string().min(1),
    },
    clientName: {
      envKey: 'DATAFLAG_VOTE_CLIENT_NAME',
      defaultValue: 'dataflag.vote',
      description: 'Client name recorded on votes.',
      schema: z.string().min(1),
    },
  },
};
