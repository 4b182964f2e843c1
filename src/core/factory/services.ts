/**
 * Service factory functions
 *
 * Builds the service layer on top of the repositories.
 */

import type { Repositories } from '../interfaces/repositories.js';
import type { Config } from '../../config/index.js';
import type { Clock } from '../types.js';
import type { AppServices } from '../context.js';
import { CatalogService } from '../../services/catalog.service.js';
import { FlagService } from '../../services/flag.service.js';
import { OpinionService } from '../../services/opinion.service.js';
import { VotingEngine } from '../../services/voting/index.js';

export function createServices(repos: Repositories, config: Config, clock: Clock): AppServices {
  return {
    catalog: new CatalogService(repos),
    flags: new FlagService(repos),
    opinions: new OpinionService(repos, clock),
    voting: new VotingEngine({
      repos,
      clock,
      graceSeconds: config.voting.graceSeconds,
      flagTypeName: config.voting.flagType,
      clientName: config.voting.clientName,
      calendar: {
        epoch: config.sidereal.epoch,
        dayLengthSeconds: config.sidereal.dayLengthSeconds,
      },
    }),
  };
}
