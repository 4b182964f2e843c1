import type { Logger } from 'pino';
import type { Config } from '../config/index.js';
import type { Repositories } from './interfaces/repositories.js';
import type { DatabaseConnection } from '../db/connection.js';
import type { CatalogService } from '../services/catalog.service.js';
import type { FlagService } from '../services/flag.service.js';
import type { OpinionService } from '../services/opinion.service.js';
import type { VotingEngine } from '../services/voting/index.js';

export interface AppServices {
  catalog: CatalogService;
  flags: FlagService;
  opinions: OpinionService;
  voting: VotingEngine;
}

/**
 * Everything a command needs: config, the open database, repositories and services
 */
export interface AppContext {
  config: Config;
  connection: DatabaseConnection;
  repos: Repositories;
  services: AppServices;
  logger: Logger;
}
