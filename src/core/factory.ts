/**
 * Application Context Factory
 *
 * Main factory function for creating AppContext.
 * Sub-factories are located in ./factory/.
 */

import type { AppContext } from './context.js';
import type { Config } from '../config/index.js';
import { systemClock, type Clock } from './types.js';
import { createComponentLogger } from '../utils/logger.js';
import { openDatabase, closeDatabase, type DatabaseConnection } from '../db/connection.js';
import { createRepositories, createServices } from './factory/index.js';

export interface AppContextOptions {
  /** Use an already-open connection instead of opening config.database.path */
  connection?: DatabaseConnection;
  clock?: Clock;
}

/**
 * Create a new Application Context
 *
 * @param config - The application configuration
 * @returns Fully initialized AppContext
 */
export function createAppContext(config: Config, options: AppContextOptions = {}): AppContext {
  const logger = createComponentLogger('app');

  const connection = options.connection ?? openDatabase({ dbPath: config.database.path });
  logger.debug({ dbPath: config.database.path }, 'Database ready');

  const repos = createRepositories(connection);
  const services = createServices(repos, config, options.clock ?? systemClock);

  return { config, connection, repos, services, logger };
}

/**
 * Shutdown an AppContext, closing its database.
 */
export function shutdownAppContext(context: AppContext): void {
  closeDatabase(context.connection);
  context.logger.debug('AppContext shutdown complete');
}
