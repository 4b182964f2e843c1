// Library entry point for dataflag

export { config, buildConfig, type Config } from './config/index.js';
export { loadEnv } from './config/env.js';
export * from './core/errors.js';
export type { AppDb, DatabaseDeps, Clock, UnixSeconds } from './core/types.js';
export type { AppContext, AppServices } from './core/context.js';
export { createAppContext, shutdownAppContext } from './core/factory.js';
export type * from './core/interfaces/repositories.js';
export { openDatabase, closeDatabase, transactionWithRetry } from './db/connection.js';
export * from './db/schema.js';
export { CatalogService } from './services/catalog.service.js';
export { FlagService } from './services/flag.service.js';
export { OpinionService } from './services/opinion.service.js';
export * from './services/voting/index.js';
export { lsdToUnix, unixToLsd, lsdWindow, type SiderealCalendar } from './utils/sidereal.js';
export { freqMask, inputMask } from './utils/masks.js';
export { validateMetadata } from './utils/metadata.js';
export { VERSION } from './version.js';
