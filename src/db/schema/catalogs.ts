/**
 * Catalog tables: revisions, flag types, opinion types, category types
 *
 * Created administratively and referenced by flags, opinions and votes.
 */

import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';
import type { JsonObject } from './types.js';

/**
 * Revisions of the offline pipeline that produced the data
 */
export const revisions = sqliteTable('revisions', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name', { length: 32 }).notNull().unique(),
  description: text('description'),
});

/**
 * Why a flag exists (e.g. "rfi", "vote")
 */
export const flagTypes = sqliteTable('flag_types', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name', { length: 64 }).notNull().unique(),
  description: text('description'),
  metadata: text('metadata', { mode: 'json' }).$type<JsonObject>(),
});

/**
 * How an opinion was produced (manual, a web tool, ...)
 */
export const opinionTypes = sqliteTable('opinion_types', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name', { length: 64 }).notNull().unique(),
  description: text('description'),
  metadata: text('metadata', { mode: 'json' }).$type<JsonObject>(),
});

/**
 * Categories a user can attach to an opinion about a day of data
 */
export const categoryTypes = sqliteTable('category_types', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name', { length: 64 }).notNull().unique(),
  description: text('description'),
});

export type Revision = typeof revisions.$inferSelect;
export type NewRevision = typeof revisions.$inferInsert;
export type FlagType = typeof flagTypes.$inferSelect;
export type NewFlagType = typeof flagTypes.$inferInsert;
export type OpinionType = typeof opinionTypes.$inferSelect;
export type NewOpinionType = typeof opinionTypes.$inferInsert;
export type CategoryType = typeof categoryTypes.$inferSelect;
export type NewCategoryType = typeof categoryTypes.$inferInsert;
