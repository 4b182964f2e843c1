/**
 * Opinions - one user's judgement about one LSD under one revision
 */

import {
  sqliteTable,
  text,
  integer,
  real,
  index,
  uniqueIndex,
  primaryKey,
} from 'drizzle-orm/sqlite-core';
import { revisions, opinionTypes, categoryTypes } from './catalogs.js';
import { clients, users } from './clients.js';
import { DECISIONS, type DataMetadata } from './types.js';

export const opinions = sqliteTable(
  'opinions',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    typeId: integer('type_id')
      .references(() => opinionTypes.id)
      .notNull(),
    userId: integer('user_id')
      .references(() => users.id)
      .notNull(),
    decision: text('decision', { enum: DECISIONS }).notNull(),
    // Unix seconds; lastEdit >= creationTime
    creationTime: real('creation_time').notNull(),
    lastEdit: real('last_edit').notNull(),
    clientId: integer('client_id')
      .references(() => clients.id)
      .notNull(),
    revisionId: integer('revision_id')
      .references(() => revisions.id)
      .notNull(),
    lsd: integer('lsd').notNull(),
    notes: text('notes'),
    metadata: text('metadata', { mode: 'json' }).$type<DataMetadata>(),
  },
  (table) => [
    uniqueIndex('idx_opinions_unique').on(table.typeId, table.userId, table.lsd, table.revisionId),
    index('idx_opinions_revision_lsd').on(table.revisionId, table.lsd),
    index('idx_opinions_last_edit').on(table.lastEdit),
  ]
);

/**
 * Many-to-many: categories identified for each opinion
 */
export const opinionCategories = sqliteTable(
  'opinion_categories',
  {
    opinionId: integer('opinion_id')
      .references(() => opinions.id)
      .notNull(),
    categoryId: integer('category_id')
      .references(() => categoryTypes.id)
      .notNull(),
  },
  (table) => [primaryKey({ columns: [table.opinionId, table.categoryId] })]
);

export type OpinionRow = typeof opinions.$inferSelect;
export type NewOpinionRow = typeof opinions.$inferInsert;
