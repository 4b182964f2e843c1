/**
 * Flags - authoritative time ranges of data marked as affected by a condition
 */

import { sqliteTable, text, integer, real, index } from 'drizzle-orm/sqlite-core';
import { flagTypes } from './catalogs.js';
import type { DataMetadata } from './types.js';

export const flags = sqliteTable(
  'flags',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    typeId: integer('type_id')
      .references(() => flagTypes.id)
      .notNull(),
    startTime: real('start_time').notNull(),
    // null = open-ended
    finishTime: real('finish_time'),
    metadata: text('metadata', { mode: 'json' }).$type<DataMetadata>(),
  },
  (table) => [
    index('idx_flags_type').on(table.typeId),
    index('idx_flags_range').on(table.startTime, table.finishTime),
  ]
);

export type FlagRow = typeof flags.$inferSelect;
export type NewFlagRow = typeof flags.$inferInsert;
