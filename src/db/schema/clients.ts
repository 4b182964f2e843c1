/**
 * Clients and users: who (and with which software) wrote a record
 */

import { sqliteTable, text, integer, uniqueIndex } from 'drizzle-orm/sqlite-core';

/**
 * Client software used to create an opinion or vote
 */
export const clients = sqliteTable(
  'clients',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    clientName: text('client_name').notNull(),
    clientVersion: text('client_version').notNull(),
  },
  (table) => [uniqueIndex('idx_clients_name_version').on(table.clientName, table.clientVersion)]
);

/**
 * Known users. Names follow the wiki convention of an upper-case first letter.
 */
export const users = sqliteTable('users', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  userName: text('user_name').notNull().unique(),
});

export type Client = typeof clients.$inferSelect;
export type User = typeof users.$inferSelect;
