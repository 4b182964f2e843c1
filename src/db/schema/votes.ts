/**
 * Votes - audit records of the voting engine, one per opinion considered
 */

import { sqliteTable, text, integer, real, index, primaryKey } from 'drizzle-orm/sqlite-core';
import { revisions } from './catalogs.js';
import { clients } from './clients.js';
import { flags } from './flags.js';
import { opinions } from './opinions.js';

export const votes = sqliteTable(
  'votes',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    time: real('time').notNull(),
    mode: text('mode', { length: 32 }).notNull(),
    clientId: integer('client_id')
      .references(() => clients.id)
      .notNull(),
    revisionId: integer('revision_id')
      .references(() => revisions.id)
      .notNull(),
    // null = the opinion did not produce a flag
    flagId: integer('flag_id').references(() => flags.id),
    lsd: integer('lsd').notNull(),
  },
  (table) => [
    index('idx_votes_mode_time').on(table.mode, table.time),
    index('idx_votes_revision').on(table.revisionId),
  ]
);

/**
 * Many-to-many: the opinions a vote is a record for
 */
export const voteOpinions = sqliteTable(
  'vote_opinions',
  {
    voteId: integer('vote_id')
      .references(() => votes.id)
      .notNull(),
    opinionId: integer('opinion_id')
      .references(() => opinions.id)
      .notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.voteId, table.opinionId] }),
    index('idx_vote_opinions_opinion').on(table.opinionId),
  ]
);

export type VoteRow = typeof votes.$inferSelect;
export type NewVoteRow = typeof votes.$inferInsert;
export type VoteOpinionRow = typeof voteOpinions.$inferSelect;
