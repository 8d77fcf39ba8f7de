/**
 * Database Schema Definitions for Cadence
 *
 * Drizzle ORM schema definitions for SQLite. The matching DDL lives in
 * schema.sql and is applied when a database is opened; keep the two in sync.
 *
 * Timestamps are stored as text in the form produced by `formatTimestamp`
 * (`2024-03-01T09:00:00.000+08:00`). Rows written by older tools may hold
 * naive text without an offset or may be missing values; the card service
 * repairs those on read. Text timestamps with different offsets do not sort
 * by instant, so due-date filtering happens after parsing, not in SQL.
 */

import { sqliteTable, text, integer, index, uniqueIndex } from 'drizzle-orm/sqlite-core';

/**
 * Cards Table
 *
 * One question/answer pair and its scheduling state. Scheduling columns are
 * nullable at the storage level because legacy data may be incomplete; the
 * domain guarantees them after repair.
 */
export const cards = sqliteTable(
  'cards',
  {
    // Unique identifier (e.g., 'card_3f2a...')
    id: text('id').primaryKey(),

    // Owner the card belongs to; every operation is scoped by it
    ownerId: text('owner_id').notNull(),

    question: text('question').notNull(),
    answer: text('answer').notNull(),

    // Consecutive successful reviews since the last reset
    repetitionCount: integer('repetition_count').notNull().default(0),

    // Start of the current streak
    firstReviewAt: text('first_review_at'),

    // When the card next becomes eligible for review
    nextDueAt: text('next_due_at'),

    createdAt: text('created_at'),
    updatedAt: text('updated_at'),

    // Optimistic concurrency version, incremented on every write
    version: integer('version').notNull().default(1),
  },
  (table) => [index('cards_owner_id_idx').on(table.ownerId)]
);

/**
 * Interval Rules Table
 *
 * One owner's pacing table: each row maps a repetition range to an interval
 * in days. Rows are replaced wholesale, never edited in place.
 */
export const intervalRules = sqliteTable(
  'interval_rules',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    ownerId: text('owner_id').notNull(),
    minRepetition: integer('min_repetition').notNull(),
    maxRepetition: integer('max_repetition').notNull(),
    intervalDays: integer('interval_days').notNull(),
    createdAt: text('created_at').notNull(),
  },
  (table) => [
    uniqueIndex('interval_rules_owner_min_idx').on(table.ownerId, table.minRepetition),
  ]
);

// Inferred row types
export type CardRow = typeof cards.$inferSelect;
export type NewCardRow = typeof cards.$inferInsert;
export type IntervalRuleRow = typeof intervalRules.$inferSelect;
export type NewIntervalRuleRow = typeof intervalRules.$inferInsert;
