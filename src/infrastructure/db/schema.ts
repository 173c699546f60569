import { pgTable, bigserial, varchar, text, timestamp, index } from 'drizzle-orm/pg-core';
import type { EventAction } from '../../domain/index.js';

/**
 * Drizzle schema for the `events` table.
 *
 * `timestamp` holds the canonical `YYYY-MM-DDTHH:MM:SSZ` string rather than
 * a timestamptz: the feed cursor is a string comparison, and the canonical
 * format keeps that comparison chronological.
 *
 * `id` and `received_at` are storage-internal and never leave the adapter.
 * `id` also breaks ties between events sharing a timestamp.
 */
export const events = pgTable('events', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  request_id: varchar('request_id', { length: 255 }).notNull(),
  author: text('author').notNull(),
  action: varchar('action', { length: 20 }).$type<EventAction>().notNull(),
  from_branch: text('from_branch').notNull(),
  to_branch: text('to_branch').notNull(),
  timestamp: varchar('timestamp', { length: 20 }).notNull(),
  received_at: timestamp('received_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_events_timestamp').on(table.timestamp),
]);

