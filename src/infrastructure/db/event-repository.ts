import { asc, gt, sql } from 'drizzle-orm';
import { createEvent } from '../../domain/index.js';
import type { Event, EventStore, FeedQuery } from '../../domain/index.js';
import type { Database } from './client.js';
import { events } from './schema.js';

/** Columns exposed to callers; `id` and `received_at` stay inside the adapter. */
const publicColumns = {
  request_id: events.request_id,
  author: events.author,
  action: events.action,
  from_branch: events.from_branch,
  to_branch: events.to_branch,
  timestamp: events.timestamp,
};

/** Appends one event. The table is insert-only; no conflict handling. */
export async function insertEvent(db: Database, event: Event): Promise<void> {
  await db.insert(events).values({
    request_id: event.request_id,
    author: event.author,
    action: event.action,
    from_branch: event.from_branch,
    to_branch: event.to_branch,
    timestamp: event.timestamp,
  });
}

/**
 * Builds the SELECT for a feed query without executing it.
 *
 * Ascending by timestamp, then by `id` so events sharing a timestamp come
 * back in insertion order.
 */
export function buildFindEventsQuery(db: Database, query: FeedQuery) {
  const lowerBound = query.filter.timestamp;
  const whereClause = lowerBound !== undefined ? gt(events.timestamp, lowerBound.gt) : undefined;

  return db
    .select(publicColumns)
    .from(events)
    .where(whereClause)
    .orderBy(asc(events.timestamp), asc(events.id));
}

export async function findEvents(db: Database, query: FeedQuery): Promise<Event[]> {
  const rows = await buildFindEventsQuery(db, query);
  return rows.map((row) => createEvent(row));
}

/** Round-trips a trivial statement; rejects when the database is unreachable. */
export async function pingDatabase(db: Database): Promise<void> {
  await db.execute(sql`select 1`);
}

/** EventStore adapter over the functions above. */
export function createPostgresEventStore(db: Database): EventStore {
  return {
    driver: 'postgres',
    insertOne: (event) => insertEvent(db, event),
    find: (query) => findEvents(db, query),
    ping: () => pingDatabase(db),
  };
}
