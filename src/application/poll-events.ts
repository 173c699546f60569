import { buildFeedQuery, createEvent } from '../domain/index.js';
import type { Event, EventStore } from '../domain/index.js';

export interface PollEventsParams {
  /** Exclusive lower bound; usually the newest timestamp the client has seen. */
  since?: string | undefined;
}

/**
 * Use case: events newer than the cursor, oldest first.
 *
 * Each row is re-projected onto the Event fields so nothing
 * storage-specific reaches the client.
 */
export async function pollEvents(store: EventStore, params: PollEventsParams = {}): Promise<Event[]> {
  const rows = await store.find(buildFeedQuery(params.since));
  return rows.map((row) => createEvent(row));
}
