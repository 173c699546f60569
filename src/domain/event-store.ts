import type { Event } from './event.js';
import type { FeedQuery } from './feed-query.js';

/**
 * Storage port for the append-only event log.
 *
 * Adapters own ordering: `find` returns events ascending by timestamp,
 * ties in insertion order, with no storage-internal identifiers attached.
 */
export interface EventStore {
  /** Short name reported by the health endpoint, e.g. `postgres`. */
  readonly driver: string;
  insertOne(event: Event): Promise<void>;
  find(query: FeedQuery): Promise<Event[]>;
  /** Resolves when the backing store is reachable, rejects otherwise. */
  ping(): Promise<void>;
}
