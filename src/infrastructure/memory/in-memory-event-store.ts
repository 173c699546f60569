import { createEvent } from '../../domain/index.js';
import type { Event, EventStore, FeedQuery } from '../../domain/index.js';

/**
 * In-process EventStore.
 *
 * Backs `STORE_DRIVER=memory` for local runs without PostgreSQL, and the
 * HTTP tests. Contents are lost when the process exits.
 */
export class InMemoryEventStore implements EventStore {
  readonly driver = 'memory';
  private readonly events: Event[] = [];

  constructor(initial: readonly Event[] = []) {
    for (const event of initial) {
      this.events.push(createEvent(event));
    }
  }

  async insertOne(event: Event): Promise<void> {
    this.events.push(createEvent(event));
  }

  /** Array#sort is stable, so equal timestamps keep insertion order. */
  async find(query: FeedQuery): Promise<Event[]> {
    const lowerBound = query.filter.timestamp?.gt;
    const matched = lowerBound === undefined
      ? [...this.events]
      : this.events.filter((event) => event.timestamp > lowerBound);

    return matched.sort((a, b) => compareStrings(a.timestamp, b.timestamp));
  }

  async ping(): Promise<void> {
    // always reachable
  }

  /** Number of stored events. */
  get size(): number {
    return this.events.length;
  }
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
