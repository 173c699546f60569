import type { FeedEvent } from '../api/types.js';

export const DEFAULT_POLL_INTERVAL_MS = 15_000;

export interface FeedPollerOptions {
  fetchEvents: (since?: string) => Promise<FeedEvent[]>;
  onEvents: (events: FeedEvent[]) => void;
  onError?: ((err: unknown) => void) | undefined;
  intervalMs?: number | undefined;
}

export interface FeedPoller {
  /**
   * Fetches once with the current cursor; resolves to the events received.
   * While a fetch is pending, further calls share its result.
   */
  pollOnce(): Promise<FeedEvent[]>;
  /** Polls immediately, then every `intervalMs`. No-op if already running. */
  start(): void;
  stop(): void;
  /** Timestamp of the newest event seen so far, or undefined before the first one. */
  cursor(): string | undefined;
}

/**
 * Client-side cursor tracking for the polling feed.
 *
 * The server keeps no session state: every request carries the timestamp
 * of the newest event this client has seen. Events arrive oldest first,
 * so the last one becomes the next cursor.
 */
export function createFeedPoller(options: FeedPollerOptions): FeedPoller {
  const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  let lastSeen: string | undefined;
  let timer: ReturnType<typeof setInterval> | null = null;
  let inFlight: Promise<FeedEvent[]> | null = null;

  async function fetchBatch(): Promise<FeedEvent[]> {
    let events: FeedEvent[];
    try {
      events = await options.fetchEvents(lastSeen);
    } catch (err: unknown) {
      options.onError?.(err);
      return [];
    }

    const newest = events.at(-1);
    if (newest !== undefined) {
      options.onEvents(events);
      lastSeen = newest.timestamp;
    }
    return events;
  }

  // One request at a time: a tick that lands while a fetch is pending joins it
  function pollOnce(): Promise<FeedEvent[]> {
    if (inFlight === null) {
      inFlight = fetchBatch().finally(() => {
        inFlight = null;
      });
    }
    return inFlight;
  }

  function tick(): void {
    pollOnce().catch((err: unknown) => options.onError?.(err));
  }

  return {
    pollOnce,
    start() {
      if (timer !== null) return;
      tick();
      timer = setInterval(tick, intervalMs);
    },
    stop() {
      if (timer === null) return;
      clearInterval(timer);
      timer = null;
    },
    cursor: () => lastSeen,
  };
}
