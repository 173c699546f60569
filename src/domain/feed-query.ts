/**
 * Query shape for the polling feed.
 *
 * Only the contract lives here; each EventStore adapter translates it into
 * its own query language.
 */

export interface FeedFilter {
  /** Strict lower bound, compared as a string against canonical timestamps. */
  readonly timestamp?: { readonly gt: string };
}

export interface FeedSort {
  readonly field: 'timestamp';
  readonly direction: 'asc';
}

export interface FeedQuery {
  readonly filter: FeedFilter;
  readonly sort: FeedSort;
}

const ASCENDING_BY_TIMESTAMP: FeedSort = { field: 'timestamp', direction: 'asc' };

/**
 * Builds the feed query for an optional cursor.
 *
 * No cursor (or an empty one) matches every event. Otherwise only events
 * whose timestamp is strictly greater than the cursor match.
 */
export function buildFeedQuery(cursor?: string): FeedQuery {
  if (cursor === undefined || cursor === '') {
    return { filter: {}, sort: ASCENDING_BY_TIMESTAMP };
  }
  return { filter: { timestamp: { gt: cursor } }, sort: ASCENDING_BY_TIMESTAMP };
}
