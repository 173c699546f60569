export { EVENT_ACTIONS, UNKNOWN_AUTHOR, createEvent } from './event.js';
export type { Event, EventAction } from './event.js';
export {
  CANONICAL_TIMESTAMP_PATTERN,
  formatCanonical,
  parseTimestamp,
  normalizeTimestamp,
} from './timestamp.js';
export type { NormalizeTimestampOptions } from './timestamp.js';
export { firstPresent } from './candidates.js';
export { classifyEvent } from './classifier.js';
export type { Classification } from './classifier.js';
export { isSupportedAction } from './validator.js';
export { buildFeedQuery } from './feed-query.js';
export type { FeedQuery, FeedFilter, FeedSort } from './feed-query.js';
export type { EventStore } from './event-store.js';
