import type { FeedEvent } from '../api/types.js';

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
] as const;

/** English ordinal suffix; 11th–13th are the exceptions. */
export function daySuffix(day: number): string {
  if (day > 3 && day < 21) return 'th';
  switch (day % 10) {
    case 1: return 'st';
    case 2: return 'nd';
    case 3: return 'rd';
    default: return 'th';
  }
}

/**
 * Formats a canonical timestamp for display, always in UTC:
 * `2021-04-01T21:30:00Z` → `1st April 2021 - 9:30 PM UTC`.
 * Returns the input unchanged if it does not parse.
 */
export function formatFeedTimestamp(timestamp: string): string {
  const date = new Date(timestamp);
  if (Number.isNaN(date.getTime())) return timestamp;

  const day = date.getUTCDate();
  const month = MONTH_NAMES[date.getUTCMonth()] ?? '';
  const year = date.getUTCFullYear();

  const hours24 = date.getUTCHours();
  const hours = hours24 % 12 === 0 ? 12 : hours24 % 12;
  const minutes = String(date.getUTCMinutes()).padStart(2, '0');
  const meridiem = hours24 >= 12 ? 'PM' : 'AM';

  return `${day}${daySuffix(day)} ${month} ${year} - ${hours}:${minutes} ${meridiem} UTC`;
}

/** One human-readable line per feed event. */
export function formatEventMessage(event: FeedEvent): string {
  const author = event.author || 'Unknown';
  const when = formatFeedTimestamp(event.timestamp);

  switch (event.action) {
    case 'PUSH':
      return `"${author}" pushed to "${event.to_branch}" on ${when}`;
    case 'PULL_REQUEST':
      return `"${author}" submitted a pull request from "${event.from_branch}" to "${event.to_branch}" on ${when}`;
    case 'MERGE':
      return `"${author}" merged branch "${event.from_branch}" to "${event.to_branch}" on ${when}`;
    default:
      return `"${author}" performed ${event.action} on ${when}`;
  }
}
