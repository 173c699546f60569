/**
 * Core domain types for the gitfeed event model.
 *
 * An Event is the canonical record of one source-control action, whatever
 * shape the upstream notification arrived in. These types carry no
 * framework dependencies.
 */

/** Actions the feed records. Order is irrelevant; membership is the contract. */
export const EVENT_ACTIONS = ['PUSH', 'PULL_REQUEST', 'MERGE'] as const;

export type EventAction = (typeof EVENT_ACTIONS)[number];

/** Sentinel used when no author could be resolved from the payload. */
export const UNKNOWN_AUTHOR = 'Unknown';

/**
 * Canonical Event entity.
 *
 * `timestamp` is always `YYYY-MM-DDTHH:MM:SSZ` in UTC, which keeps the
 * lexicographic order of the field equal to its chronological order.
 */
export interface Event {
  readonly request_id: string;
  readonly author: string;
  readonly action: EventAction;
  readonly from_branch: string;
  readonly to_branch: string;
  readonly timestamp: string;
}

/** Builds a frozen Event. Field values are taken as given. */
export function createEvent(fields: Event): Event {
  return Object.freeze({
    request_id: fields.request_id,
    author: fields.author,
    action: fields.action,
    from_branch: fields.from_branch,
    to_branch: fields.to_branch,
    timestamp: fields.timestamp,
  });
}
