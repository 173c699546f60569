import type { BaseLogger } from 'pino';
import { isSupportedAction } from '../domain/index.js';
import type { Event, EventStore } from '../domain/index.js';
import { normalizeWebhook } from './normalize-webhook.js';

export type IngestResult =
  | { readonly kind: 'stored'; readonly event: Event }
  | { readonly kind: 'unsupported'; readonly eventType: string }
  | { readonly kind: 'parse_failure'; readonly eventType: string; readonly reason: string }
  | { readonly kind: 'invalid_action'; readonly action: string };

export interface IngestOptions {
  now?: (() => Date) | undefined;
  log?: BaseLogger | undefined;
}

/**
 * Use case: normalize an inbound notification and append it to the log.
 *
 * Order: classify + normalize → action gate → insert. Nothing is written
 * for unsupported types or unparseable payloads. Storage errors propagate
 * to the caller unchanged.
 */
export async function ingestWebhook(
  store: EventStore,
  eventType: string,
  payload: unknown,
  options: IngestOptions = {},
): Promise<IngestResult> {
  const result = normalizeWebhook(eventType, payload, options);
  if (result.kind !== 'event') {
    return result;
  }

  const { event } = result;
  if (!isSupportedAction(event.action)) {
    return { kind: 'invalid_action', action: String(event.action) };
  }

  await store.insertOne(event);
  options.log?.debug(
    { request_id: event.request_id, action: event.action, timestamp: event.timestamp },
    'Event stored',
  );

  return { kind: 'stored', event };
}
