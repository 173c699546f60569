export { pushPayloadSchema, pullRequestPayloadSchema, describeIssues } from './webhook-schema.js';
export type { PushPayload, PullRequestPayload } from './webhook-schema.js';
export { normalizeWebhook } from './normalize-webhook.js';
export type { NormalizeResult, NormalizeOptions } from './normalize-webhook.js';
export { ingestWebhook } from './ingest-webhook.js';
export type { IngestResult, IngestOptions } from './ingest-webhook.js';
export { pollEvents } from './poll-events.js';
export type { PollEventsParams } from './poll-events.js';
