import type { BaseLogger } from 'pino';
import {
  UNKNOWN_AUTHOR,
  classifyEvent,
  createEvent,
  firstPresent,
  formatCanonical,
  normalizeTimestamp,
} from '../domain/index.js';
import type { Event } from '../domain/index.js';
import {
  pushPayloadSchema,
  pullRequestPayloadSchema,
  describeIssues,
} from './webhook-schema.js';

const BRANCH_REF_PREFIX = 'refs/heads/';
const SHORT_SHA_LENGTH = 7;

/**
 * Outcome of normalizing one inbound notification.
 *
 * `unsupported` is not an error: the event type is deliberately ignored.
 * `parse_failure` is scoped to the single request that carried the payload.
 */
export type NormalizeResult =
  | { readonly kind: 'event'; readonly event: Event }
  | { readonly kind: 'unsupported'; readonly eventType: string }
  | { readonly kind: 'parse_failure'; readonly eventType: string; readonly reason: string };

export interface NormalizeOptions {
  /** Clock for timestamp fallbacks. Defaults to the system clock. */
  now?: (() => Date) | undefined;
  log?: BaseLogger | undefined;
}

interface ExtractContext {
  now: () => Date;
  log: BaseLogger | undefined;
}

class PayloadShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PayloadShapeError';
  }
}

/**
 * Canonicalizes the first available timestamp, or uses "now" when none exists.
 * A value of the wrong type is unreadable and also resolves to "now".
 */
function resolveTimestamp(candidate: unknown, ctx: ExtractContext): string {
  if (candidate === undefined) {
    return formatCanonical(ctx.now());
  }
  return normalizeTimestamp(candidate, {
    now: ctx.now,
    onFallback: (raw) => {
      ctx.log?.warn({ raw }, 'Unparseable upstream timestamp, using current time');
    },
  });
}

function branchFromRef(ref: string): string {
  return ref.startsWith(BRANCH_REF_PREFIX) ? ref.slice(BRANCH_REF_PREFIX.length) : ref;
}

function extractPush(payload: unknown, ctx: ExtractContext): Event {
  const parsed = pushPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new PayloadShapeError(describeIssues(parsed.error));
  }
  const p = parsed.data;

  // "Unknown" from upstream is indistinguishable from our sentinel; treat it as missing
  const pusherName = p.pusher?.name === UNKNOWN_AUTHOR ? undefined : p.pusher?.name;
  const author = firstPresent(pusherName, p.commits?.[0]?.author?.name) ?? UNKNOWN_AUTHOR;

  // Tag refs (refs/tags/...) are passed through verbatim
  const branch = branchFromRef(p.ref ?? '');

  const headId = firstPresent(p.head_commit?.id);
  const requestId = headId !== undefined ? headId.slice(0, SHORT_SHA_LENGTH) : '';

  const timestamp = resolveTimestamp(
    firstPresent<unknown>(p.head_commit?.timestamp, p.repository?.pushed_at),
    ctx,
  );

  return createEvent({
    request_id: requestId,
    author,
    action: 'PUSH',
    from_branch: branch,
    to_branch: branch,
    timestamp,
  });
}

/** Shared extraction path for opened and merged pull requests. */
function extractPullRequest(
  payload: unknown,
  action: 'PULL_REQUEST' | 'MERGE',
  ctx: ExtractContext,
): Event {
  const parsed = pullRequestPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new PayloadShapeError(describeIssues(parsed.error));
  }
  const pr = parsed.data.pull_request;

  const number = firstPresent<string | number>(pr?.number);

  const rawTimestamp = action === 'MERGE'
    ? firstPresent<unknown>(pr?.merged_at, pr?.updated_at)
    : firstPresent<unknown>(pr?.created_at);

  return createEvent({
    request_id: number !== undefined ? String(number) : '',
    author: firstPresent(pr?.user?.login) ?? UNKNOWN_AUTHOR,
    action,
    from_branch: pr?.head?.ref ?? '',
    to_branch: pr?.base?.ref ?? '',
    timestamp: resolveTimestamp(rawTimestamp, ctx),
  });
}

/**
 * Maps an upstream notification onto the canonical Event.
 *
 * Classification happens first (see `classifyEvent`); PULL_REQUEST and MERGE
 * then share one extraction path and differ only in the action and in which
 * timestamp field is preferred.
 */
export function normalizeWebhook(
  eventType: string,
  payload: unknown,
  options: NormalizeOptions = {},
): NormalizeResult {
  const action = classifyEvent(eventType, payload);
  if (action === 'UNSUPPORTED') {
    return { kind: 'unsupported', eventType };
  }

  const ctx: ExtractContext = {
    now: options.now ?? (() => new Date()),
    log: options.log,
  };

  try {
    const event = action === 'PUSH'
      ? extractPush(payload, ctx)
      : extractPullRequest(payload, action, ctx);
    return { kind: 'event', event };
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    ctx.log?.warn({ err, eventType }, 'Failed to parse webhook payload');
    return { kind: 'parse_failure', eventType, reason };
  }
}
