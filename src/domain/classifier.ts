import type { EventAction } from './event.js';

/** Classification outcome: a supported action, or a deliberate ignore. */
export type Classification = EventAction | 'UNSUPPORTED';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * A pull request counts as merged only when it was closed AND carries
 * `merged: true`. Closing without merging is still a PULL_REQUEST.
 */
function isMergeClose(payload: unknown): boolean {
  if (!isRecord(payload)) return false;

  const action = typeof payload['action'] === 'string' ? payload['action'].toLowerCase() : '';
  const pr = payload['pull_request'];
  const merged = isRecord(pr) && pr['merged'] === true;

  return action === 'closed' && merged;
}

/**
 * Decides which action an inbound notification represents.
 *
 * The tag is the upstream event name (the `X-GitHub-Event` header), matched
 * case-insensitively. Anything other than `push` or `pull_request` is
 * UNSUPPORTED, which callers treat as a silent no-op rather than an error.
 */
export function classifyEvent(eventType: string, payload: unknown): Classification {
  switch (eventType.trim().toLowerCase()) {
    case 'push':
      return 'PUSH';
    case 'pull_request':
      return isMergeClose(payload) ? 'MERGE' : 'PULL_REQUEST';
    default:
      return 'UNSUPPORTED';
  }
}
