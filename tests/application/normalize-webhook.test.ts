import { describe, it, expect, vi, beforeEach } from 'vitest';
import { pino } from 'pino';
import { normalizeWebhook } from '../../src/application/normalize-webhook.js';
import type { NormalizeResult } from '../../src/application/normalize-webhook.js';
import type { Event } from '../../src/domain/index.js';
import {
  FIXED_NOW_CANONICAL,
  fixedClock,
  makeMergePayload,
  makePullRequestPayload,
  makePushPayload,
} from '../helpers/payloads.js';

const log = pino({ level: 'silent' });

function expectEvent(result: NormalizeResult): Event {
  if (result.kind !== 'event') {
    throw new Error(`expected an event, got ${result.kind}`);
  }
  return result.event;
}

function normalize(eventType: string, payload: unknown): Event {
  return expectEvent(normalizeWebhook(eventType, payload, { now: fixedClock, log }));
}

beforeEach(() => {
  vi.restoreAllMocks();
});

// ─── push ────────────────────────────────────────────────────

describe('normalizeWebhook: push', () => {
  it('maps a complete push payload', () => {
    expect(normalize('push', makePushPayload())).toEqual({
      request_id: 'a1b2c3d',
      author: 'octo-dev',
      action: 'PUSH',
      from_branch: 'main',
      to_branch: 'main',
      timestamp: '2024-05-10T13:15:30Z',
    });
  });

  it('returns a frozen event', () => {
    expect(Object.isFrozen(normalize('push', makePushPayload()))).toBe(true);
  });

  // --- author resolution ---

  it('falls back to the first commit author when pusher is absent', () => {
    const payload = makePushPayload({
      pusher: undefined,
      commits: [{ id: 'c1', author: { name: 'alice' } }, { id: 'c2', author: { name: 'carol' } }],
    });
    expect(normalize('push', payload).author).toBe('alice');
  });

  it('falls back to the first commit author when pusher name is empty', () => {
    const payload = makePushPayload({ pusher: { name: '' } });
    expect(normalize('push', payload).author).toBe('Octo Dev');
  });

  it('treats an upstream "Unknown" pusher as missing and uses the commit author', () => {
    const payload = makePushPayload({
      pusher: { name: 'Unknown' },
      commits: [{ id: 'c1', author: { name: 'bob' } }],
    });
    expect(normalize('push', payload).author).toBe('bob');
  });

  it('yields the Unknown sentinel when the pusher is "Unknown" and there are no commits', () => {
    const payload = makePushPayload({ pusher: { name: 'Unknown' }, commits: [] });
    expect(normalize('push', payload).author).toBe('Unknown');
  });

  it('yields the Unknown sentinel when neither pusher nor commits exist', () => {
    const payload = makePushPayload({ pusher: undefined, commits: undefined });
    expect(normalize('push', payload).author).toBe('Unknown');
  });

  // --- branch extraction ---

  it('strips refs/heads/ and keeps nested branch paths', () => {
    const event = normalize('push', makePushPayload({ ref: 'refs/heads/feature/login-form' }));
    expect(event.from_branch).toBe('feature/login-form');
    expect(event.to_branch).toBe('feature/login-form');
  });

  it('passes tag refs through verbatim', () => {
    const event = normalize('push', makePushPayload({ ref: 'refs/tags/v1.2.0' }));
    expect(event.from_branch).toBe('refs/tags/v1.2.0');
    expect(event.to_branch).toBe('refs/tags/v1.2.0');
  });

  it('uses an empty branch when ref is absent', () => {
    const event = normalize('push', makePushPayload({ ref: undefined }));
    expect(event.to_branch).toBe('');
  });

  // --- request id ---

  it('keeps a head commit id shorter than seven characters', () => {
    const payload = makePushPayload({ head_commit: { id: 'abc', timestamp: '2024-05-10T00:00:00Z' } });
    expect(normalize('push', payload).request_id).toBe('abc');
  });

  it('uses an empty request id when head_commit is null', () => {
    const payload = makePushPayload({ head_commit: null });
    expect(normalize('push', payload).request_id).toBe('');
  });

  // --- timestamp sources ---

  it('falls back to repository.pushed_at epoch seconds without a head commit', () => {
    const payload = makePushPayload({ head_commit: null, repository: { pushed_at: 1700000000 } });
    expect(normalize('push', payload).timestamp).toBe('2023-11-14T22:13:20Z');
  });

  it('falls back to an ISO repository.pushed_at when the head commit has no timestamp', () => {
    const payload = makePushPayload({
      head_commit: { id: 'a1b2c3d4e5' },
      repository: { pushed_at: '2024-05-10T10:00:00+02:00' },
    });
    expect(normalize('push', payload).timestamp).toBe('2024-05-10T08:00:00Z');
  });

  it('uses the current instant when no timestamp source exists', () => {
    const payload = makePushPayload({ head_commit: null, repository: undefined });
    expect(normalize('push', payload).timestamp).toBe(FIXED_NOW_CANONICAL);
  });

  it('logs and uses the current instant for an unparseable head commit timestamp', () => {
    const warn = vi.spyOn(log, 'warn');
    const payload = makePushPayload({ head_commit: { id: 'a1b2c3d4e5', timestamp: 'garbage' } });

    expect(normalize('push', payload).timestamp).toBe(FIXED_NOW_CANONICAL);
    expect(warn).toHaveBeenCalledWith({ raw: 'garbage' }, 'Unparseable upstream timestamp, using current time');
  });

  it('reads a numeric head commit timestamp as epoch seconds', () => {
    const payload = makePushPayload({ head_commit: { id: 'abcdef123', timestamp: 1715346930 } });
    expect(normalize('push', payload)).toMatchObject({
      request_id: 'abcdef1',
      timestamp: '2024-05-10T13:15:30Z',
    });
  });

  it('logs and uses the current instant for a head commit timestamp of the wrong type', () => {
    const warn = vi.spyOn(log, 'warn');
    const payload = makePushPayload({ head_commit: { id: 'abcdef123', timestamp: { at: 'noon' } } });

    const result = normalizeWebhook('push', payload, { now: fixedClock, log });

    expect(expectEvent(result).timestamp).toBe(FIXED_NOW_CANONICAL);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith({ raw: { at: 'noon' } }, 'Unparseable upstream timestamp, using current time');
  });

  // --- malformed structure ---

  it('reports a parse failure when commits is not an array', () => {
    const warn = vi.spyOn(log, 'warn');
    const result = normalizeWebhook('push', makePushPayload({ commits: 'nope' }), { now: fixedClock, log });

    expect(result.kind).toBe('parse_failure');
    if (result.kind === 'parse_failure') {
      expect(result.eventType).toBe('push');
      expect(result.reason).toContain('commits');
    }
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('reports a parse failure when a commit entry is null', () => {
    const result = normalizeWebhook('push', makePushPayload({ commits: [null] }), { now: fixedClock });
    expect(result.kind).toBe('parse_failure');
  });
});

// ─── pull_request ────────────────────────────────────────────

describe('normalizeWebhook: pull_request', () => {
  it('maps an opened pull request', () => {
    expect(normalize('pull_request', makePullRequestPayload())).toEqual({
      request_id: '42',
      author: 'reviewer-one',
      action: 'PULL_REQUEST',
      from_branch: 'feature/login',
      to_branch: 'develop',
      timestamp: '2024-05-11T08:00:00Z',
    });
  });

  it('maps a merged pull request using merged_at', () => {
    expect(normalize('pull_request', makeMergePayload())).toEqual({
      request_id: '42',
      author: 'reviewer-one',
      action: 'MERGE',
      from_branch: 'feature/login',
      to_branch: 'develop',
      timestamp: '2024-05-12T16:45:10Z',
    });
  });

  it('treats closed-without-merge as PULL_REQUEST timed by created_at', () => {
    const payload = makePullRequestPayload({ state: 'closed', merged: false }, { action: 'closed' });
    const event = normalize('pull_request', payload);
    expect(event.action).toBe('PULL_REQUEST');
    expect(event.timestamp).toBe('2024-05-11T08:00:00Z');
  });

  // --- timestamp sources ---

  it('falls back to updated_at for a merge without merged_at', () => {
    const event = normalize('pull_request', makeMergePayload({ merged_at: null }));
    expect(event.timestamp).toBe('2024-05-11T09:30:00Z');
  });

  it('falls back to the current instant for a merge without merged_at or updated_at', () => {
    const event = normalize('pull_request', makeMergePayload({ merged_at: null, updated_at: null }));
    expect(event.timestamp).toBe(FIXED_NOW_CANONICAL);
  });

  it('does not use updated_at for an opened pull request without created_at', () => {
    const event = normalize('pull_request', makePullRequestPayload({ created_at: undefined }));
    expect(event.timestamp).toBe(FIXED_NOW_CANONICAL);
  });

  it('stores a merge whose merged_at has the wrong type, timed by the current instant', () => {
    const warn = vi.spyOn(log, 'warn');

    const event = normalize('pull_request', makeMergePayload({ merged_at: false }));

    expect(event.action).toBe('MERGE');
    expect(event.timestamp).toBe(FIXED_NOW_CANONICAL);
    expect(warn).toHaveBeenCalledWith({ raw: false }, 'Unparseable upstream timestamp, using current time');
  });

  it('accepts a numeric created_at as epoch seconds', () => {
    const event = normalize('pull_request', makePullRequestPayload({ created_at: 1700000000 }));
    expect(event.timestamp).toBe('2023-11-14T22:13:20Z');
  });

  // --- field fallbacks ---

  it('uses the Unknown sentinel when the user is missing', () => {
    const event = normalize('pull_request', makePullRequestPayload({ user: null }));
    expect(event.author).toBe('Unknown');
  });

  it.each(['', '   '])('uses the Unknown sentinel for a blank login %j', (login) => {
    const event = normalize('pull_request', makePullRequestPayload({ user: { login } }));
    expect(event.author).toBe('Unknown');
  });

  it('keeps a real upstream login of "Unknown" unchanged', () => {
    const event = normalize('pull_request', makePullRequestPayload({ user: { login: 'Unknown' } }));
    expect(event.author).toBe('Unknown');
  });

  it('uses empty branches when head and base are missing', () => {
    const event = normalize('pull_request', makePullRequestPayload({ head: undefined, base: null }));
    expect(event.from_branch).toBe('');
    expect(event.to_branch).toBe('');
  });

  it('stringifies a numeric or string PR number', () => {
    expect(normalize('pull_request', makePullRequestPayload({ number: 7 })).request_id).toBe('7');
    expect(normalize('pull_request', makePullRequestPayload({ number: '17' })).request_id).toBe('17');
  });

  it('uses an empty request id when the number is missing', () => {
    const event = normalize('pull_request', makePullRequestPayload({ number: null }));
    expect(event.request_id).toBe('');
  });

  it('produces a default event when pull_request is absent', () => {
    expect(normalize('pull_request', { action: 'opened' })).toEqual({
      request_id: '',
      author: 'Unknown',
      action: 'PULL_REQUEST',
      from_branch: '',
      to_branch: '',
      timestamp: FIXED_NOW_CANONICAL,
    });
  });

  it('reports a parse failure when pull_request is not an object', () => {
    const result = normalizeWebhook('pull_request', { action: 'opened', pull_request: 'oops' }, { now: fixedClock });
    expect(result.kind).toBe('parse_failure');
    if (result.kind === 'parse_failure') {
      expect(result.reason).toContain('pull_request');
    }
  });
});

// ─── unsupported + determinism ───────────────────────────────

describe('normalizeWebhook: general', () => {
  it('signals unsupported for other event types', () => {
    expect(normalizeWebhook('issues', { action: 'opened' })).toEqual({
      kind: 'unsupported',
      eventType: 'issues',
    });
  });

  it('produces identical events for the same payload with explicit timestamps', () => {
    const payload = makeMergePayload();
    const first = normalizeWebhook('pull_request', payload);
    const second = normalizeWebhook('pull_request', payload);
    expect(JSON.stringify(first)).toBe(JSON.stringify(second));
  });
});
