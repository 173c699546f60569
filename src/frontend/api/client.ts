/* ------------------------------------------------------------------ */
/*  API client — thin fetch wrapper for the webhook feed endpoints      */
/*                                                                     */
/*  All fetch calls are centralized here. The poller never calls fetch */
/*  directly.                                                          */
/* ------------------------------------------------------------------ */

import type { FeedEvent, HealthResponse } from './types.js';

const BASE = '/webhook';

async function get<T>(path: string): Promise<T> {
  const res = await fetch(`${BASE}${path}`);
  if (!res.ok) {
    throw new Error(`API ${res.status}: ${res.statusText}`);
  }
  return res.json() as Promise<T>;
}

/* ── Events ────────────────────────────────────────────────────── */

/** Events strictly newer than `since`, oldest first. All events when omitted. */
export async function fetchEvents(since?: string): Promise<FeedEvent[]> {
  const path = since ? `/events?since=${encodeURIComponent(since)}` : '/events';
  const body = await get<unknown>(path);
  return Array.isArray(body) ? body : [];
}

/* ── Health ─────────────────────────────────────────────────────── */

export function fetchHealth(): Promise<HealthResponse> {
  return get<HealthResponse>('/health');
}
