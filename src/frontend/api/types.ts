/* ------------------------------------------------------------------ */
/*  API response types mirroring the webhook service contracts        */
/* ------------------------------------------------------------------ */

/** Single event from GET /webhook/events */
export interface FeedEvent {
  request_id: string;
  author: string;
  action: string;
  from_branch: string;
  to_branch: string;
  timestamp: string;
}

/** Health check response from GET /webhook/health */
export interface HealthResponse {
  status: 'ok' | 'degraded';
  store: string;
}
