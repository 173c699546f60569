import { EVENT_ACTIONS, type EventAction } from './event.js';

/**
 * Persistence gate: true iff `action` is one of the recorded actions.
 *
 * The classifier only emits supported actions, so this never fails in
 * normal operation. The ingest path still checks it before every insert.
 */
export function isSupportedAction(action: unknown): action is EventAction {
  return EVENT_ACTIONS.some((supported) => supported === action);
}
