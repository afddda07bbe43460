import { isAtLeast } from '../domain/index.js';
import type { MatchEvent } from '../domain/index.js';

/** Outcome of one analyzer run, lowest first. */
export const EXECUTION_STATUSES = [
  'UNSET',
  'NOT_RAN',
  'OK',
  'WARNING',
  'ERROR',
  'EXECUTION_FAILURE',
] as const;

export type ExecutionStatus = (typeof EXECUTION_STATUSES)[number];

export interface TaskResult {
  readonly task: string;
  readonly status: ExecutionStatus;
  readonly message: string;
  readonly events: readonly MatchEvent[];
}

/**
 * Overall status for a set of events.
 * Any event at ERROR or above fails; otherwise any WARNING warns; otherwise OK.
 */
export function deriveStatus(events: readonly MatchEvent[]): ExecutionStatus {
  if (events.some((e) => isAtLeast(e.severity, 'ERROR'))) return 'ERROR';
  if (events.some((e) => e.severity === 'WARNING')) return 'WARNING';
  return 'OK';
}
