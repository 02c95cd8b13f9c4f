/**
 * Record Lifecycle Rules
 *
 * Transition guards for inspection records. The repository applies close and
 * reopen unconditionally; callers that face users (the HTTP shell) check these
 * guards first.
 *
 *   Open ──close──▶ Closed ──reopen──▶ In Action ──close──▶ Closed ...
 */

import {
  CLOSED_STATUS,
  REOPENED_STATUS,
  type EvidencePhase,
  type RecordStatus,
} from './schema';

export type RecordTransition = 'close' | 'reopen';

/** Evidence attached during a transition is tagged with this phase. */
export const TRANSITION_PHASE: Record<RecordTransition, EvidencePhase> = {
  close: 'closing',
  reopen: 'reopening',
};

/** Status written by each transition. */
export const TRANSITION_TARGET: Record<RecordTransition, RecordStatus> = {
  close: CLOSED_STATUS,
  reopen: REOPENED_STATUS,
};

/** Any state other than Closed may be closed. */
export function canClose(status: RecordStatus): boolean {
  return status !== CLOSED_STATUS;
}

/** Only a Closed record may be reopened. */
export function canReopen(status: RecordStatus): boolean {
  return status === CLOSED_STATUS;
}

export function canTransition(status: RecordStatus, transition: RecordTransition): boolean {
  return transition === 'close' ? canClose(status) : canReopen(status);
}
