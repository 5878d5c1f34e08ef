/**
 * Matchflow — Status Lifecycle
 *
 *   new ──> in_progress ──> completed
 *    │           │
 *    ├───────────┴────────> rejected
 *    └───────────┴────────> expired
 *
 * completed, rejected and expired are terminal.
 */

import type { TrackedStatus } from '../types';
import { InvalidTransitionError } from '../lib/errors';

export const ALLOWED_TRANSITIONS: Readonly<Record<TrackedStatus, readonly TrackedStatus[]>> = {
  new: ['in_progress', 'rejected', 'expired'],
  in_progress: ['completed', 'rejected', 'expired'],
  completed: [],
  rejected: [],
  expired: [],
};

export const TERMINAL_STATUSES: readonly TrackedStatus[] = ['completed', 'rejected', 'expired'];

export function isTerminal(status: TrackedStatus): boolean {
  return ALLOWED_TRANSITIONS[status].length === 0;
}

export function canTransition(from: TrackedStatus, to: TrackedStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function assertTransition(
  fingerprint: string,
  from: TrackedStatus,
  to: TrackedStatus
): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(fingerprint, from, to);
  }
}
