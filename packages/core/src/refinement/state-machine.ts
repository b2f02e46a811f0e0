import type { Candidate, CandidateStatus } from '@ideaweaver/shared/src/types/ideation.types.js';
import { InvalidTransitionError } from '@ideaweaver/shared/src/utils/errors.js';

export type CandidateEvent = 'evaluated' | 'accept' | 'refine' | 'reject' | 'fail';

const TRANSITIONS: Readonly<Record<CandidateStatus, Partial<Record<CandidateEvent, CandidateStatus>>>> = {
  Proposed: { evaluated: 'Evaluated', fail: 'Errored' },
  Evaluated: { accept: 'Accepted', refine: 'Refining', reject: 'Rejected', fail: 'Errored' },
  Refining: { evaluated: 'Evaluated', fail: 'Errored' },
  Accepted: {},
  Rejected: {},
  Errored: {},
};

export const TERMINAL_STATUSES: ReadonlySet<CandidateStatus> = new Set<CandidateStatus>([
  'Accepted',
  'Rejected',
  'Errored',
]);

export function isTerminal(status: CandidateStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export function nextStatus(status: CandidateStatus, event: CandidateEvent): CandidateStatus {
  const next = TRANSITIONS[status][event];
  if (!next) {
    throw new InvalidTransitionError(`No transition from ${status} on "${event}"`);
  }
  return next;
}

/** Applies an event, recording the new status in the audit trail. */
export function transition(
  candidate: Candidate,
  event: CandidateEvent,
  changes: Partial<Omit<Candidate, 'status' | 'statusTrail'>> = {},
): Candidate {
  const status = nextStatus(candidate.status, event);
  return { ...candidate, ...changes, status, statusTrail: [...candidate.statusTrail, status] };
}

export interface AcceptancePolicy {
  readonly noveltyThreshold: number;
  readonly feasibilityThreshold: number;
  readonly maxRounds: number;
}

/** Decision for an Evaluated candidate. */
export function decide(
  candidate: Candidate,
  policy: AcceptancePolicy,
): Extract<CandidateEvent, 'accept' | 'refine' | 'reject'> {
  const novelty = candidate.noveltyScore ?? 0;
  const feasibility = candidate.feasibilityScore ?? 0;
  if (novelty >= policy.noveltyThreshold && feasibility >= policy.feasibilityThreshold) {
    return 'accept';
  }
  return candidate.round < policy.maxRounds ? 'refine' : 'reject';
}
