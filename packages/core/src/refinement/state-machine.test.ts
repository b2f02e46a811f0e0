import { describe, it, expect } from 'vitest';
import type { Candidate } from '@ideaweaver/shared/src/types/ideation.types.js';
import { InvalidTransitionError } from '@ideaweaver/shared/src/utils/errors.js';
import { decide, isTerminal, nextStatus, transition } from './state-machine.js';

const policy = { noveltyThreshold: 8, feasibilityThreshold: 7, maxRounds: 2 };

function evaluated(noveltyScore: number, feasibilityScore: number, round = 0): Candidate {
  return {
    id: 'idea-001',
    opportunityId: 'gap:A',
    strategy: 'cross-domain',
    title: 't',
    hypothesis: 'h',
    innovationPoints: [],
    experimentSketch: 'e',
    noveltyScore,
    feasibilityScore,
    status: 'Evaluated',
    round,
    history: [],
    statusTrail: ['Proposed', 'Evaluated'],
  };
}

describe('nextStatus', () => {
  it('should follow the refinement lifecycle', () => {
    expect(nextStatus('Proposed', 'evaluated')).toBe('Evaluated');
    expect(nextStatus('Evaluated', 'refine')).toBe('Refining');
    expect(nextStatus('Refining', 'evaluated')).toBe('Evaluated');
    expect(nextStatus('Evaluated', 'accept')).toBe('Accepted');
    expect(nextStatus('Refining', 'fail')).toBe('Errored');
  });

  it('should reject transitions out of terminal states', () => {
    expect(() => nextStatus('Accepted', 'refine')).toThrow(InvalidTransitionError);
    expect(() => nextStatus('Errored', 'evaluated')).toThrow('No transition from Errored on "evaluated"');
  });

  it('should reject skipping evaluation', () => {
    expect(() => nextStatus('Proposed', 'accept')).toThrow(InvalidTransitionError);
  });
});

describe('transition', () => {
  it('should append the new status to the trail', () => {
    const next = transition(evaluated(9, 8), 'accept');

    expect(next.status).toBe('Accepted');
    expect(next.statusTrail).toEqual(['Proposed', 'Evaluated', 'Accepted']);
    expect(isTerminal(next.status)).toBe(true);
  });
});

describe('decide', () => {
  it('should accept only when both scores meet their thresholds', () => {
    expect(decide(evaluated(8, 7), policy)).toBe('accept');
    expect(decide(evaluated(9, 6.99), policy)).toBe('refine');
  });

  it('should refine while rounds remain and reject afterwards', () => {
    expect(decide(evaluated(6, 6, 1), policy)).toBe('refine');
    expect(decide(evaluated(6, 6, 2), policy)).toBe('reject');
  });
});
