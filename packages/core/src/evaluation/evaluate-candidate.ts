import type { Candidate, CandidateEvaluations } from '@ideaweaver/shared/src/types/ideation.types.js';
import type { EvaluationContext, Evaluator } from './evaluator.js';
import { settleAll } from '../execution/task-group.js';

export interface EvaluatorPair {
  readonly novelty: Evaluator;
  readonly feasibility: Evaluator;
}

/**
 * Runs both evaluators concurrently and joins once both have settled.
 * Fails with the first error when either evaluator failed.
 */
export async function evaluateCandidate(
  candidate: Candidate,
  context: EvaluationContext,
  evaluators: EvaluatorPair,
): Promise<CandidateEvaluations> {
  const [novelty, feasibility] = await settleAll([
    () => evaluators.novelty.evaluate(candidate, context),
    () => evaluators.feasibility.evaluate(candidate, context),
  ]);

  if (novelty.status === 'failed') {
    throw novelty.error;
  }
  if (feasibility.status === 'failed') {
    throw feasibility.error;
  }
  return { novelty: novelty.value, feasibility: feasibility.value };
}
