import type { Candidate, EvaluationReport } from '@ideaweaver/shared/src/types/ideation.types.js';
import type { EvaluationContext, Evaluator, EvaluatorDeps } from './evaluator.js';
import { createChildLogger } from '@ideaweaver/shared/src/logger.js';
import { invokeAndValidate } from '../llm/invoke-and-validate.js';
import { taskMarker } from '../llm/task-marker.js';
import {
  FeasibilityReviewResultJsonSchema,
  FeasibilityReviewResultSchema,
} from '../llm/oracle-output.schemas.js';
import { describeCandidate } from './evaluator.js';
import { CONSISTENT_SCORE, CONTRADICTED_SCORE } from './graph-consistency.js';
import { aggregateScores } from './reducers.js';

const log = createChildLogger('evaluation:feasibility');

const ORACLE_DIMENSIONS = ['relevance', 'resource-requirement', 'risk'] as const;

const SYSTEM_PROMPT = `${taskMarker('feasibility-review')}
You are a reviewer judging whether a research idea can realistically be carried out.

Score each dimension from 0 (not feasible) to 10 (clearly feasible):
- relevance: does the idea address the stated opportunity?
- resource-requirement: can it be done with data and compute a typical lab has?
- risk: how likely is the experiment to produce a usable result? Higher means lower risk.

Give a one-sentence rationale per dimension and an overall rationale.

Respond with a JSON object: {"scores": {"<dimension>": {"score", "rationale"}}, "rationale"}`;

export function createFeasibilityEvaluator(deps: EvaluatorDeps): Evaluator {
  const { llmClient, executor, reducer } = deps;

  return {
    kind: 'feasibility',

    async evaluate(candidate: Candidate, context: EvaluationContext): Promise<EvaluationReport> {
      const result = await executor.call(
        () =>
          invokeAndValidate({
            llmClient,
            request: {
              systemPrompt: SYSTEM_PROMPT,
              userMessage: describeCandidate(candidate, context),
              jsonSchema: FeasibilityReviewResultJsonSchema,
            },
            schema: FeasibilityReviewResultSchema,
            caller: 'FeasibilityEvaluator',
          }),
        { label: `${candidate.id}/feasibility/r${String(candidate.round)}` },
      );

      const dimensionScores: Record<string, number> = {};
      const dimensionRationales: Record<string, string> = {};
      for (const dimension of ORACLE_DIMENSIONS) {
        dimensionScores[dimension] = result.scores[dimension].score;
        dimensionRationales[dimension] = result.scores[dimension].rationale;
      }
      dimensionScores['graph-consistency'] = context.graphConsistent ? CONSISTENT_SCORE : CONTRADICTED_SCORE;
      dimensionRationales['graph-consistency'] = context.graphConsistent
        ? 'No contradicts edge joins the anchor entities.'
        : 'The literature graph records a contradiction between anchor entities.';

      const aggregate = aggregateScores(reducer, Object.values(dimensionScores));
      log.debug(
        { candidateId: candidate.id, round: candidate.round, aggregate, graphConsistent: context.graphConsistent },
        'Feasibility scored',
      );

      return {
        candidateId: candidate.id,
        evaluator: 'feasibility',
        round: candidate.round,
        dimensionScores,
        dimensionRationales,
        aggregate,
        rationale: result.rationale,
        graphConsistency: context.graphConsistent,
      };
    },
  };
}
