import type { Candidate, EvaluationReport } from '@ideaweaver/shared/src/types/ideation.types.js';
import { NOVELTY_DIMENSIONS } from '@ideaweaver/shared/src/types/ideation.types.js';
import type { EvaluationContext, Evaluator, EvaluatorDeps } from './evaluator.js';
import { createChildLogger } from '@ideaweaver/shared/src/logger.js';
import { invokeAndValidate } from '../llm/invoke-and-validate.js';
import { taskMarker } from '../llm/task-marker.js';
import {
  NoveltyReviewResultJsonSchema,
  NoveltyReviewResultSchema,
} from '../llm/oracle-output.schemas.js';
import { describeCandidate } from './evaluator.js';
import { aggregateScores } from './reducers.js';

const log = createChildLogger('evaluation:novelty');

const SYSTEM_PROMPT = `${taskMarker('novelty-review')}
You are a reviewer judging how novel a research idea is relative to the surveyed literature.

Score each dimension from 0 (already well established) to 10 (clearly new):
- concept: is the core idea or framing new?
- method: is the proposed technique or combination of techniques new?
- application: is the target problem or setting new for this kind of approach?
- evaluation: does the experiment measure something the field has not measured?

Give a one-sentence rationale per dimension and an overall rationale.

Respond with a JSON object: {"scores": {"<dimension>": {"score", "rationale"}}, "rationale"}`;

export function createNoveltyEvaluator(deps: EvaluatorDeps): Evaluator {
  const { llmClient, executor, reducer } = deps;

  return {
    kind: 'novelty',

    async evaluate(candidate: Candidate, context: EvaluationContext): Promise<EvaluationReport> {
      const result = await executor.call(
        () =>
          invokeAndValidate({
            llmClient,
            request: {
              systemPrompt: SYSTEM_PROMPT,
              userMessage: describeCandidate(candidate, context),
              jsonSchema: NoveltyReviewResultJsonSchema,
            },
            schema: NoveltyReviewResultSchema,
            caller: 'NoveltyEvaluator',
          }),
        { label: `${candidate.id}/novelty/r${String(candidate.round)}` },
      );

      const dimensionScores: Record<string, number> = {};
      const dimensionRationales: Record<string, string> = {};
      for (const dimension of NOVELTY_DIMENSIONS) {
        dimensionScores[dimension] = result.scores[dimension].score;
        dimensionRationales[dimension] = result.scores[dimension].rationale;
      }

      const aggregate = aggregateScores(reducer, Object.values(dimensionScores));
      log.debug({ candidateId: candidate.id, round: candidate.round, aggregate }, 'Novelty scored');

      return {
        candidateId: candidate.id,
        evaluator: 'novelty',
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
