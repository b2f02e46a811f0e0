import type { AggregationReducer } from '@ideaweaver/schemas/src/ideation.schema.js';
import type {
  Candidate,
  EvaluationReport,
  EvaluatorKind,
  GraphNode,
  Opportunity,
} from '@ideaweaver/shared/src/types/ideation.types.js';
import type { LlmClient } from '../llm/llm-client.js';
import type { BatchExecutor } from '../execution/batch-executor.js';

export interface EvaluationContext {
  readonly opportunity: Opportunity;
  readonly anchors: readonly GraphNode[];
  /** Structural check: no `contradicts` edge joins two anchors. */
  readonly graphConsistent: boolean;
}

export interface Evaluator {
  readonly kind: EvaluatorKind;
  evaluate(candidate: Candidate, context: EvaluationContext): Promise<EvaluationReport>;
}

export interface EvaluatorDeps {
  readonly llmClient: LlmClient;
  readonly executor: BatchExecutor;
  readonly reducer: AggregationReducer;
}

export function describeCandidate(candidate: Candidate, context: EvaluationContext): string {
  return `## Idea
Title: ${candidate.title}
Hypothesis: ${candidate.hypothesis}
Innovation points:
${candidate.innovationPoints.map((p) => `- ${p}`).join('\n')}
Experiment sketch: ${candidate.experimentSketch}

## Opportunity it answers (${context.opportunity.kind})
${context.opportunity.rationale}
Anchor entities: ${context.anchors.map((n) => `${n.label} (${n.kind})`).join(', ')}`;
}
