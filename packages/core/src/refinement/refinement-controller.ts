import type {
  Candidate,
  CandidateEvaluations,
  EvaluationReport,
  IdeaDraft,
  Opportunity,
  RevisionSnapshot,
} from '@ideaweaver/shared/src/types/ideation.types.js';
import type { LlmClient } from '../llm/llm-client.js';
import type { BatchExecutor } from '../execution/batch-executor.js';
import type { OpportunityGraph } from '../graph/opportunity-graph.js';
import type { EvaluationContext } from '../evaluation/evaluator.js';
import type { EvaluatorPair } from '../evaluation/evaluate-candidate.js';
import { createChildLogger } from '@ideaweaver/shared/src/logger.js';
import {
  DeadlineExceededError,
  IdeationError,
  InvalidTransitionError,
  OracleError,
  toError,
} from '@ideaweaver/shared/src/utils/errors.js';
import { RunDeadline } from '../execution/run-deadline.js';
import { compareIds } from '../graph/labels.js';
import { evaluateCandidate } from '../evaluation/evaluate-candidate.js';
import { isGraphConsistent } from '../evaluation/graph-consistency.js';
import { invokeAndValidate } from '../llm/invoke-and-validate.js';
import { IdeaDraftResultJsonSchema, IdeaDraftResultSchema } from '../llm/oracle-output.schemas.js';
import { taskMarker } from '../llm/task-marker.js';
import { decide, isTerminal, transition, type AcceptancePolicy } from './state-machine.js';

const log = createChildLogger('refinement:controller');

const REVISION_PROMPT = `${taskMarker('idea-revision')}
You are revising a research idea after peer review.
Address every point of the critique while keeping the idea grounded in the same opportunity.
Keep what the reviewers did not criticise.

Respond with a JSON object containing:
- title
- hypothesis
- innovationPoints: array of strings
- experimentSketch`;

export interface RefinementOutcome {
  /** Terminal candidates, in input order. */
  readonly candidates: readonly Candidate[];
  /** Every evaluation report produced, ordered by candidate, round and evaluator. */
  readonly evaluationArchive: readonly EvaluationReport[];
}

export interface RefinementController {
  refine(
    candidates: readonly Candidate[],
    opportunities: ReadonlyMap<string, Opportunity>,
  ): Promise<RefinementOutcome>;
}

export interface RefinementControllerDeps {
  readonly llmClient: LlmClient;
  /** Executor for revision requests; they count against generation concurrency. */
  readonly generationExecutor: BatchExecutor;
  readonly evaluators: EvaluatorPair;
  readonly graph: OpportunityGraph;
  readonly policy: AcceptancePolicy;
  readonly deadline?: RunDeadline;
}

function snapshotOf(candidate: Candidate, evaluations: CandidateEvaluations): RevisionSnapshot {
  return {
    title: candidate.title,
    hypothesis: candidate.hypothesis,
    innovationPoints: candidate.innovationPoints,
    experimentSketch: candidate.experimentSketch,
    round: candidate.round,
    noveltyScore: evaluations.novelty.aggregate,
    feasibilityScore: evaluations.feasibility.aggregate,
    evaluations,
  };
}

/** Lists the failing dimensions of every evaluator that missed its threshold. */
export function buildCritique(evaluations: CandidateEvaluations, policy: AcceptancePolicy): string {
  const sections: string[] = [];
  const checks = [
    [evaluations.novelty, policy.noveltyThreshold],
    [evaluations.feasibility, policy.feasibilityThreshold],
  ] as const;

  for (const [report, threshold] of checks) {
    if (report.aggregate >= threshold) continue;

    const failing = Object.entries(report.dimensionScores)
      .filter(([, score]) => score < threshold)
      .map(
        ([dimension, score]) =>
          `- ${dimension} (${score.toFixed(1)}): ${report.dimensionRationales[dimension] ?? ''}`,
      );
    sections.push(
      `${report.evaluator} scored ${report.aggregate.toFixed(2)}, below ${threshold.toFixed(1)}.\n${failing.join('\n')}\nOverall: ${report.rationale}`,
    );
  }

  return sections.join('\n\n');
}

function compareReports(a: EvaluationReport, b: EvaluationReport): number {
  return compareIds(a.candidateId, b.candidateId) || a.round - b.round || compareIds(a.evaluator, b.evaluator);
}

/**
 * Drives every candidate through evaluate → decide → revise until it is
 * terminal. Each candidate has at most one step in flight; candidates that are
 * not yet terminal are re-enqueued after each step.
 */
export function createRefinementController(deps: RefinementControllerDeps): RefinementController {
  const { llmClient, generationExecutor, evaluators, graph, policy } = deps;
  const deadline = deps.deadline ?? RunDeadline.none();

  function contextFor(candidate: Candidate, opportunities: ReadonlyMap<string, Opportunity>): EvaluationContext {
    const opportunity = opportunities.get(candidate.opportunityId);
    if (!opportunity) {
      throw new IdeationError(
        `Unknown opportunity ${candidate.opportunityId} for ${candidate.id}`,
        'UNKNOWN_OPPORTUNITY',
      );
    }
    return {
      opportunity,
      anchors: opportunity.anchorNodes.flatMap((id) => {
        const node = graph.node(id);
        return node ? [node] : [];
      }),
      graphConsistent: isGraphConsistent(graph, opportunity.anchorNodes),
    };
  }

  async function revise(
    candidate: Candidate,
    evaluations: CandidateEvaluations,
    context: EvaluationContext,
  ): Promise<IdeaDraft> {
    const draft: IdeaDraft = {
      title: candidate.title,
      hypothesis: candidate.hypothesis,
      innovationPoints: candidate.innovationPoints,
      experimentSketch: candidate.experimentSketch,
    };

    return generationExecutor.call(
      () =>
        invokeAndValidate({
          llmClient,
          request: {
            systemPrompt: REVISION_PROMPT,
            userMessage: `## Current idea\n${JSON.stringify(draft, null, 2)}\n\n## Opportunity\n${context.opportunity.rationale}\n\n## Critique\n${buildCritique(evaluations, policy)}`,
            jsonSchema: IdeaDraftResultJsonSchema,
          },
          schema: IdeaDraftResultSchema,
          caller: 'RefinementController',
        }),
      { label: `${candidate.id}/revision/r${String(candidate.round + 1)}` },
    );
  }

  async function step(
    candidate: Candidate,
    opportunities: ReadonlyMap<string, Opportunity>,
    archive: EvaluationReport[],
  ): Promise<Candidate> {
    const context = contextFor(candidate, opportunities);

    if (candidate.status === 'Proposed' || candidate.status === 'Refining') {
      deadline.throwIfExpired();
      const evaluations = await evaluateCandidate(candidate, context, evaluators);
      archive.push(evaluations.novelty, evaluations.feasibility);
      return transition(candidate, 'evaluated', {
        evaluations,
        noveltyScore: evaluations.novelty.aggregate,
        feasibilityScore: evaluations.feasibility.aggregate,
      });
    }

    const decision = decide(candidate, policy);
    if (decision !== 'refine') {
      return transition(candidate, decision);
    }

    const evaluations = candidate.evaluations;
    if (!evaluations) {
      throw new InvalidTransitionError(`Candidate ${candidate.id} reached a decision without evaluations`);
    }
    deadline.throwIfExpired();
    const revised = await revise(candidate, evaluations, context);
    return transition(candidate, 'refine', {
      ...revised,
      round: candidate.round + 1,
      history: [...candidate.history, snapshotOf(candidate, evaluations)],
      noveltyScore: null,
      feasibilityScore: null,
      evaluations: undefined,
    });
  }

  async function runStep(
    candidate: Candidate,
    opportunities: ReadonlyMap<string, Opportunity>,
    archive: EvaluationReport[],
  ): Promise<Candidate> {
    try {
      const next = await step(candidate, opportunities, archive);
      log.debug(
        { candidateId: next.id, from: candidate.status, to: next.status, round: next.round },
        'Candidate transition',
      );
      return next;
    } catch (error) {
      if (!(error instanceof OracleError) && !(error instanceof DeadlineExceededError)) {
        throw error;
      }
      log.warn(
        { candidateId: candidate.id, status: candidate.status, code: error.code, cause: error.message },
        'Candidate errored',
      );
      return transition(candidate, 'fail', { error: { code: error.code, message: error.message } });
    }
  }

  return {
    async refine(
      candidates: readonly Candidate[],
      opportunities: ReadonlyMap<string, Opportunity>,
    ): Promise<RefinementOutcome> {
      log.info({ candidates: candidates.length, maxRounds: policy.maxRounds }, 'Refining candidates');

      const current = new Map(candidates.map((c) => [c.id, c]));
      const archive: EvaluationReport[] = [];
      const ready = candidates.filter((c) => !isTerminal(c.status)).map((c) => c.id);
      const inFlight = new Map<string, Promise<void>>();
      let fatal: Error | undefined;

      const schedule = (id: string): void => {
        const candidate = current.get(id);
        if (!candidate) return;
        const pending = runStep(candidate, opportunities, archive).then(
          (next) => {
            current.set(id, next);
            inFlight.delete(id);
            if (!isTerminal(next.status)) {
              ready.push(id);
            }
          },
          (error: unknown) => {
            inFlight.delete(id);
            fatal ??= toError(error);
          },
        );
        inFlight.set(id, pending);
      };

      while (ready.length > 0 || inFlight.size > 0) {
        while (ready.length > 0 && fatal === undefined) {
          const id = ready.shift();
          if (id !== undefined && !inFlight.has(id)) {
            schedule(id);
          }
        }
        if (inFlight.size === 0) break;
        await Promise.race(inFlight.values());
      }

      if (fatal) {
        throw fatal;
      }

      const refined = candidates.map((c) => current.get(c.id) ?? c);
      log.info(
        {
          accepted: refined.filter((c) => c.status === 'Accepted').length,
          rejected: refined.filter((c) => c.status === 'Rejected').length,
          errored: refined.filter((c) => c.status === 'Errored').length,
        },
        'Refinement complete',
      );

      return { candidates: refined, evaluationArchive: [...archive].sort(compareReports) };
    },
  };
}
