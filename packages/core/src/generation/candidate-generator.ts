import type {
  Candidate,
  GenerationStrategy,
  IdeaDraft,
  Opportunity,
} from '@ideaweaver/shared/src/types/ideation.types.js';
import type { LlmClient } from '../llm/llm-client.js';
import type { BatchExecutor } from '../execution/batch-executor.js';
import type { OpportunityGraph } from '../graph/opportunity-graph.js';
import type { PassageStore, ScoredPassage } from '../rag/passage-store.js';
import { createChildLogger } from '@ideaweaver/shared/src/logger.js';
import { DeadlineExceededError, toError } from '@ideaweaver/shared/src/utils/errors.js';
import { invokeAndValidate } from '../llm/invoke-and-validate.js';
import { IdeaDraftResultSchema } from '../llm/oracle-output.schemas.js';
import { STRATEGIES_BY_KIND, STRATEGY_HANDLERS } from './strategies.js';

const log = createChildLogger('generation:candidate-generator');

export interface GenerationFailure {
  readonly opportunityId: string;
  readonly strategy: GenerationStrategy;
  readonly message: string;
}

export interface GenerationResult {
  /** Proposed candidates in work-unit order. */
  readonly candidates: readonly Candidate[];
  readonly failures: readonly GenerationFailure[];
}

export interface CandidateGenerator {
  generate(opportunities: readonly Opportunity[]): Promise<GenerationResult>;
}

export interface CandidateGeneratorDeps {
  readonly llmClient: LlmClient;
  readonly executor: BatchExecutor;
  readonly graph: OpportunityGraph;
  readonly passageStore?: PassageStore;
  readonly maxInitialIdeas: number;
  readonly concurrency: number;
  readonly retrievalTopK: number;
}

interface WorkUnit {
  readonly index: number;
  readonly opportunity: Opportunity;
  readonly strategy: GenerationStrategy;
}

export function formatCandidateId(sequence: number): string {
  return `idea-${String(sequence).padStart(3, '0')}`;
}

export function proposeCandidate(id: string, unit: Omit<WorkUnit, 'index'>, draft: IdeaDraft): Candidate {
  return {
    id,
    opportunityId: unit.opportunity.id,
    strategy: unit.strategy,
    title: draft.title,
    hypothesis: draft.hypothesis,
    innovationPoints: draft.innovationPoints,
    experimentSketch: draft.experimentSketch,
    noveltyScore: null,
    feasibilityScore: null,
    status: 'Proposed',
    round: 0,
    history: [],
    statusTrail: ['Proposed'],
  };
}

/**
 * Issues one generation request per (opportunity, strategy) unit, highest
 * priority first. A unit is claimed only while produced plus in-flight
 * candidates stay below the budget, so a failed unit hands its share of the
 * budget to the next one.
 */
export function createCandidateGenerator(deps: CandidateGeneratorDeps): CandidateGenerator {
  const { llmClient, executor, graph, passageStore, maxInitialIdeas, concurrency, retrievalTopK } = deps;

  async function retrieve(unit: WorkUnit, anchorText: string): Promise<readonly ScoredPassage[]> {
    if (!passageStore || retrievalTopK <= 0) {
      return [];
    }
    try {
      return await passageStore.query(anchorText, retrievalTopK);
    } catch (error) {
      log.warn(
        { opportunityId: unit.opportunity.id, error: toError(error).message },
        'Passage retrieval failed, generating without evidence',
      );
      return [];
    }
  }

  async function generateDraft(unit: WorkUnit): Promise<IdeaDraft> {
    const anchors = unit.opportunity.anchorNodes.flatMap((id) => {
      const node = graph.node(id);
      return node ? [node] : [];
    });
    const passages = await retrieve(unit, anchors.map((node) => node.label).join(', '));
    const request = STRATEGY_HANDLERS[unit.strategy].buildRequest({
      opportunity: unit.opportunity,
      anchors,
      passages,
    });

    return executor.call(
      () =>
        invokeAndValidate({
          llmClient,
          request,
          schema: IdeaDraftResultSchema,
          caller: 'CandidateGenerator',
        }),
      { label: `${unit.opportunity.id}/${unit.strategy}` },
    );
  }

  return {
    async generate(opportunities: readonly Opportunity[]): Promise<GenerationResult> {
      const units: WorkUnit[] = opportunities
        .flatMap((opportunity) =>
          STRATEGIES_BY_KIND[opportunity.kind].map((strategy) => ({ opportunity, strategy })),
        )
        .map((unit, index) => ({ ...unit, index }));

      log.info(
        { opportunities: opportunities.length, units: units.length, budget: maxInitialIdeas },
        'Generating candidates',
      );

      const drafts = new Map<number, IdeaDraft>();
      const failures: GenerationFailure[] = [];
      let next = 0;
      let produced = 0;
      let inFlight = 0;
      let stopped = false;

      const worker = async (): Promise<void> => {
        while (!stopped && next < units.length && produced + inFlight < maxInitialIdeas) {
          const unit = units[next++];
          inFlight++;
          try {
            drafts.set(unit.index, await generateDraft(unit));
            produced++;
          } catch (error) {
            if (error instanceof DeadlineExceededError) {
              stopped = true;
              log.warn({ opportunityId: unit.opportunity.id }, 'Deadline reached, no further generation');
              continue;
            }
            const message = toError(error).message;
            failures.push({ opportunityId: unit.opportunity.id, strategy: unit.strategy, message });
            log.warn(
              { opportunityId: unit.opportunity.id, strategy: unit.strategy, error: message },
              'Generation failed for unit',
            );
          } finally {
            inFlight--;
          }
        }
      };

      const workers = Math.max(1, Math.min(concurrency, units.length));
      await Promise.all(Array.from({ length: workers }, () => worker()));

      const candidates: Candidate[] = [];
      for (const unit of units) {
        const draft = drafts.get(unit.index);
        if (draft) {
          candidates.push(proposeCandidate(formatCandidateId(candidates.length + 1), unit, draft));
        }
      }

      log.info(
        { proposed: candidates.length, failed: failures.length },
        'Candidate generation complete',
      );

      return { candidates, failures };
    },
  };
}
