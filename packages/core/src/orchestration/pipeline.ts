import { StateGraph, START, END } from '@langchain/langgraph';
import type { IdeationConfig } from '@ideaweaver/schemas/src/ideation.schema.js';
import type { IngestedDocument } from '@ideaweaver/shared/src/types/ingestion.types.js';
import type {
  Candidate,
  ErroredCandidate,
  IdeationResult,
  Opportunity,
} from '@ideaweaver/shared/src/types/ideation.types.js';
import type { LlmClient } from '../llm/llm-client.js';
import type { GraphBuilder } from '../graph/graph-builder.js';
import type { OpportunityGraph } from '../graph/opportunity-graph.js';
import type { PassageStore } from '../rag/passage-store.js';
import { createChildLogger } from '@ideaweaver/shared/src/logger.js';
import { IdeationError } from '@ideaweaver/shared/src/utils/errors.js';
import { BatchExecutor } from '../execution/batch-executor.js';
import { RunDeadline } from '../execution/run-deadline.js';
import { compareIds } from '../graph/labels.js';
import { createOpportunityDetector, partitionByConsistency } from '../opportunities/detector.js';
import { createCandidateGenerator } from '../generation/candidate-generator.js';
import { createNoveltyEvaluator } from '../evaluation/novelty-evaluator.js';
import { createFeasibilityEvaluator } from '../evaluation/feasibility-evaluator.js';
import { createRefinementController } from '../refinement/refinement-controller.js';
import {
  IdeationGraphAnnotation,
  type IdeationGraphState,
  type IdeationGraphUpdate,
} from './pipeline-state.js';

const log = createChildLogger('orchestration:pipeline');

export interface IdeationPipelineDeps {
  readonly config: IdeationConfig;
  readonly llmClient: LlmClient;
  readonly graphBuilder: GraphBuilder;
  readonly passageStore?: PassageStore;
  /** Clock for the run deadline and the reported duration. */
  readonly now?: () => number;
}

export interface IdeationPipeline {
  run(documents: readonly IngestedDocument[]): Promise<IdeationResult>;
}

interface RunContext {
  readonly deadline: RunDeadline;
  readonly generationExecutor: BatchExecutor;
  readonly evaluationExecutor: BatchExecutor;
}

function requireGraph(state: IdeationGraphState): OpportunityGraph {
  if (!state.graph) {
    throw new IdeationError('Opportunity graph has not been built', 'PIPELINE_STATE');
  }
  return state.graph;
}

/** Orders candidates by the priority rank of their opportunity, then by id. */
export function orderCandidates(
  candidates: readonly Candidate[],
  opportunities: readonly Opportunity[],
): Candidate[] {
  const rank = new Map(opportunities.map((o, i) => [o.id, i]));
  const rankOf = (c: Candidate): number => rank.get(c.opportunityId) ?? opportunities.length;
  return [...candidates].sort((a, b) => rankOf(a) - rankOf(b) || compareIds(a.id, b.id));
}

export function createIdeationPipeline(deps: IdeationPipelineDeps): IdeationPipeline {
  const { config, llmClient, graphBuilder, passageStore } = deps;
  const now = deps.now ?? Date.now;
  const detector = createOpportunityDetector(config.detector);

  log.info(
    {
      generationConcurrency: config.generationConcurrency,
      evaluationConcurrency: config.evaluationConcurrency,
      maxRounds: config.maxRounds,
      runDeadlineMs: config.runDeadlineMs,
    },
    'Initializing ideation pipeline',
  );

  function createRunContext(): RunContext {
    const deadline = new RunDeadline(config.runDeadlineMs, now);
    const executor = (name: string, concurrency: number): BatchExecutor =>
      new BatchExecutor({
        name,
        concurrency,
        retry: config.retry,
        callTimeoutMs: config.callTimeoutMs,
        deadline,
      });
    return {
      deadline,
      generationExecutor: executor('generation', config.generationConcurrency),
      evaluationExecutor: executor('evaluation', config.evaluationConcurrency),
    };
  }

  function compileWorkflow(context: RunContext) {
    const buildGraph = async (state: IdeationGraphState): Promise<IdeationGraphUpdate> => {
      const { graph, processedDocuments, skippedDocuments } = await graphBuilder.build(state.documents);
      return { graph, processedDocuments, skippedDocuments };
    };

    const detectOpportunities = (state: IdeationGraphState): Promise<IdeationGraphUpdate> => {
      context.deadline.throwIfExpired();
      const graph = requireGraph(state);
      const { consistent, dropped } = partitionByConsistency(detector.detect(graph), graph);
      return Promise.resolve({
        opportunities: consistent,
        droppedOpportunities: dropped.map((error) => error.message),
      });
    };

    const generateCandidates = async (state: IdeationGraphState): Promise<IdeationGraphUpdate> => {
      context.deadline.throwIfExpired();
      const generator = createCandidateGenerator({
        llmClient,
        executor: context.generationExecutor,
        graph: requireGraph(state),
        passageStore,
        maxInitialIdeas: config.maxInitialIdeas,
        concurrency: config.generationConcurrency,
        retrievalTopK: config.retrievalTopK,
      });
      const { candidates, failures } = await generator.generate(state.opportunities);
      return { candidates, generationFailures: failures };
    };

    const refineCandidates = async (state: IdeationGraphState): Promise<IdeationGraphUpdate> => {
      const evaluatorDeps = { llmClient, executor: context.evaluationExecutor };
      const controller = createRefinementController({
        llmClient,
        generationExecutor: context.generationExecutor,
        evaluators: {
          novelty: createNoveltyEvaluator({ ...evaluatorDeps, reducer: config.aggregation.novelty }),
          feasibility: createFeasibilityEvaluator({
            ...evaluatorDeps,
            reducer: config.aggregation.feasibility,
          }),
        },
        graph: requireGraph(state),
        policy: {
          noveltyThreshold: config.noveltyThreshold,
          feasibilityThreshold: config.feasibilityThreshold,
          maxRounds: config.maxRounds,
        },
        deadline: context.deadline,
      });
      const { candidates, evaluationArchive } = await controller.refine(
        state.candidates,
        new Map(state.opportunities.map((o) => [o.id, o])),
      );
      return { candidates, evaluationArchive };
    };

    const assembleResult = (state: IdeationGraphState): Promise<IdeationGraphUpdate> => {
      const ordered = orderCandidates(state.candidates, state.opportunities);
      const accepted = ordered.filter((c) => c.status === 'Accepted');
      const rejected = ordered.filter((c) => c.status === 'Rejected');
      const erroredCandidates: ErroredCandidate[] = ordered
        .filter((c) => c.status === 'Errored')
        .map((c) => ({
          candidateId: c.id,
          opportunityId: c.opportunityId,
          cause: c.error?.message ?? 'unknown',
        }));

      return Promise.resolve({
        result: {
          accepted,
          rejected,
          evaluationArchive: state.evaluationArchive,
          graph: requireGraph(state).toSnapshot(),
          opportunities: state.opportunities,
          summary: {
            accepted: accepted.length,
            rejected: rejected.length,
            errored: erroredCandidates.length,
            processedDocuments: state.processedDocuments,
            skippedDocuments: state.skippedDocuments,
            opportunities: state.opportunities.length,
            droppedOpportunities: state.droppedOpportunities,
            generationFailures: state.generationFailures.length,
            erroredCandidates,
            durationMs: now() - state.startedAt,
          },
        },
      });
    };

    return new StateGraph(IdeationGraphAnnotation)
      .addNode('buildGraph', buildGraph)
      .addNode('detectOpportunities', detectOpportunities)
      .addNode('generateCandidates', generateCandidates)
      .addNode('refineCandidates', refineCandidates)
      .addNode('assembleResult', assembleResult)
      .addEdge(START, 'buildGraph')
      .addEdge('buildGraph', 'detectOpportunities')
      .addEdge('detectOpportunities', 'generateCandidates')
      .addEdge('generateCandidates', 'refineCandidates')
      .addEdge('refineCandidates', 'assembleResult')
      .addEdge('assembleResult', END)
      .compile();
  }

  return {
    async run(documents: readonly IngestedDocument[]): Promise<IdeationResult> {
      log.info({ documentCount: documents.length }, 'Running ideation pipeline');

      const workflow = compileWorkflow(createRunContext());
      const state = await workflow.invoke({
        startedAt: now(),
        documents,
        graph: undefined,
        processedDocuments: [],
        skippedDocuments: [],
        opportunities: [],
        droppedOpportunities: [],
        candidates: [],
        generationFailures: [],
        evaluationArchive: [],
        result: undefined,
      });

      if (!state.result) {
        throw new IdeationError('Pipeline finished without a result', 'PIPELINE_STATE');
      }

      log.info(
        {
          accepted: state.result.summary.accepted,
          rejected: state.result.summary.rejected,
          errored: state.result.summary.errored,
          durationMs: state.result.summary.durationMs,
        },
        'Ideation pipeline complete',
      );

      return state.result;
    },
  };
}
