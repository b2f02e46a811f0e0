import { describe, it, expect, vi } from 'vitest';
import type { Candidate, EvaluationReport } from '@ideaweaver/shared/src/types/ideation.types.js';
import type { LlmClient } from '../llm/llm-client.js';
import type { EvaluationContext, Evaluator } from './evaluator.js';
import { OracleError } from '@ideaweaver/shared/src/utils/errors.js';
import { BatchExecutor } from '../execution/batch-executor.js';
import { OpportunityGraph } from '../graph/opportunity-graph.js';
import { aggregateScores } from './reducers.js';
import { isGraphConsistent } from './graph-consistency.js';
import { createNoveltyEvaluator } from './novelty-evaluator.js';
import { createFeasibilityEvaluator } from './feasibility-evaluator.js';
import { evaluateCandidate } from './evaluate-candidate.js';

const candidate: Candidate = {
  id: 'idea-001',
  opportunityId: 'combination:A+B',
  strategy: 'combination',
  title: 'Sparse experts for molecules',
  hypothesis: 'Routing by scaffold improves property prediction.',
  innovationPoints: ['Scaffold-aware routing'],
  experimentSketch: 'Compare against a dense GNN.',
  noveltyScore: null,
  feasibilityScore: null,
  status: 'Proposed',
  round: 0,
  history: [],
  statusTrail: ['Proposed'],
};

const context: EvaluationContext = {
  opportunity: { id: 'combination:A+B', kind: 'combination', anchorNodes: ['A', 'B'], rationale: 'apart', priority: 0.5 },
  anchors: [],
  graphConsistent: true,
};

function createExecutor(): BatchExecutor {
  return new BatchExecutor({
    name: 'evaluation',
    concurrency: 2,
    retry: { maxAttempts: 1, baseDelayMs: 1, maxDelayMs: 1, jitter: false },
    callTimeoutMs: 1000,
  });
}

function reviewClient(scores: Record<string, number>): LlmClient {
  const entries = Object.fromEntries(
    Object.entries(scores).map(([dimension, score]) => [dimension, { score, rationale: `${dimension} is ${String(score)}` }]),
  );
  return { invoke: vi.fn().mockResolvedValue({ content: JSON.stringify({ scores: entries, rationale: 'overall' }) }) };
}

describe('aggregateScores', () => {
  it('should support mean, min and median reducers', () => {
    expect(aggregateScores('mean', [6, 7, 8, 9])).toBe(7.5);
    expect(aggregateScores('min', [6, 7, 8, 9])).toBe(6);
    expect(aggregateScores('median', [1, 9, 5])).toBe(5);
  });

  it('should not round a score just below the threshold up to it', () => {
    const aggregate = aggregateScores('mean', [8, 8, 8, 7.9998]);

    expect(aggregate).toBeLessThan(8);
    expect(aggregate).toBeGreaterThan(7.9999);
  });
});

describe('isGraphConsistent', () => {
  const graph = new OpportunityGraph(
    ['A', 'B', 'C'].map((id) => ({ id, label: id, kind: 'concept' as const, salience: 0.5, sourceRefs: [] })),
    [
      { from: 'A', to: 'B', relation: 'supports', confidence: 1 },
      { from: 'B', to: 'C', relation: 'contradicts', confidence: 1 },
    ],
  );

  it('should flag anchors joined by a contradicts edge', () => {
    expect(isGraphConsistent(graph, ['C', 'B'])).toBe(false);
  });

  it('should accept anchors without contradictions', () => {
    expect(isGraphConsistent(graph, ['A', 'B'])).toBe(true);
    expect(isGraphConsistent(graph, ['A', 'C'])).toBe(true);
  });
});

describe('createNoveltyEvaluator', () => {
  it('should score every novelty dimension and aggregate by the mean', async () => {
    const llmClient = reviewClient({ concept: 6, method: 7, application: 8, evaluation: 9 });
    const evaluator = createNoveltyEvaluator({ llmClient, executor: createExecutor(), reducer: 'mean' });

    const report = await evaluator.evaluate(candidate, context);

    expect(report).toEqual({
      candidateId: 'idea-001',
      evaluator: 'novelty',
      round: 0,
      dimensionScores: { concept: 6, method: 7, application: 8, evaluation: 9 },
      dimensionRationales: {
        concept: 'concept is 6',
        method: 'method is 7',
        application: 'application is 8',
        evaluation: 'evaluation is 9',
      },
      aggregate: 7.5,
      rationale: 'overall',
      graphConsistency: true,
    });
  });

  it('should surface an oracle refusal', async () => {
    const llmClient: LlmClient = { invoke: vi.fn().mockRejectedValue(new OracleError('blocked', 'refusal')) };
    const evaluator = createNoveltyEvaluator({ llmClient, executor: createExecutor(), reducer: 'mean' });

    await expect(evaluator.evaluate(candidate, context)).rejects.toThrow('blocked');
  });
});

describe('createFeasibilityEvaluator', () => {
  const scores = { relevance: 8, 'resource-requirement': 8, risk: 8 };

  it('should add a full graph-consistency score when anchors agree', async () => {
    const evaluator = createFeasibilityEvaluator({
      llmClient: reviewClient(scores),
      executor: createExecutor(),
      reducer: 'mean',
    });

    const report = await evaluator.evaluate(candidate, context);

    expect(report.dimensionScores).toEqual({ ...scores, 'graph-consistency': 10 });
    expect(report.aggregate).toBe(8.5);
    expect(report.graphConsistency).toBe(true);
  });

  it('should zero the graph-consistency dimension for contradicted anchors', async () => {
    const evaluator = createFeasibilityEvaluator({
      llmClient: reviewClient(scores),
      executor: createExecutor(),
      reducer: 'min',
    });

    const report = await evaluator.evaluate(candidate, { ...context, graphConsistent: false });

    expect(report.dimensionScores['graph-consistency']).toBe(0);
    expect(report.aggregate).toBe(0);
    expect(report.graphConsistency).toBe(false);
  });

  it('should not ask the oracle about graph consistency', async () => {
    const llmClient = reviewClient(scores);
    const evaluator = createFeasibilityEvaluator({ llmClient, executor: createExecutor(), reducer: 'mean' });

    await evaluator.evaluate(candidate, context);

    const [request] = vi.mocked(llmClient.invoke).mock.calls[0];
    expect(request.systemPrompt).toContain('[TASK:feasibility-review]');
    expect(request.systemPrompt).not.toContain('graph-consistency');
  });
});

describe('evaluateCandidate', () => {
  function fixedEvaluator(kind: 'novelty' | 'feasibility', outcome: EvaluationReport | Error): Evaluator {
    return {
      kind,
      evaluate: vi.fn(() => (outcome instanceof Error ? Promise.reject(outcome) : Promise.resolve(outcome))),
    };
  }

  const report = (evaluator: 'novelty' | 'feasibility'): EvaluationReport => ({
    candidateId: 'idea-001',
    evaluator,
    round: 0,
    dimensionScores: {},
    dimensionRationales: {},
    aggregate: 9,
    rationale: '',
    graphConsistency: true,
  });

  it('should join both reports', async () => {
    const result = await evaluateCandidate(candidate, context, {
      novelty: fixedEvaluator('novelty', report('novelty')),
      feasibility: fixedEvaluator('feasibility', report('feasibility')),
    });

    expect(result.novelty.evaluator).toBe('novelty');
    expect(result.feasibility.evaluator).toBe('feasibility');
  });

  it('should fail after both evaluators have settled when one fails', async () => {
    const feasibility = fixedEvaluator('feasibility', report('feasibility'));

    await expect(
      evaluateCandidate(candidate, context, {
        novelty: fixedEvaluator('novelty', new OracleError('malformed review', 'malformed')),
        feasibility,
      }),
    ).rejects.toThrow('malformed review');
    expect(feasibility.evaluate).toHaveBeenCalledTimes(1);
  });
});
