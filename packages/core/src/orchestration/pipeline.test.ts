import { describe, it, expect, vi } from 'vitest';
import type { GraphEdge, GraphNode } from '@ideaweaver/shared/src/types/ideation.types.js';
import type { IngestedDocument } from '@ideaweaver/shared/src/types/ingestion.types.js';
import type { LlmClient, LlmRequest } from '../llm/llm-client.js';
import type { GraphBuilder } from '../graph/graph-builder.js';
import { createIdeationConfig } from '@ideaweaver/schemas/src/validators.js';
import { DeadlineExceededError, EmptyCorpusError, OracleError } from '@ideaweaver/shared/src/utils/errors.js';
import { OpportunityGraph } from '../graph/opportunity-graph.js';
import { readTaskMarker } from '../llm/task-marker.js';
import { createIdeationPipeline } from './pipeline.js';

const documents: IngestedDocument[] = [{ id: 'd1', title: 'Survey', text: '# Intro\nText.', outline: [] }];

const retry = { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0, jitter: false };

function node(id: string, salience: number): GraphNode {
  return { id, label: id, kind: 'concept', salience, sourceRefs: [] };
}

function edge(from: string, to: string): GraphEdge {
  return { from, to, relation: 'supports', confidence: 0.5 };
}

/** Path A–X–C–Y–B: yields the single opportunity combination:A+B. */
function scenarioGraph(): OpportunityGraph {
  return new OpportunityGraph(
    [node('A', 0.9), node('X', 0.1), node('C', 0.2), node('Y', 0.1), node('B', 0.85)],
    [edge('A', 'X'), edge('X', 'C'), edge('C', 'Y'), edge('Y', 'B')],
  );
}

/** Two isolated salient nodes: gap:P (priority 0.72) then gap:Q (priority 0.56). */
function gapGraph(): OpportunityGraph {
  return new OpportunityGraph([node('P', 0.9), node('Q', 0.7)], []);
}

function stubBuilder(graph: OpportunityGraph, onBuild?: () => void): GraphBuilder {
  return {
    build: vi.fn(() => {
      onBuild?.();
      return Promise.resolve({ graph, processedDocuments: ['d1'], skippedDocuments: [] });
    }),
  };
}

function review(dimensions: readonly string[], score: number): string {
  return JSON.stringify({
    scores: Object.fromEntries(dimensions.map((d) => [d, { score, rationale: 'ok' }])),
    rationale: 'review',
  });
}

const draft = JSON.stringify({
  title: 'Idea',
  hypothesis: 'h',
  innovationPoints: ['p'],
  experimentSketch: 'e',
});

/** Scores ideas anchored on `Q` low and every other idea high. */
function createMockLlm(overrides: Partial<Record<string, (request: LlmRequest) => Promise<{ content: string }>>> = {}): LlmClient {
  return {
    invoke: vi.fn((request: LlmRequest) => {
      const task = readTaskMarker(request.systemPrompt) ?? 'unknown';
      const override = overrides[task];
      if (override) {
        return override(request);
      }
      const weak = request.userMessage.includes('Anchor entities: Q (concept)');
      switch (task) {
        case 'idea-generation':
        case 'idea-revision':
          return Promise.resolve({ content: draft });
        case 'novelty-review':
          return Promise.resolve({
            content: review(['concept', 'method', 'application', 'evaluation'], weak ? 6 : 9),
          });
        case 'feasibility-review':
          return Promise.resolve({
            content: review(['relevance', 'resource-requirement', 'risk'], weak ? 6 : 8),
          });
        default:
          return Promise.reject(new OracleError(`unexpected task ${task}`, 'malformed'));
      }
    }),
  };
}

describe('createIdeationPipeline', () => {
  it('should accept the single combination idea of the scenario graph', async () => {
    let clock = 1000;
    const pipeline = createIdeationPipeline({
      config: createIdeationConfig({ retry }),
      llmClient: createMockLlm(),
      graphBuilder: stubBuilder(scenarioGraph(), () => {
        clock += 250;
      }),
      now: () => clock,
    });

    const result = await pipeline.run(documents);

    expect(result.opportunities.map((o) => [o.id, o.priority])).toEqual([['combination:A+B', 0.55]]);
    expect(result.accepted).toHaveLength(1);
    expect(result.accepted[0]).toMatchObject({
      id: 'idea-001',
      opportunityId: 'combination:A+B',
      strategy: 'combination',
      status: 'Accepted',
      round: 0,
      noveltyScore: 9,
      feasibilityScore: 8.5,
    });
    expect(result.rejected).toEqual([]);
    expect(result.evaluationArchive.map((r) => r.evaluator)).toEqual(['feasibility', 'novelty']);
    expect(result.graph.nodeCount).toBe(5);
    expect(result.summary).toEqual({
      accepted: 1,
      rejected: 0,
      errored: 0,
      processedDocuments: ['d1'],
      skippedDocuments: [],
      opportunities: 1,
      droppedOpportunities: [],
      generationFailures: 0,
      erroredCandidates: [],
      durationMs: 250,
    });
  });

  it('should order accepted and rejected ideas by opportunity priority then id', async () => {
    const pipeline = createIdeationPipeline({
      config: createIdeationConfig({ retry, maxRounds: 0 }),
      llmClient: createMockLlm(),
      graphBuilder: stubBuilder(gapGraph()),
    });

    const result = await pipeline.run(documents);

    expect(result.opportunities.map((o) => o.id)).toEqual(['gap:P', 'gap:Q']);
    expect(result.accepted.map((c) => [c.id, c.opportunityId, c.strategy])).toEqual([
      ['idea-001', 'gap:P', 'reverse-engineering'],
      ['idea-002', 'gap:P', 'cross-domain'],
    ]);
    expect(result.rejected.map((c) => [c.id, c.opportunityId])).toEqual([
      ['idea-003', 'gap:Q'],
      ['idea-004', 'gap:Q'],
    ]);
    expect(result.summary).toMatchObject({ accepted: 2, rejected: 2, errored: 0, opportunities: 2 });
  });

  it('should respect the initial idea budget', async () => {
    const pipeline = createIdeationPipeline({
      config: createIdeationConfig({ retry, maxRounds: 0, maxInitialIdeas: 3 }),
      llmClient: createMockLlm(),
      graphBuilder: stubBuilder(gapGraph()),
    });

    const result = await pipeline.run(documents);

    expect([...result.accepted, ...result.rejected].map((c) => c.id)).toEqual([
      'idea-001',
      'idea-002',
      'idea-003',
    ]);
  });

  it('should report errored candidates with their cause', async () => {
    const pipeline = createIdeationPipeline({
      config: createIdeationConfig({ retry, maxRounds: 1 }),
      llmClient: createMockLlm({
        'novelty-review': () => Promise.reject(new OracleError('refused', 'refusal')),
      }),
      graphBuilder: stubBuilder(scenarioGraph()),
    });

    const result = await pipeline.run(documents);

    expect(result.accepted).toEqual([]);
    expect(result.rejected).toEqual([]);
    expect(result.summary.errored).toBe(1);
    expect(result.summary.erroredCandidates).toEqual([
      { candidateId: 'idea-001', opportunityId: 'combination:A+B', cause: 'refused' },
    ]);
  });

  it('should count generation failures without aborting the run', async () => {
    const pipeline = createIdeationPipeline({
      config: createIdeationConfig({ retry }),
      llmClient: createMockLlm({
        'idea-generation': () => Promise.reject(new OracleError('refused', 'refusal')),
      }),
      graphBuilder: stubBuilder(scenarioGraph()),
    });

    const result = await pipeline.run(documents);

    expect(result.summary).toMatchObject({ accepted: 0, rejected: 0, errored: 0, generationFailures: 1 });
  });

  it('should fail the run when the deadline passes before detection', async () => {
    let clock = 0;
    const pipeline = createIdeationPipeline({
      config: createIdeationConfig({ retry, runDeadlineMs: 100 }),
      llmClient: createMockLlm(),
      graphBuilder: stubBuilder(scenarioGraph(), () => {
        clock = 500;
      }),
      now: () => clock,
    });

    await expect(pipeline.run(documents)).rejects.toThrow(DeadlineExceededError);
  });

  it('should propagate an empty corpus', async () => {
    const pipeline = createIdeationPipeline({
      config: createIdeationConfig({ retry }),
      llmClient: createMockLlm(),
      graphBuilder: { build: () => Promise.reject(new EmptyCorpusError('no documents')) },
    });

    await expect(pipeline.run(documents)).rejects.toThrow(EmptyCorpusError);
  });
});
