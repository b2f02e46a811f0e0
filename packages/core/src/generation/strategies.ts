import type {
  GenerationStrategy,
  GraphNode,
  Opportunity,
  OpportunityKind,
} from '@ideaweaver/shared/src/types/ideation.types.js';
import type { LlmRequest } from '../llm/llm-client.js';
import type { ScoredPassage } from '../rag/passage-store.js';
import { IdeaDraftResultJsonSchema } from '../llm/oracle-output.schemas.js';
import { taskMarker } from '../llm/task-marker.js';

/** Fixed dispatch from opportunity kind to the strategies that answer it. */
export const STRATEGIES_BY_KIND: Readonly<Record<OpportunityKind, readonly GenerationStrategy[]>> = {
  gap: ['reverse-engineering', 'cross-domain'],
  transfer: ['transfer'],
  combination: ['combination'],
};

export interface StrategyContext {
  readonly opportunity: Opportunity;
  readonly anchors: readonly GraphNode[];
  readonly passages: readonly ScoredPassage[];
}

export interface StrategyHandler {
  readonly strategy: GenerationStrategy;
  buildRequest(context: StrategyContext): LlmRequest;
}

const OUTPUT_FORMAT = `Respond with a JSON object containing:
- title: a short name for the idea
- hypothesis: one falsifiable sentence
- innovationPoints: array of 1-4 strings, what is new compared to the surveyed work
- experimentSketch: how the hypothesis would be tested (data, baselines, metrics)`;

function describeAnchors(anchors: readonly GraphNode[]): string {
  return anchors
    .map((node) => `- ${node.label} (${node.kind}, salience ${node.salience.toFixed(2)})`)
    .join('\n');
}

function describeEvidence(passages: readonly ScoredPassage[]): string {
  if (passages.length === 0) {
    return '';
  }
  return `\n\n## Related passages from the corpus\n${passages
    .map((p) => `[${p.id}] ${p.text.replace(/\s+/g, ' ')}`)
    .join('\n')}`;
}

function describeOpportunity({ opportunity, anchors, passages }: StrategyContext): string {
  const transfer = opportunity.transfer
    ? `\nPattern to transfer: ${opportunity.transfer.pattern
        .map((s) => `${s.relation} ${s.neighborKind}`)
        .join(', ')}`
    : '';

  return `## Opportunity (${opportunity.kind})
${opportunity.rationale}${transfer}

## Anchor entities
${describeAnchors(anchors)}${describeEvidence(passages)}`;
}

function handler(strategy: GenerationStrategy, instructions: string): StrategyHandler {
  const systemPrompt = `${taskMarker('idea-generation')}
You are a research ideation assistant working from a structured map of a scientific literature.
Strategy: ${strategy}
${instructions}

Rules:
- Ground the idea in the anchor entities; do not invent unrelated techniques
- Prefer ideas a small team could test within months

${OUTPUT_FORMAT}`;

  return {
    strategy,
    buildRequest(context: StrategyContext): LlmRequest {
      return {
        systemPrompt,
        userMessage: describeOpportunity(context),
        jsonSchema: IdeaDraftResultJsonSchema,
      };
    },
  };
}

export const STRATEGY_HANDLERS: Readonly<Record<GenerationStrategy, StrategyHandler>> = {
  'reverse-engineering': handler(
    'reverse-engineering',
    'Start from the outcome the under-explored entity would enable and work backwards to the missing method or evidence.',
  ),
  'cross-domain': handler(
    'cross-domain',
    'Bring a technique from a neighbouring field to bear on the under-explored entity.',
  ),
  transfer: handler(
    'transfer',
    'Carry the relation pattern of the source entity over to the target entities, which lack it.',
  ),
  combination: handler(
    'combination',
    'Combine the two anchor entities, which the literature treats separately, into one approach.',
  ),
};
