import type { GraphConfig } from '@ideaweaver/schemas/src/ideation.schema.js';
import type {
  DocumentSection,
  IngestedDocument,
  OutlineEntry,
} from '@ideaweaver/shared/src/types/ingestion.types.js';
import type {
  GraphEdge,
  GraphNode,
  NodeKind,
  RelationType,
  SkippedDocument,
} from '@ideaweaver/shared/src/types/ideation.types.js';
import type { EntityExtractor, EntityMention } from './entity-extractor.js';
import { createChildLogger } from '@ideaweaver/shared/src/logger.js';
import {
  EmptyCorpusError,
  ExtractionError,
  OracleError,
} from '@ideaweaver/shared/src/utils/errors.js';
import { clamp, mean, round } from '@ideaweaver/shared/src/utils/math.js';
import { settleAll } from '../execution/task-group.js';
import { KIND_ORDER } from './entity-kinds.js';
import { compareIds, nodeIdFor, normalizeLabel } from './labels.js';
import { OpportunityGraph } from './opportunity-graph.js';
import { inferRelation, RELATION_ORDER } from './relation-inference.js';
import { spanId, splitSections } from './text-segmentation.js';

const log = createChildLogger('graph:builder');

const KEY_POINT_SECTION_WEIGHT = 1.0;
const UNLISTED_SECTION_WEIGHT = 0.25;

export interface GraphBuildResult {
  readonly graph: OpportunityGraph;
  readonly processedDocuments: readonly string[];
  readonly skippedDocuments: readonly SkippedDocument[];
}

export interface GraphBuilder {
  build(documents: readonly IngestedDocument[]): Promise<GraphBuildResult>;
}

export interface GraphBuilderDeps {
  readonly extractor: EntityExtractor;
  readonly config: GraphConfig;
}

interface EntityObservation {
  readonly nodeId: string;
  readonly label: string;
  readonly kind: NodeKind;
  readonly confidence: number;
  readonly spanId: string;
  readonly sectionWeight: number;
}

interface Cooccurrence {
  readonly a: string;
  readonly b: string;
  readonly relation: RelationType;
  readonly confidenceProduct: number;
}

interface DocumentExtraction {
  readonly observations: readonly EntityObservation[];
  readonly cooccurrences: readonly Cooccurrence[];
}

interface EntityDraft {
  label: string;
  mentions: number;
  sectionWeight: number;
  readonly kindCounts: Map<NodeKind, number>;
  readonly sourceRefs: Set<string>;
}

interface PairDraft {
  readonly a: string;
  readonly b: string;
  count: number;
  readonly relationCounts: Map<RelationType, number>;
  readonly confidenceProducts: number[];
}

function pairKey(a: string, b: string): string {
  return `${a}|${b}`;
}

/** Most frequent value; ties go to the value listed first in `order`. */
function mostFrequent<T>(counts: ReadonlyMap<T, number>, order: readonly T[]): T | undefined {
  let best: T | undefined;
  let bestCount = 0;
  for (const value of order) {
    const count = counts.get(value) ?? 0;
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

function findOutlineEntry(
  document: IngestedDocument,
  section: DocumentSection,
): OutlineEntry | undefined {
  const heading = normalizeLabel(section.heading);
  return document.outline.find((entry) => normalizeLabel(entry.section) === heading);
}

/** Mutable accumulation of merged documents; frozen into an `OpportunityGraph` at the end. */
class GraphDraft {
  private readonly entities = new Map<string, EntityDraft>();
  private readonly pairs = new Map<string, PairDraft>();
  private salience = new Map<string, number>();

  constructor(private readonly config: GraphConfig) {}

  get entityCount(): number {
    return this.entities.size;
  }

  merge(extraction: DocumentExtraction): void {
    for (const observation of extraction.observations) {
      let entity = this.entities.get(observation.nodeId);
      if (!entity) {
        entity = {
          label: observation.label,
          mentions: 0,
          sectionWeight: 0,
          kindCounts: new Map(),
          sourceRefs: new Set(),
        };
        this.entities.set(observation.nodeId, entity);
      }
      entity.mentions += 1;
      entity.sectionWeight = Math.max(entity.sectionWeight, observation.sectionWeight);
      entity.kindCounts.set(observation.kind, (entity.kindCounts.get(observation.kind) ?? 0) + 1);
      entity.sourceRefs.add(observation.spanId);
    }

    for (const cooccurrence of extraction.cooccurrences) {
      const key = pairKey(cooccurrence.a, cooccurrence.b);
      let pair = this.pairs.get(key);
      if (!pair) {
        pair = {
          a: cooccurrence.a,
          b: cooccurrence.b,
          count: 0,
          relationCounts: new Map(),
          confidenceProducts: [],
        };
        this.pairs.set(key, pair);
      }
      pair.count += 1;
      pair.relationCounts.set(
        cooccurrence.relation,
        (pair.relationCounts.get(cooccurrence.relation) ?? 0) + 1,
      );
      pair.confidenceProducts.push(cooccurrence.confidenceProduct);
    }

    this.recomputeSalience();
  }

  recomputeSalience(): void {
    const degrees = new Map<string, number>();
    for (const pair of this.pairs.values()) {
      degrees.set(pair.a, (degrees.get(pair.a) ?? 0) + 1);
      degrees.set(pair.b, (degrees.get(pair.b) ?? 0) + 1);
    }

    const maxMentions = Math.max(0, ...[...this.entities.values()].map((e) => e.mentions));
    const maxDegree = Math.max(0, ...degrees.values());
    const weights = this.config.salienceWeights;

    const next = new Map<string, number>();
    for (const [id, entity] of this.entities) {
      const frequency = maxMentions > 0 ? entity.mentions / maxMentions : 0;
      const degree = maxDegree > 0 ? (degrees.get(id) ?? 0) / maxDegree : 0;
      next.set(
        id,
        round(
          clamp(
            weights.frequency * frequency + weights.outline * entity.sectionWeight + weights.degree * degree,
            0,
            1,
          ),
        ),
      );
    }
    this.salience = next;
  }

  freeze(): OpportunityGraph {
    this.recomputeSalience();

    const nodes: GraphNode[] = [...this.entities.entries()]
      .sort(([x], [y]) => compareIds(x, y))
      .map(([id, entity]) => ({
        id,
        label: entity.label,
        kind: mostFrequent(entity.kindCounts, KIND_ORDER) ?? 'concept',
        salience: this.salience.get(id) ?? 0,
        sourceRefs: [...entity.sourceRefs].sort(compareIds),
      }));

    const maxCount = Math.max(0, ...[...this.pairs.values()].map((p) => p.count));
    const edges: GraphEdge[] = [...this.pairs.values()]
      .sort((x, y) => compareIds(x.a, y.a) || compareIds(x.b, y.b))
      .map((pair) => ({
        from: pair.a,
        to: pair.b,
        relation: mostFrequent(pair.relationCounts, RELATION_ORDER) ?? 'supports',
        confidence: round(clamp((pair.count / maxCount) * mean(pair.confidenceProducts), 0, 1)),
      }));

    return new OpportunityGraph(nodes, edges);
  }
}

/**
 * Turns ingested documents into the opportunity graph. Documents are
 * extracted concurrently and merged in input order, so the result does not
 * depend on completion order.
 */
export function createGraphBuilder(deps: GraphBuilderDeps): GraphBuilder {
  const { extractor, config } = deps;

  async function extractDocument(document: IngestedDocument): Promise<DocumentExtraction> {
    const sections = splitSections(document.text);
    const outcomes = await settleAll(
      sections.map((section) => async () => {
        const outlineEntry = findOutlineEntry(document, section);
        const mentions = await extractor.extract({ document, section, outlineEntry });
        return { section, outlineEntry, mentions };
      }),
    );

    const observations: EntityObservation[] = [];
    const cooccurrences: Cooccurrence[] = [];

    for (const outcome of outcomes) {
      if (outcome.status === 'failed') {
        throw outcome.error;
      }
      const { section, outlineEntry, mentions } = outcome.value;
      const keyPoints = new Set((outlineEntry?.keyPoints ?? []).map(normalizeLabel));

      const located = mentions
        .map((mention) => ({ mention, nodeId: nodeIdFor(mention.label) }))
        .filter(({ nodeId }) => nodeId !== 'n:');

      for (const { mention, nodeId } of located) {
        observations.push({
          nodeId,
          label: mention.label.trim(),
          kind: mention.kind,
          confidence: mention.confidence,
          spanId: spanId(document.id, section.index, mention.sentenceIndex),
          sectionWeight: sectionWeightOf(mention, outlineEntry, keyPoints),
        });
      }

      cooccurrences.push(...pairMentions(section, located));
    }

    if (observations.length === 0) {
      throw new ExtractionError(`No extractable entities in document ${document.id}`, document.id);
    }

    return { observations, cooccurrences };
  }

  function sectionWeightOf(
    mention: EntityMention,
    outlineEntry: OutlineEntry | undefined,
    keyPoints: ReadonlySet<string>,
  ): number {
    if (keyPoints.has(normalizeLabel(mention.label))) {
      return KEY_POINT_SECTION_WEIGHT;
    }
    if (outlineEntry) {
      return outlineEntry.weight ?? config.defaultSectionWeight;
    }
    return UNLISTED_SECTION_WEIGHT;
  }

  function pairMentions(
    section: DocumentSection,
    located: ReadonlyArray<{ readonly mention: EntityMention; readonly nodeId: string }>,
  ): Cooccurrence[] {
    const result: Cooccurrence[] = [];
    for (let i = 0; i < located.length; i++) {
      for (let j = i + 1; j < located.length; j++) {
        const first = located[i];
        const second = located[j];
        if (first.nodeId === second.nodeId) continue;

        const low = Math.min(first.mention.sentenceIndex, second.mention.sentenceIndex);
        const high = Math.max(first.mention.sentenceIndex, second.mention.sentenceIndex);
        if (high - low > config.cooccurrenceWindow) continue;

        const [a, b] =
          compareIds(first.nodeId, second.nodeId) < 0 ? [first, second] : [second, first];
        const text = section.sentences.slice(low, high + 1).join(' ');

        result.push({
          a: a.nodeId,
          b: b.nodeId,
          relation: inferRelation(text, a.mention.kind, b.mention.kind),
          confidenceProduct: a.mention.confidence * b.mention.confidence,
        });
      }
    }
    return result;
  }

  return {
    async build(documents: readonly IngestedDocument[]): Promise<GraphBuildResult> {
      log.info({ documentCount: documents.length }, 'Building opportunity graph');

      const outcomes = await settleAll(documents.map((document) => () => extractDocument(document)));

      const draft = new GraphDraft(config);
      const processedDocuments: string[] = [];
      const skippedDocuments: SkippedDocument[] = [];

      outcomes.forEach((outcome, index) => {
        const document = documents[index];
        if (outcome.status === 'fulfilled') {
          draft.merge(outcome.value);
          processedDocuments.push(document.id);
          log.debug(
            { documentId: document.id, mentions: outcome.value.observations.length, entities: draft.entityCount },
            'Merged document into graph',
          );
          return;
        }

        const { error } = outcome;
        if (!(error instanceof ExtractionError) && !(error instanceof OracleError)) {
          throw error;
        }
        skippedDocuments.push({ documentId: document.id, reason: error.message });
        log.warn({ documentId: document.id, code: error.code, reason: error.message }, 'Skipping document');
      });

      if (processedDocuments.length === 0) {
        throw new EmptyCorpusError(
          `None of the ${String(documents.length)} documents yielded any entities`,
        );
      }

      const graph = draft.freeze();
      log.info(
        {
          nodes: graph.nodeCount,
          edges: graph.edges.length,
          processed: processedDocuments.length,
          skipped: skippedDocuments.length,
        },
        'Opportunity graph built',
      );

      return { graph, processedDocuments, skippedDocuments };
    },
  };
}
