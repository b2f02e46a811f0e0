import type { DetectorConfig } from '@ideaweaver/schemas/src/ideation.schema.js';
import type {
  GraphNode,
  Opportunity,
  OpportunityKind,
  RelationSignature,
} from '@ideaweaver/shared/src/types/ideation.types.js';
import type { OpportunityGraph } from '../graph/opportunity-graph.js';
import { createChildLogger } from '@ideaweaver/shared/src/logger.js';
import { GraphInconsistencyError } from '@ideaweaver/shared/src/utils/errors.js';
import { mean, round } from '@ideaweaver/shared/src/utils/math.js';
import { compareIds } from '../graph/labels.js';
import { detectCommunities } from './communities.js';

const log = createChildLogger('opportunities:detector');

export interface OpportunityDetector {
  detect(graph: OpportunityGraph): Opportunity[];
}

interface Draft {
  readonly kind: OpportunityKind;
  readonly anchorNodes: readonly string[];
  readonly rationale: string;
  /** Hop distance between the anchors: `null` when disconnected, absent when no penalty applies. */
  readonly distance?: number | null;
  readonly transfer?: Opportunity['transfer'];
}

function formatSalience(node: GraphNode): string {
  return node.salience.toFixed(2);
}

function signatureKey(signature: RelationSignature): string {
  return `${signature.relation}:${signature.neighborKind}`;
}

/** Orders opportunities by descending priority, then anchor ids, then kind. */
export function compareOpportunities(a: Opportunity, b: Opportunity): number {
  if (a.priority !== b.priority) {
    return b.priority - a.priority;
  }
  return compareIds(a.anchorNodes.join('+'), b.anchorNodes.join('+')) || compareIds(a.kind, b.kind);
}

/**
 * Splits opportunities into those whose anchors all exist in `graph` and
 * those that reference unknown nodes.
 */
export function partitionByConsistency(
  opportunities: readonly Opportunity[],
  graph: OpportunityGraph,
): { readonly consistent: Opportunity[]; readonly dropped: GraphInconsistencyError[] } {
  const consistent: Opportunity[] = [];
  const dropped: GraphInconsistencyError[] = [];

  for (const opportunity of opportunities) {
    const missing = opportunity.anchorNodes.filter((id) => !graph.hasNode(id));
    if (missing.length === 0) {
      consistent.push(opportunity);
      continue;
    }
    const error = new GraphInconsistencyError(
      `Opportunity ${opportunity.id} references unknown nodes`,
      missing,
    );
    log.error({ opportunityId: opportunity.id, missingNodeIds: missing }, error.message);
    dropped.push(error);
  }

  return { consistent, dropped };
}

export function createOpportunityDetector(config: DetectorConfig): OpportunityDetector {
  function findGaps(graph: OpportunityGraph, nodes: readonly GraphNode[]): Draft[] {
    return nodes
      .filter(
        (node) =>
          node.salience > config.gapSalienceThreshold && graph.degree(node.id) < config.gapDegreeThreshold,
      )
      .map((node): Draft => ({
        kind: 'gap',
        anchorNodes: [node.id],
        rationale: `"${node.label}" is salient (${formatSalience(node)}) but has only ${String(graph.degree(node.id))} connection(s) in the literature`,
      }));
  }

  function findCombinations(graph: OpportunityGraph, nodes: readonly GraphNode[]): Draft[] {
    const eligible = nodes.filter((node) => node.salience >= config.combinationSalienceThreshold);
    const twoHops = new Map(
      eligible.map((node) => [
        node.id,
        new Set(
          [...graph.distancesFrom(node.id, 2)].filter(([, hops]) => hops === 2).map(([id]) => id),
        ),
      ]),
    );

    const drafts: Draft[] = [];
    for (let i = 0; i < eligible.length; i++) {
      for (let j = i + 1; j < eligible.length; j++) {
        const a = eligible[i];
        const b = eligible[j];
        if (graph.distance(a.id, b.id, config.combinationHopLimit) !== undefined) continue;

        const fromB = twoHops.get(b.id) ?? new Set<string>();
        const bridges = [...(twoHops.get(a.id) ?? [])].filter((id) => fromB.has(id)).sort(compareIds);
        if (bridges.length === 0) continue;

        const bridgeLabels = bridges.map((id) => graph.node(id)?.label ?? id).join(', ');
        drafts.push({
          kind: 'combination',
          anchorNodes: [a.id, b.id],
          rationale: `"${a.label}" (${formatSalience(a)}) and "${b.label}" (${formatSalience(b)}) are both salient and not directly linked, yet both relate to ${bridgeLabels}`,
          distance: graph.distance(a.id, b.id) ?? null,
        });
      }
    }
    return drafts;
  }

  function patternOf(
    graph: OpportunityGraph,
    id: string,
    members: ReadonlySet<string>,
  ): RelationSignature[] {
    const signatures = new Map<string, RelationSignature>();
    for (const edge of graph.edgesOf(id)) {
      const other = edge.from === id ? edge.to : edge.from;
      const neighbor = graph.node(other);
      if (!neighbor || !members.has(other)) continue;
      const signature = { relation: edge.relation, neighborKind: neighbor.kind };
      signatures.set(signatureKey(signature), signature);
    }
    return [...signatures.entries()]
      .sort(([x], [y]) => compareIds(x, y))
      .map(([, signature]) => signature);
  }

  function touches(graph: OpportunityGraph, conceptId: string, members: ReadonlySet<string>): boolean {
    return members.has(conceptId) || graph.neighbors(conceptId).some((n) => members.has(n));
  }

  function findTransfers(graph: OpportunityGraph, nodes: readonly GraphNode[]): Draft[] {
    const dense = detectCommunities(graph).filter(
      (c) => c.members.length >= config.minCommunitySize && c.density >= config.minCommunityDensity,
    );
    if (dense.length < 2) return [];

    const concepts = nodes.filter((node) => node.kind === 'concept').map((node) => node.id);
    const memberSets = dense.map((c) => new Set(c.members));

    const drafts: Draft[] = [];
    for (let s = 0; s < dense.length; s++) {
      for (let t = 0; t < dense.length; t++) {
        if (s === t) continue;
        const source = dense[s];
        const target = dense[t];
        const sourceSet = memberSets[s];
        const targetSet = memberSets[t];

        const sharedConcept = concepts.find(
          (id) => touches(graph, id, sourceSet) && touches(graph, id, targetSet),
        );
        if (sharedConcept === undefined) continue;

        for (const sourceId of source.members) {
          const sourceNode = graph.node(sourceId);
          if (!sourceNode) continue;
          const pattern = patternOf(graph, sourceId, sourceSet);
          if (pattern.length < config.minPatternSize) continue;

          const wanted = pattern.map(signatureKey);
          const sameKind = target.members.filter((id) => graph.node(id)?.kind === sourceNode.kind);
          const hasAnalog = sameKind.some((id) => {
            const present = new Set(patternOf(graph, id, targetSet).map(signatureKey));
            return wanted.every((key) => present.has(key));
          });
          if (hasAnalog) continue;

          const targetNodes = sameKind.length > 0 ? sameKind : [...target.members];
          const distances = graph.distancesFrom(sourceId);
          const nearest = Math.min(
            ...targetNodes.map((id) => distances.get(id) ?? Number.POSITIVE_INFINITY),
          );

          drafts.push({
            kind: 'transfer',
            anchorNodes: [sourceId, ...targetNodes],
            rationale: `"${sourceNode.label}" shows the pattern ${wanted.join(', ')} in its area, which has no counterpart among ${targetNodes.map((id) => graph.node(id)?.label ?? id).join(', ')}; both areas relate to "${graph.node(sharedConcept)?.label ?? sharedConcept}"`,
            distance: Number.isFinite(nearest) ? nearest : null,
            transfer: { sourceNode: sourceId, pattern, targetNodes },
          });
        }
      }
    }
    return drafts;
  }

  function prioritize(graph: OpportunityGraph, draft: Draft): Opportunity {
    const salience = mean(draft.anchorNodes.map((id) => graph.node(id)?.salience ?? 0));
    let penalty = 0;
    if (draft.distance === null) {
      penalty = 1;
    } else if (draft.distance !== undefined && draft.distance > 0) {
      penalty = 1 - 1 / draft.distance;
    }

    const { salience: wSalience, distance: wDistance } = config.priorityWeights;
    return {
      id: `${draft.kind}:${draft.anchorNodes.join('+')}`,
      kind: draft.kind,
      anchorNodes: draft.anchorNodes,
      rationale: draft.rationale,
      priority: round(wSalience * salience - wDistance * penalty),
      ...(draft.transfer ? { transfer: draft.transfer } : {}),
    };
  }

  return {
    detect(graph: OpportunityGraph): Opportunity[] {
      const nodes = [...graph.nodes].sort((a, b) => compareIds(a.id, b.id));

      const drafts = [
        ...findGaps(graph, nodes),
        ...findTransfers(graph, nodes),
        ...findCombinations(graph, nodes),
      ];
      const opportunities = drafts.map((draft) => prioritize(graph, draft)).sort(compareOpportunities);

      log.info(
        {
          total: opportunities.length,
          gaps: opportunities.filter((o) => o.kind === 'gap').length,
          transfers: opportunities.filter((o) => o.kind === 'transfer').length,
          combinations: opportunities.filter((o) => o.kind === 'combination').length,
        },
        'Opportunities detected',
      );

      return opportunities;
    },
  };
}
