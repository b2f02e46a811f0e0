import type { OpportunityGraph } from '../graph/opportunity-graph.js';
import { compareIds } from '../graph/labels.js';

const MAX_ITERATIONS = 100;

export interface Community {
  /** Member ids, sorted. */
  readonly members: readonly string[];
  readonly density: number;
}

/**
 * Deterministic label propagation: nodes are visited in id order and adopt
 * the most common label among their neighbours, ties going to the smallest
 * label. Communities are returned ordered by their first member.
 */
export function detectCommunities(graph: OpportunityGraph): Community[] {
  const ids = graph.nodes.map((n) => n.id).sort(compareIds);
  const labels = new Map(ids.map((id) => [id, id]));

  for (let iteration = 0; iteration < MAX_ITERATIONS; iteration++) {
    let changed = false;

    for (const id of ids) {
      const counts = new Map<string, number>();
      for (const neighbor of graph.neighbors(id)) {
        const label = labels.get(neighbor) ?? neighbor;
        counts.set(label, (counts.get(label) ?? 0) + 1);
      }
      if (counts.size === 0) continue;

      let best: string | undefined;
      let bestCount = 0;
      for (const [label, count] of counts) {
        if (count > bestCount || (count === bestCount && best !== undefined && compareIds(label, best) < 0)) {
          best = label;
          bestCount = count;
        }
      }

      if (best !== undefined && best !== labels.get(id)) {
        labels.set(id, best);
        changed = true;
      }
    }

    if (!changed) break;
  }

  const groups = new Map<string, string[]>();
  for (const id of ids) {
    const label = labels.get(id) ?? id;
    const group = groups.get(label) ?? [];
    group.push(id);
    groups.set(label, group);
  }

  return [...groups.values()]
    .map((members) => ({ members, density: density(graph, members) }))
    .sort((a, b) => compareIds(a.members[0], b.members[0]));
}

/** Share of possible member pairs joined by at least one edge. */
export function density(graph: OpportunityGraph, members: readonly string[]): number {
  if (members.length < 2) return 0;
  const memberSet = new Set(members);
  let linked = 0;
  for (const id of members) {
    linked += graph.neighbors(id).filter((n) => memberSet.has(n) && compareIds(id, n) < 0).length;
  }
  return linked / ((members.length * (members.length - 1)) / 2);
}
