import type { OpportunityGraph } from '../graph/opportunity-graph.js';

export const CONSISTENT_SCORE = 10;
export const CONTRADICTED_SCORE = 0;

/** False when any two anchor nodes are joined by a `contradicts` edge. */
export function isGraphConsistent(graph: OpportunityGraph, anchorNodes: readonly string[]): boolean {
  for (let i = 0; i < anchorNodes.length; i++) {
    for (let j = i + 1; j < anchorNodes.length; j++) {
      if (graph.edgesBetween(anchorNodes[i], anchorNodes[j]).some((e) => e.relation === 'contradicts')) {
        return false;
      }
    }
  }
  return true;
}
