import { describe, it, expect } from 'vitest';
import type { GraphNode } from '@ideaweaver/shared/src/types/ideation.types.js';
import { OpportunityGraph } from '../graph/opportunity-graph.js';
import { density, detectCommunities } from './communities.js';

function node(id: string): GraphNode {
  return { id, label: id, kind: 'concept', salience: 0.5, sourceRefs: [] };
}

const triangles = new OpportunityGraph(
  ['a1', 'a2', 'a3', 'b1', 'b2', 'b3'].map(node),
  [
    ['a1', 'a2'],
    ['a1', 'a3'],
    ['a2', 'a3'],
    ['b1', 'b2'],
    ['b1', 'b3'],
    ['b2', 'b3'],
    ['a3', 'b3'],
  ].map(([from, to]) => ({ from, to, relation: 'supports' as const, confidence: 1 })),
);

describe('detectCommunities', () => {
  it('should separate two triangles joined by one bridge', () => {
    expect(detectCommunities(triangles)).toEqual([
      { members: ['a1', 'a2', 'a3'], density: 1 },
      { members: ['b1', 'b2', 'b3'], density: 1 },
    ]);
  });

  it('should leave isolated nodes in their own community', () => {
    const graph = new OpportunityGraph([node('x'), node('y')], []);

    expect(detectCommunities(graph)).toEqual([
      { members: ['x'], density: 0 },
      { members: ['y'], density: 0 },
    ]);
  });
});

describe('density', () => {
  it('should count linked member pairs against all possible pairs', () => {
    expect(density(triangles, ['a1', 'a2', 'a3', 'b1'])).toBe(0.5);
  });
});
