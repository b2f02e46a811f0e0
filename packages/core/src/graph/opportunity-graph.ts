import type { GraphEdge, GraphNode, GraphSnapshot } from '@ideaweaver/shared/src/types/ideation.types.js';
import { GraphInconsistencyError } from '@ideaweaver/shared/src/utils/errors.js';
import { compareIds } from './labels.js';

/**
 * Read-only view of the extracted knowledge structure. Edges are treated as
 * undirected for adjacency and distances.
 */
export class OpportunityGraph {
  private readonly nodesById: ReadonlyMap<string, GraphNode>;
  private readonly adjacency: ReadonlyMap<string, readonly string[]>;
  private readonly edgeList: readonly GraphEdge[];

  constructor(nodes: readonly GraphNode[], edges: readonly GraphEdge[]) {
    const nodesById = new Map<string, GraphNode>();
    for (const node of nodes) {
      if (nodesById.has(node.id)) {
        throw new GraphInconsistencyError(`Duplicate node id: ${node.id}`, []);
      }
      nodesById.set(node.id, node);
    }

    const neighbors = new Map<string, Set<string>>();
    for (const id of nodesById.keys()) {
      neighbors.set(id, new Set());
    }

    for (const edge of edges) {
      const missing = [edge.from, edge.to].filter((id) => !nodesById.has(id));
      if (missing.length > 0) {
        throw new GraphInconsistencyError(
          `Edge ${edge.from} -> ${edge.to} references unknown nodes`,
          missing,
        );
      }
      if (edge.from === edge.to) {
        throw new GraphInconsistencyError(`Self-loop on ${edge.from}`, []);
      }
      neighbors.get(edge.from)?.add(edge.to);
      neighbors.get(edge.to)?.add(edge.from);
    }

    this.nodesById = nodesById;
    this.adjacency = new Map([...neighbors].map(([id, set]) => [id, [...set].sort(compareIds)]));
    this.edgeList = edges;
  }

  get nodes(): readonly GraphNode[] {
    return [...this.nodesById.values()];
  }

  get edges(): readonly GraphEdge[] {
    return this.edgeList;
  }

  get nodeCount(): number {
    return this.nodesById.size;
  }

  hasNode(id: string): boolean {
    return this.nodesById.has(id);
  }

  node(id: string): GraphNode | undefined {
    return this.nodesById.get(id);
  }

  /** Neighbour ids, sorted. */
  neighbors(id: string): readonly string[] {
    return this.adjacency.get(id) ?? [];
  }

  degree(id: string): number {
    return this.neighbors(id).length;
  }

  edgesBetween(a: string, b: string): readonly GraphEdge[] {
    return this.edgeList.filter(
      (edge) => (edge.from === a && edge.to === b) || (edge.from === b && edge.to === a),
    );
  }

  /** Edges incident to `id`. */
  edgesOf(id: string): readonly GraphEdge[] {
    return this.edgeList.filter((edge) => edge.from === id || edge.to === id);
  }

  /** Breadth-first hop counts from `source`, optionally cut off at `limit` hops. */
  distancesFrom(source: string, limit = Number.POSITIVE_INFINITY): ReadonlyMap<string, number> {
    const distances = new Map<string, number>();
    if (!this.hasNode(source)) {
      return distances;
    }

    distances.set(source, 0);
    let frontier = [source];
    for (let depth = 1; frontier.length > 0 && depth <= limit; depth++) {
      const next: string[] = [];
      for (const id of frontier) {
        for (const neighbor of this.neighbors(id)) {
          if (!distances.has(neighbor)) {
            distances.set(neighbor, depth);
            next.push(neighbor);
          }
        }
      }
      frontier = next;
    }
    return distances;
  }

  /** Hop distance between two nodes, or `undefined` when no path exists within `limit`. */
  distance(a: string, b: string, limit?: number): number | undefined {
    return this.distancesFrom(a, limit).get(b);
  }

  toSnapshot(): GraphSnapshot {
    const nodes = [...this.nodesById.values()].sort((x, y) => compareIds(x.id, y.id));
    return {
      nodes,
      edges: this.edgeList,
      nodeCount: nodes.length,
      edgeCount: this.edgeList.length,
    };
  }
}
