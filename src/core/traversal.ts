/**
 * Graph traversal algorithms over a materialized snapshot
 *
 * Breadth-first search drives both neighbor expansion and shortest path
 * discovery: the first time BFS reaches a node it does so with the fewest
 * hops. Candidate edges are visited in edge id order, which fixes the
 * tie-break among equal-length paths for a given snapshot.
 *
 * Time Complexity: O(V + E) for BFS
 *
 * References:
 * - Graph traversal optimization: https://memgraph.com/blog/graph-search-algorithms-developers-guide
 */

import { compareIds } from '../storage/filter.js';
import type { MaterializedGraph } from './graph.js';
import type { Direction, GraphEdge, GraphNode, GraphPath, NeighborEntry, NeighborhoodResult } from './types.js';

/**
 * Graph interface for traversal operations
 */
export interface GraphLike {
  readonly collection: string;
  getNode(nodeId: string): GraphNode | undefined;
  getOutgoingEdges(nodeId: string, relationTypes?: string[]): GraphEdge[];
  getIncomingEdges(nodeId: string, relationTypes?: string[]): GraphEdge[];
}

/**
 * Configuration for neighbor expansion
 */
export interface TraversalConfig {
  /** Maximum hops from the start node, at least 1 */
  maxDepth: number;
  /** Direction followed at every hop */
  direction: Direction;
  /** Relationship types to follow (empty = all types) */
  relationTypes?: string[];
  /** Stop once this many neighbors were found */
  maxNodes?: number;
}

/**
 * Configuration for path search
 */
export interface PathSearchConfig {
  /** Maximum hops, at least 1 */
  maxLength: number;
  /** Defaults to following edges from source to target */
  direction?: Direction;
  relationTypes?: string[];
}

interface Step {
  node: GraphNode;
  edge: GraphEdge;
}

/**
 * Traversal over one snapshot; callers resolve missing endpoints beforehand
 */
export class GraphTraversal {
  constructor(private readonly graph: GraphLike | MaterializedGraph) {}

  /**
   * Bounded breadth-first neighbor expansion
   *
   * A node appears once, at the depth where it was first discovered.
   * Returns undefined when the start node is absent.
   */
  expandNeighbors(startNodeId: string, config: TraversalConfig): NeighborhoodResult | undefined {
    const start = this.graph.getNode(startNodeId);
    if (!start) {
      return undefined;
    }

    const discovered = new Set<string>([startNodeId]);
    const followedEdges = new Map<string, GraphEdge>();
    const neighbors: NeighborEntry[] = [];
    let frontier: string[] = [startNodeId];
    const maxNodes = config.maxNodes ?? Infinity;

    for (let depth = 1; depth <= config.maxDepth && frontier.length > 0; depth++) {
      const nextFrontier: string[] = [];

      for (const nodeId of frontier) {
        for (const { node, edge } of this.stepsFrom(nodeId, config.direction, config.relationTypes)) {
          if (!followedEdges.has(edge.id)) {
            followedEdges.set(edge.id, edge);
          }
          if (discovered.has(node.id) || neighbors.length >= maxNodes) {
            continue;
          }
          discovered.add(node.id);
          neighbors.push({ node, depth, via: edge });
          nextFrontier.push(node.id);
        }
      }

      frontier = nextFrontier;
    }

    return {
      start,
      direction: config.direction,
      maxDepth: config.maxDepth,
      neighbors,
      edges: [...followedEdges.values()]
    };
  }

  /**
   * Shortest path by hop count within `maxLength` hops, or null when none exists
   */
  findShortestPath(sourceId: string, targetId: string, config: PathSearchConfig): GraphPath | null {
    const source = this.graph.getNode(sourceId);
    if (!source || !this.graph.getNode(targetId)) {
      return null;
    }
    if (sourceId === targetId) {
      return { nodes: [sourceId], edges: [], length: 0 };
    }

    const direction = config.direction ?? 'out';
    const parents = new Map<string, { previous: string; edge: GraphEdge }>();
    const visited = new Set<string>([sourceId]);
    let frontier: string[] = [sourceId];

    for (let depth = 1; depth <= config.maxLength && frontier.length > 0; depth++) {
      const nextFrontier: string[] = [];

      for (const nodeId of frontier) {
        for (const { node, edge } of this.stepsFrom(nodeId, direction, config.relationTypes)) {
          if (visited.has(node.id)) {
            continue;
          }
          visited.add(node.id);
          parents.set(node.id, { previous: nodeId, edge });

          if (node.id === targetId) {
            return this.buildPath(sourceId, targetId, parents);
          }
          nextFrontier.push(node.id);
        }
      }

      frontier = nextFrontier;
    }

    return null;
  }

  /**
   * Simple paths within `maxLength` hops, ordered by hop count then node sequence
   *
   * Paths are collected one hop count at a time and the search stops as soon
   * as `maxPaths` are found, so longer paths are never enumerated when
   * shorter ones fill the quota. Branches that cannot reach the target
   * within the current hop count are pruned using distances to the target.
   * Parallel edges between the same pair of nodes yield one path, through
   * the lowest edge id.
   */
  findAllPaths(sourceId: string, targetId: string, config: PathSearchConfig & { maxPaths: number }): GraphPath[] {
    if (!this.graph.getNode(sourceId) || !this.graph.getNode(targetId)) {
      return [];
    }
    if (sourceId === targetId) {
      return [{ nodes: [sourceId], edges: [], length: 0 }];
    }

    const direction = config.direction ?? 'out';
    const distances = this.distancesTo(targetId, direction, config.maxLength, config.relationTypes);
    const paths: GraphPath[] = [];

    const walk = (length: number, nodeId: string, nodes: string[], edges: GraphEdge[], onPath: Set<string>): void => {
      for (const { node, edge } of this.orderedSteps(nodeId, direction, config.relationTypes)) {
        if (paths.length >= config.maxPaths) {
          return;
        }
        const hops = edges.length + 1;
        const remaining = distances.get(node.id);
        if (onPath.has(node.id) || remaining === undefined || hops + remaining > length) {
          continue;
        }

        if (node.id === targetId) {
          if (hops === length) {
            paths.push({ nodes: [...nodes, node.id], edges: [...edges, edge], length });
          }
          continue;
        }

        onPath.add(node.id);
        walk(length, node.id, [...nodes, node.id], [...edges, edge], onPath);
        onPath.delete(node.id);
      }
    };

    const shortest = distances.get(sourceId);
    if (shortest === undefined) {
      return [];
    }
    for (let length = shortest; length <= config.maxLength && paths.length < config.maxPaths; length++) {
      walk(length, sourceId, [sourceId], [], new Set([sourceId]));
    }

    return paths;
  }

  /**
   * Hop distance from every node that reaches `targetId` within `limit` hops
   */
  private distancesTo(targetId: string, direction: Direction, limit: number, relationTypes?: string[]): Map<string, number> {
    const reverse: Direction = direction === 'out' ? 'in' : direction === 'in' ? 'out' : 'both';
    const distances = new Map<string, number>([[targetId, 0]]);
    let frontier = [targetId];

    for (let depth = 1; depth <= limit && frontier.length > 0; depth++) {
      const nextFrontier: string[] = [];
      for (const nodeId of frontier) {
        for (const { node } of this.stepsFrom(nodeId, reverse, relationTypes)) {
          if (!distances.has(node.id)) {
            distances.set(node.id, depth);
            nextFrontier.push(node.id);
          }
        }
      }
      frontier = nextFrontier;
    }

    return distances;
  }

  /**
   * One step per neighbor in node id order, through its lowest edge id
   */
  private orderedSteps(nodeId: string, direction: Direction, relationTypes?: string[]): Step[] {
    const steps = this.stepsFrom(nodeId, direction, relationTypes)
      .sort((a, b) => compareIds(a.node.id, b.node.id) || compareIds(a.edge.id, b.edge.id));
    return steps.filter((step, index) => step.node.id !== steps[index - 1]?.node.id);
  }

  /**
   * Neighbor candidates of a node, ordered by edge id across both directions
   */
  private stepsFrom(nodeId: string, direction: Direction, relationTypes?: string[]): Step[] {
    const steps: Step[] = [];

    if (direction === 'out' || direction === 'both') {
      for (const edge of this.graph.getOutgoingEdges(nodeId, relationTypes)) {
        const node = this.graph.getNode(edge.target);
        if (node) {
          steps.push({ node, edge });
        }
      }
    }

    if (direction === 'in' || direction === 'both') {
      for (const edge of this.graph.getIncomingEdges(nodeId, relationTypes)) {
        const node = this.graph.getNode(edge.source);
        // A self-loop was already listed as outgoing
        if (node && !(direction === 'both' && edge.source === edge.target)) {
          steps.push({ node, edge });
        }
      }
    }

    return direction === 'both'
      ? steps.sort((a, b) => compareIds(a.edge.id, b.edge.id))
      : steps;
  }

  private buildPath(
    sourceId: string,
    targetId: string,
    parents: Map<string, { previous: string; edge: GraphEdge }>
  ): GraphPath {
    const nodes: string[] = [targetId];
    const edges: GraphEdge[] = [];
    let current = targetId;

    while (current !== sourceId) {
      const parent = parents.get(current);
      if (!parent) {
        break;
      }
      edges.unshift(parent.edge);
      nodes.unshift(parent.previous);
      current = parent.previous;
    }

    return { nodes, edges, length: edges.length };
  }
}
