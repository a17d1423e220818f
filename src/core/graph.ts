/**
 * In-memory directed multigraph built from flat node and edge records
 *
 * Uses adjacency lists for O(n + m) memory and keeps both forward and
 * reverse lists for bidirectional traversal. Adjacency lists are ordered
 * by edge id so every traversal over a given snapshot is deterministic.
 *
 * References:
 * - Memory optimization: https://codevisionz.com/lessons/adjacency-matrix-vs-adjacency-list/
 */

import { compareIds } from '../storage/filter.js';
import type { GraphEdge, GraphNode, GraphStats } from './types.js';

/**
 * Immutable snapshot of one collection
 */
export class MaterializedGraph {
  private nodes: Map<string, GraphNode> = new Map();
  private edges: Map<string, GraphEdge> = new Map();
  private adjacencyList: Map<string, GraphEdge[]> = new Map();
  private reverseAdjacencyList: Map<string, GraphEdge[]> = new Map();
  private nodesByType: Map<string, string[]> = new Map();
  private danglingEdges: string[] = [];

  constructor(
    readonly collection: string,
    nodes: Iterable<GraphNode>,
    edges: Iterable<GraphEdge>
  ) {
    for (const node of [...nodes].sort((a, b) => compareIds(a.id, b.id))) {
      this.nodes.set(node.id, node);
      this.adjacencyList.set(node.id, []);
      this.reverseAdjacencyList.set(node.id, []);

      const typeKey = node.type ?? '';
      const typed = this.nodesByType.get(typeKey) ?? [];
      typed.push(node.id);
      this.nodesByType.set(typeKey, typed);
    }

    for (const edge of [...edges].sort((a, b) => compareIds(a.id, b.id))) {
      this.edges.set(edge.id, edge);

      const outgoing = this.adjacencyList.get(edge.source);
      const incoming = this.reverseAdjacencyList.get(edge.target);
      if (!outgoing || !incoming) {
        // Endpoints missing from the store; kept out of adjacency
        this.danglingEdges.push(edge.id);
        continue;
      }
      outgoing.push(edge);
      incoming.push(edge);
    }
  }

  getNode(nodeId: string): GraphNode | undefined {
    return this.nodes.get(nodeId);
  }

  getEdge(edgeId: string): GraphEdge | undefined {
    return this.edges.get(edgeId);
  }

  hasNode(nodeId: string): boolean {
    return this.nodes.has(nodeId);
  }

  /**
   * Outgoing edges ordered by edge id, optionally filtered by relation type
   */
  getOutgoingEdges(nodeId: string, relationTypes?: string[]): GraphEdge[] {
    return filterByRelation(this.adjacencyList.get(nodeId) ?? [], relationTypes);
  }

  /**
   * Incoming edges ordered by edge id, optionally filtered by relation type
   */
  getIncomingEdges(nodeId: string, relationTypes?: string[]): GraphEdge[] {
    return filterByRelation(this.reverseAdjacencyList.get(nodeId) ?? [], relationTypes);
  }

  /**
   * Every edge touching a node, ordered by edge id; self-loops appear once
   */
  getTouchingEdges(nodeId: string): GraphEdge[] {
    const touching = new Map<string, GraphEdge>();
    for (const edge of this.getOutgoingEdges(nodeId)) touching.set(edge.id, edge);
    for (const edge of this.getIncomingEdges(nodeId)) touching.set(edge.id, edge);
    return [...touching.values()].sort((a, b) => compareIds(a.id, b.id));
  }

  getNodesByType(type: string | null): GraphNode[] {
    const ids = this.nodesByType.get(type ?? '') ?? [];
    return ids.flatMap(id => {
      const node = this.nodes.get(id);
      return node ? [node] : [];
    });
  }

  /**
   * Nodes ordered by id
   */
  getAllNodes(): GraphNode[] {
    return [...this.nodes.values()];
  }

  /**
   * Edges ordered by id, dangling ones included
   */
  getAllEdges(): GraphEdge[] {
    return [...this.edges.values()];
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  get edgeCount(): number {
    return this.edges.size;
  }

  /**
   * In-degree plus out-degree
   */
  degree(nodeId: string): number {
    return (this.adjacencyList.get(nodeId)?.length ?? 0) + (this.reverseAdjacencyList.get(nodeId)?.length ?? 0);
  }

  /**
   * Edge ids whose source or target is not a node of this snapshot
   */
  getDanglingEdges(): string[] {
    return [...this.danglingEdges];
  }

  /**
   * Counts, type histograms and degree summary of this snapshot
   */
  getStats(): GraphStats {
    const nodeTypes: Record<string, number> = {};
    for (const [type, ids] of [...this.nodesByType.entries()].sort(([a], [b]) => compareIds(a, b))) {
      nodeTypes[type] = ids.length;
    }

    const relationTypes: Record<string, number> = {};
    for (const edge of this.edges.values()) {
      const key = edge.relationType ?? '';
      relationTypes[key] = (relationTypes[key] ?? 0) + 1;
    }

    const degrees = [...this.nodes.keys()].map(id => this.degree(id));
    const nodeCount = this.nodes.size;
    const edgeCount = this.edges.size;

    return {
      nodeCount,
      edgeCount,
      nodeTypes,
      relationTypes: sortKeys(relationTypes),
      minDegree: degrees.length > 0 ? degrees.reduce((min, d) => Math.min(min, d), Infinity) : 0,
      maxDegree: degrees.reduce((max, d) => Math.max(max, d), 0),
      averageDegree: nodeCount > 0 ? degrees.reduce((sum, d) => sum + d, 0) / nodeCount : 0,
      density: nodeCount > 1 ? edgeCount / (nodeCount * (nodeCount - 1)) : 0
    };
  }
}

function filterByRelation(edges: GraphEdge[], relationTypes?: string[]): GraphEdge[] {
  if (!relationTypes || relationTypes.length === 0) {
    return [...edges];
  }
  return edges.filter(edge => edge.relationType !== null && relationTypes.includes(edge.relationType));
}

function sortKeys(counts: Record<string, number>): Record<string, number> {
  return Object.fromEntries(Object.entries(counts).sort(([a], [b]) => compareIds(a, b)));
}
