/**
 * Core type definitions for the knowledge graph engine
 *
 * Nodes and edges are stored as flat records scoped to a named collection.
 * Adjacency is never persisted; it is rebuilt from these records by the
 * materializer whenever a collection is read.
 */

/**
 * Closed set of values a property bag may hold.
 * Numbers must be finite so that every record survives a JSON round trip.
 */
export type PropertyValue =
  | string
  | number
  | boolean
  | null
  | PropertyValue[]
  | { [key: string]: PropertyValue };

/** Ordered mapping of property names to values (insertion order is kept) */
export type Properties = Record<string, PropertyValue>;

/** Traversal direction relative to edge orientation */
export type Direction = 'in' | 'out' | 'both';

/** Record kinds held by a record store */
export type RecordKind = 'node' | 'edge';

/**
 * A typed entity in a collection
 */
export interface GraphNode {
  /** Unique within the collection */
  id: string;
  /** Owning collection */
  collection: string;
  /** Display label */
  name: string;
  /** Free-text category, null when uncategorised */
  type: string | null;
  properties: Properties;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * A typed, weighted, directed relationship between two nodes of the same collection
 */
export interface GraphEdge {
  /** Unique within the collection */
  id: string;
  collection: string;
  /** Source node id */
  source: string;
  /** Target node id */
  target: string;
  /** Free-text relation label, null when unlabelled */
  relationType: string | null;
  properties: Properties;
  /** Opaque strength signal, no enforced sign or range */
  weight: number;
  createdAt: Date;
  updatedAt: Date;
}

/** Maps a record kind to its record shape */
export interface RecordMap {
  node: GraphNode;
  edge: GraphEdge;
}

/**
 * Input for node creation
 */
export interface CreateNodeInput {
  /** Generated when omitted */
  id?: string;
  name: string;
  type?: string | null;
  properties?: Properties;
}

/**
 * Partial node update; omitted fields keep their stored value
 */
export interface UpdateNodeInput {
  name?: string;
  /** null clears the type */
  type?: string | null;
  properties?: Properties;
  /** Shallow-merge `properties` into the stored bag instead of replacing it */
  mergeProperties?: boolean;
}

/**
 * Input for edge creation
 */
export interface CreateEdgeInput {
  /** Derived from source, relation and target when omitted */
  id?: string;
  source: string;
  target: string;
  relationType?: string | null;
  properties?: Properties;
  /** Defaults to 1.0 */
  weight?: number;
}

/**
 * Partial edge update; omitted fields keep their stored value
 */
export interface UpdateEdgeInput {
  source?: string;
  target?: string;
  relationType?: string | null;
  properties?: Properties;
  weight?: number;
  mergeProperties?: boolean;
}

/**
 * A node reached during neighbor expansion
 */
export interface NeighborEntry {
  node: GraphNode;
  /** Hop count from the start node */
  depth: number;
  /** Edge through which the node was first discovered */
  via: GraphEdge;
}

/**
 * Result of a bounded neighbor expansion
 */
export interface NeighborhoodResult {
  start: GraphNode;
  direction: Direction;
  maxDepth: number;
  /** Reachable nodes in discovery order, start node excluded */
  neighbors: NeighborEntry[];
  /** Every distinct edge followed during the expansion, in discovery order */
  edges: GraphEdge[];
}

/**
 * A path between two nodes
 */
export interface GraphPath {
  /** Node ids from source to target */
  nodes: string[];
  /** Connecting edges; edges[i] joins nodes[i] and nodes[i + 1] */
  edges: GraphEdge[];
  /** Hop count */
  length: number;
}

/**
 * Aggregate statistics taken from one materialized snapshot
 */
export interface GraphStats {
  nodeCount: number;
  edgeCount: number;
  /** Node count per type; untyped nodes are counted under "" */
  nodeTypes: Record<string, number>;
  /** Edge count per relation; unlabelled edges are counted under "" */
  relationTypes: Record<string, number>;
  minDegree: number;
  maxDegree: number;
  averageDegree: number;
  /** edges / (n * (n - 1)) for a directed graph */
  density: number;
}

/**
 * Outcome of one item in a batch mutation
 */
export type BatchItemResult =
  | { index: number; success: true; id: string }
  | { index: number; success: false; id?: string; error: { kind: string; message: string } };

/**
 * Summary of a batch mutation
 */
export interface BatchResult {
  succeeded: number;
  failed: number;
  results: BatchItemResult[];
}

/**
 * Node entry of the export document
 */
export interface ExportedNode {
  node_id: string;
  name: string;
  type: string | null;
  properties: Properties;
  created_at: string;
  updated_at: string;
}

/**
 * Edge entry of the export document
 */
export interface ExportedEdge {
  edge_id: string;
  source_node_id: string;
  target_node_id: string;
  relation_type: string | null;
  properties: Properties;
  weight: number;
  created_at: string;
  updated_at: string;
}

/**
 * Self-describing interchange document for a whole collection.
 * New fields may be added as optional; existing ones are never renamed.
 */
export interface ExportDocument {
  format: 'knowledge-graph';
  version: 1;
  collection: string;
  exported_at: string;
  nodes: ExportedNode[];
  edges: ExportedEdge[];
}

/**
 * Counts reported by an import
 */
export interface ImportResult {
  collection: string;
  cleared: boolean;
  nodesCreated: number;
  nodesUpdated: number;
  nodesUnchanged: number;
  edgesCreated: number;
  edgesUpdated: number;
  edgesUnchanged: number;
}

/**
 * Counts reported by a collection clear
 */
export interface ClearResult {
  collection: string;
  nodesRemoved: number;
  edgesRemoved: number;
}

/**
 * Result of the search-then-format pipeline consumed by text generation callers
 */
export interface QueryContextResult {
  query: string;
  nodes: GraphNode[];
  edges: GraphEdge[];
  context: string;
}
