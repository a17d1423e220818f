/**
 * Knowledge graph service
 *
 * The collection-scoped operation surface of the engine. One instance owns
 * a record store handle, the per-collection locks and the graph cache;
 * nothing is shared between instances.
 *
 * Reads run under the collection's read lock against a single materialized
 * snapshot. Writes go through the MutationManager, which holds the write
 * lock and invalidates the snapshot before releasing it.
 */

import { createDefaultEngineConfig, type EngineConfig } from '../config.js';
import { CollectionLocks } from '../core/collection-lock.js';
import { NotFoundError } from '../core/errors.js';
import type { MaterializedGraph } from '../core/graph.js';
import { GraphMaterializer } from '../core/materializer.js';
import { GraphTraversal } from '../core/traversal.js';
import type {
  BatchResult,
  ClearResult,
  CreateEdgeInput,
  CreateNodeInput,
  Direction,
  ExportDocument,
  GraphEdge,
  GraphNode,
  GraphPath,
  GraphStats,
  ImportResult,
  NeighborhoodResult,
  QueryContextResult,
  UpdateEdgeInput,
  UpdateNodeInput
} from '../core/types.js';
import { formatContext } from '../context/context-formatter.js';
import { MutationManager } from '../mutation/mutation-manager.js';
import { searchEdges, searchNodes } from '../search/keyword-search.js';
import { createRecordStore } from '../storage/factory.js';
import type { RecordFilter, RecordStore } from '../storage/types.js';
import { buildExportDocument, CollectionImporter } from '../transfer/import-export.js';
import { ErrorHandler } from '../utils/error-handler.js';
import {
  directionSchema,
  keywordSchema,
  parseOrThrow,
  validateCollectionName,
  validateLimit,
  validateRecordId
} from '../utils/validation.js';

export interface NeighborOptions {
  /** Defaults to 'out' */
  direction?: Direction;
  /** Defaults to 1 */
  maxDepth?: number;
  /** Only follow edges with one of these relation types */
  relationTypes?: string[];
}

export interface PathOptions {
  /** Defaults to the configured maxPathLength */
  maxLength?: number;
  /** Defaults to 'out' */
  direction?: Direction;
  relationTypes?: string[];
}

export interface AllPathsOptions extends PathOptions {
  /** Defaults to the configured maxPaths */
  maxPaths?: number;
}

export interface ListNodesOptions {
  type?: string;
  limit?: number;
  offset?: number;
}

export interface ListEdgesOptions {
  /** Edges having this node as source or target */
  nodeId?: string;
  relationType?: string;
  limit?: number;
  offset?: number;
}

export interface QueryContextOptions {
  topK?: number;
  maxChars?: number;
  edgesPerNode?: number;
}

export interface IntegrityReport {
  collection: string;
  valid: boolean;
  /** Edges whose source or target node is missing */
  danglingEdges: string[];
}

const DEFAULT_SEARCH_LIMIT = 10;

export class KnowledgeGraphService {
  private readonly locks = new CollectionLocks();
  private readonly materializer: GraphMaterializer;
  private readonly mutations: MutationManager;
  private readonly importer: CollectionImporter;

  constructor(
    private readonly store: RecordStore,
    private readonly config: EngineConfig = createDefaultEngineConfig()
  ) {
    this.materializer = new GraphMaterializer(store, { cache: config.cacheGraphs });
    this.mutations = new MutationManager(store, this.locks, this.materializer);
    this.importer = new CollectionImporter(store, this.mutations);
  }

  /**
   * Create a service over the record store described by `config.storage`
   */
  static async create(config: EngineConfig = createDefaultEngineConfig()): Promise<KnowledgeGraphService> {
    const store = await createRecordStore(config.storage);
    console.log(`🧠 Knowledge graph service ready (${config.storage.type} storage)`);
    return new KnowledgeGraphService(store, config);
  }

  get engineConfig(): EngineConfig {
    return this.config;
  }

  // Mutations

  async createNode(collection: string, input: CreateNodeInput): Promise<GraphNode> {
    return this.mutations.createNode(validateCollectionName(collection), input);
  }

  async updateNode(collection: string, nodeId: string, patch: UpdateNodeInput): Promise<GraphNode> {
    return this.mutations.updateNode(validateCollectionName(collection), nodeId, patch);
  }

  /**
   * Delete a node together with every edge touching it
   */
  async deleteNode(collection: string, nodeId: string): Promise<{ node: GraphNode; removedEdges: string[] }> {
    return this.mutations.deleteNode(validateCollectionName(collection), nodeId);
  }

  async createEdge(collection: string, input: CreateEdgeInput): Promise<GraphEdge> {
    return this.mutations.createEdge(validateCollectionName(collection), input);
  }

  async updateEdge(collection: string, edgeId: string, patch: UpdateEdgeInput): Promise<GraphEdge> {
    return this.mutations.updateEdge(validateCollectionName(collection), edgeId, patch);
  }

  async deleteEdge(collection: string, edgeId: string): Promise<GraphEdge> {
    return this.mutations.deleteEdge(validateCollectionName(collection), edgeId);
  }

  async batchCreateNodes(collection: string, inputs: CreateNodeInput[]): Promise<BatchResult> {
    return this.mutations.batchCreateNodes(validateCollectionName(collection), inputs);
  }

  async batchCreateEdges(collection: string, inputs: CreateEdgeInput[]): Promise<BatchResult> {
    return this.mutations.batchCreateEdges(validateCollectionName(collection), inputs);
  }

  async clear(collection: string): Promise<ClearResult> {
    return this.mutations.clear(validateCollectionName(collection));
  }

  // Reads

  async getNode(collection: string, nodeId: string): Promise<GraphNode> {
    const id = validateRecordId(nodeId, 'node id');
    return this.read(collection, graph => {
      const node = graph.getNode(id);
      if (!node) {
        throw new NotFoundError(graph.collection, 'node', id);
      }
      return node;
    });
  }

  async getEdge(collection: string, edgeId: string): Promise<GraphEdge> {
    const id = validateRecordId(edgeId, 'edge id');
    return this.read(collection, graph => {
      const edge = graph.getEdge(id);
      if (!edge) {
        throw new NotFoundError(graph.collection, 'edge', id);
      }
      return edge;
    });
  }

  /**
   * Nodes ordered by id, optionally restricted to one type
   */
  async listNodes(collection: string, options: ListNodesOptions = {}): Promise<GraphNode[]> {
    const name = validateCollectionName(collection);
    const filter: RecordFilter = options.type !== undefined ? { type: options.type } : {};
    const page = this.pageOf(options);

    return this.locks.read(name, () =>
      ErrorHandler.guardStore('list nodes', () => this.store.list(name, 'node', { filter, ...page }))
    );
  }

  /**
   * Edges ordered by id, optionally restricted to one node or relation type
   */
  async listEdges(collection: string, options: ListEdgesOptions = {}): Promise<GraphEdge[]> {
    const name = validateCollectionName(collection);
    const filter: RecordFilter = {};
    if (options.nodeId !== undefined) filter.touches = validateRecordId(options.nodeId, 'node id');
    if (options.relationType !== undefined) filter.relationType = options.relationType;
    const page = this.pageOf(options);

    return this.locks.read(name, () =>
      ErrorHandler.guardStore('list edges', () => this.store.list(name, 'edge', { filter, ...page }))
    );
  }

  async listCollections(): Promise<string[]> {
    return ErrorHandler.guardStore('list collections', () => this.store.listCollections());
  }

  /**
   * Breadth-first expansion from a node; each reachable node appears once,
   * at the hop count where it was first discovered
   */
  async neighbors(collection: string, nodeId: string, options: NeighborOptions = {}): Promise<NeighborhoodResult> {
    const id = validateRecordId(nodeId, 'node id');
    const direction = parseOrThrow(directionSchema, options.direction ?? 'out', 'direction');
    const maxDepth = validateLimit(options.maxDepth ?? 1, 'maxDepth', this.config.limits.maxDepth);

    return this.read(collection, graph => {
      const result = new GraphTraversal(graph).expandNeighbors(id, {
        direction,
        maxDepth,
        relationTypes: options.relationTypes
      });
      if (!result) {
        throw new NotFoundError(graph.collection, 'node', id);
      }
      return result;
    });
  }

  /**
   * A shortest path within `maxLength` hops, or null when the endpoints are not connected within it
   */
  async findPath(collection: string, sourceId: string, targetId: string, options: PathOptions = {}): Promise<GraphPath | null> {
    const { source, target, direction, maxLength } = this.pathArguments(sourceId, targetId, options);

    return this.read(collection, graph => {
      this.assertEndpointsExist(graph, source, target);
      return new GraphTraversal(graph).findShortestPath(source, target, {
        maxLength,
        direction,
        relationTypes: options.relationTypes
      });
    });
  }

  /**
   * Simple paths within `maxLength` hops, shortest first
   */
  async findAllPaths(collection: string, sourceId: string, targetId: string, options: AllPathsOptions = {}): Promise<GraphPath[]> {
    const { source, target, direction, maxLength } = this.pathArguments(sourceId, targetId, options);
    const maxPaths = validateLimit(options.maxPaths ?? this.config.limits.maxPaths, 'maxPaths', this.config.limits.maxSearchResults);

    return this.read(collection, graph => {
      this.assertEndpointsExist(graph, source, target);
      return new GraphTraversal(graph).findAllPaths(source, target, {
        maxLength,
        direction,
        relationTypes: options.relationTypes,
        maxPaths
      });
    });
  }

  /**
   * Counts and degree summary taken from one snapshot
   */
  async stats(collection: string): Promise<GraphStats> {
    return this.read(collection, graph => graph.getStats());
  }

  /**
   * Report edges whose endpoints are missing from the collection
   */
  async checkIntegrity(collection: string): Promise<IntegrityReport> {
    return this.read(collection, graph => {
      const danglingEdges = graph.getDanglingEdges();
      if (danglingEdges.length > 0) {
        console.warn(`⚠️ ${danglingEdges.length} dangling edges in ${graph.collection}`);
      }
      return { collection: graph.collection, valid: danglingEdges.length === 0, danglingEdges };
    });
  }

  // Search

  /**
   * Nodes matching a keyword, best match first
   */
  async searchNodes(collection: string, keyword: string, limit: number = DEFAULT_SEARCH_LIMIT): Promise<GraphNode[]> {
    const needle = parseOrThrow(keywordSchema, keyword, 'keyword');
    const max = validateLimit(limit, 'limit', this.config.limits.maxSearchResults);

    return this.read(collection, graph =>
      searchNodes(graph.getAllNodes(), needle, max).map(match => match.record)
    );
  }

  /**
   * Edges matching a keyword on relation type or properties, best match first
   */
  async searchEdges(collection: string, keyword: string, limit: number = DEFAULT_SEARCH_LIMIT): Promise<GraphEdge[]> {
    const needle = parseOrThrow(keywordSchema, keyword, 'keyword');
    const max = validateLimit(limit, 'limit', this.config.limits.maxSearchResults);

    return this.read(collection, graph =>
      searchEdges(graph.getAllEdges(), needle, max).map(match => match.record)
    );
  }

  /**
   * Search, gather the connecting edges and render them as prompt context
   */
  async queryContext(collection: string, query: string, options: QueryContextOptions = {}): Promise<QueryContextResult> {
    const needle = parseOrThrow(keywordSchema, query, 'query');
    const topK = validateLimit(options.topK ?? this.config.context.topK, 'topK', this.config.limits.maxSearchResults);
    const maxChars = validateLimit(options.maxChars ?? this.config.context.maxChars, 'maxChars');
    const edgesPerNode = validateLimit(options.edgesPerNode ?? this.config.context.edgesPerNode, 'edgesPerNode');

    return this.read(collection, graph => {
      const nodes = searchNodes(graph.getAllNodes(), needle, topK).map(match => match.record);

      const edges = new Map<string, GraphEdge>();
      for (const node of nodes) {
        for (const edge of graph.getTouchingEdges(node.id).slice(0, edgesPerNode)) {
          edges.set(edge.id, edge);
        }
      }

      const connecting = [...edges.values()];
      const context = formatContext(nodes, connecting, maxChars, id => graph.getNode(id)?.name);
      return { query: needle, nodes, edges: connecting, context };
    });
  }

  // Transfer

  async exportCollection(collection: string): Promise<ExportDocument> {
    return this.read(collection, graph => {
      const document = buildExportDocument(graph.collection, graph.getAllNodes(), graph.getAllEdges());
      console.log(`📤 Exported ${graph.collection}: ${graph.nodeCount} nodes, ${graph.edgeCount} edges`);
      return document;
    });
  }

  /**
   * Import an export document. Without `clearExisting` records are merged by id.
   */
  async importCollection(
    collection: string,
    document: unknown,
    options: { clearExisting?: boolean } = {}
  ): Promise<ImportResult> {
    return this.importer.importCollection(validateCollectionName(collection), document, {
      clearExisting: options.clearExisting ?? false
    });
  }

  async close(): Promise<void> {
    await this.store.close();
    console.log('🔒 Knowledge graph service closed');
  }

  private async read<T>(collection: string, fn: (graph: MaterializedGraph) => T): Promise<T> {
    const name = validateCollectionName(collection);
    return this.locks.read(name, async () => fn(await this.materializer.materialize(name)));
  }

  private pageOf(options: { limit?: number; offset?: number }): { limit?: number; offset?: number } {
    return {
      limit: options.limit !== undefined
        ? validateLimit(options.limit, 'limit', this.config.limits.maxSearchResults)
        : undefined,
      offset: options.offset !== undefined && options.offset !== 0
        ? validateLimit(options.offset, 'offset')
        : undefined
    };
  }

  private pathArguments(
    sourceId: string,
    targetId: string,
    options: PathOptions
  ): { source: string; target: string; direction: Direction; maxLength: number } {
    return {
      source: validateRecordId(sourceId, 'source id'),
      target: validateRecordId(targetId, 'target id'),
      direction: parseOrThrow(directionSchema, options.direction ?? 'out', 'direction'),
      maxLength: validateLimit(
        options.maxLength ?? this.config.limits.maxPathLength,
        'maxLength',
        this.config.limits.maxPathLength
      )
    };
  }

  private assertEndpointsExist(graph: MaterializedGraph, source: string, target: string): void {
    for (const id of [source, target]) {
      if (!graph.hasNode(id)) {
        throw new NotFoundError(graph.collection, 'node', id);
      }
    }
  }
}
