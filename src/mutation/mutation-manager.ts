/**
 * Collection-scoped writes
 *
 * Every mutation holds the collection's write lock for its whole duration
 * and invalidates the materialized view before releasing it, so readers
 * see either the state before a mutation or the state after it.
 * Cascading node deletion removes the touching edges first, then the node.
 */

import type { CollectionLocks } from '../core/collection-lock.js';
import { DuplicateIdError, EndpointNotFoundError, NotFoundError } from '../core/errors.js';
import type { GraphMaterializer } from '../core/materializer.js';
import type {
  BatchItemResult,
  BatchResult,
  ClearResult,
  CreateEdgeInput,
  CreateNodeInput,
  GraphEdge,
  GraphNode,
  UpdateEdgeInput,
  UpdateNodeInput
} from '../core/types.js';
import type { RecordStore } from '../storage/types.js';
import { ErrorCategory, ErrorHandler, type OperationResult } from '../utils/error-handler.js';
import {
  createEdgeSchema,
  createNodeSchema,
  parseOrThrow,
  updateEdgeSchema,
  updateNodeSchema,
  validateRecordId
} from '../utils/validation.js';
import { applyEdgePatch, applyNodePatch, buildEdgeRecord, buildNodeRecord } from './records.js';

export class MutationManager {
  constructor(
    private readonly store: RecordStore,
    private readonly locks: CollectionLocks,
    private readonly materializer: GraphMaterializer
  ) {}

  /**
   * Run `fn` with exclusive access to the collection, invalidating its
   * materialized view afterwards whether or not `fn` succeeded
   */
  async exclusive<T>(collection: string, fn: () => Promise<T>): Promise<T> {
    return this.locks.write(collection, async () => {
      try {
        return await fn();
      } finally {
        this.materializer.invalidate(collection);
      }
    });
  }

  async createNode(collection: string, input: CreateNodeInput): Promise<GraphNode> {
    return this.exclusive(collection, () => this.insertNode(collection, input));
  }

  /**
   * Replace the supplied fields of a node
   */
  async updateNode(collection: string, nodeId: string, patch: UpdateNodeInput): Promise<GraphNode> {
    const id = validateRecordId(nodeId, 'node id');
    const changes = parseOrThrow(updateNodeSchema, patch, 'node update');

    return this.exclusive(collection, async () => {
      const existing = await this.fetch(collection, 'node', id);
      const updated = applyNodePatch(existing, changes);
      await ErrorHandler.guardStore('update node', () => this.store.upsert(collection, 'node', updated));

      console.log(`✏️ Updated node ${id} in ${collection}`);
      return updated;
    });
  }

  /**
   * Delete a node and every edge touching it
   */
  async deleteNode(collection: string, nodeId: string): Promise<{ node: GraphNode; removedEdges: string[] }> {
    const id = validateRecordId(nodeId, 'node id');

    return this.exclusive(collection, async () => {
      const node = await this.fetch(collection, 'node', id);
      const touching = await ErrorHandler.guardStore('list touching edges', () =>
        this.store.list(collection, 'edge', { filter: { touches: id } })
      );

      for (const edge of touching) {
        await ErrorHandler.guardStore('delete edge', () => this.store.delete(collection, 'edge', edge.id));
      }
      await ErrorHandler.guardStore('delete node', () => this.store.delete(collection, 'node', id));

      console.log(`🗑️ Deleted node ${id} from ${collection} (${touching.length} edges removed)`);
      return { node, removedEdges: touching.map(edge => edge.id) };
    });
  }

  async createEdge(collection: string, input: CreateEdgeInput): Promise<GraphEdge> {
    return this.exclusive(collection, () => this.insertEdge(collection, input));
  }

  /**
   * Replace the supplied fields of an edge; new endpoints must exist
   */
  async updateEdge(collection: string, edgeId: string, patch: UpdateEdgeInput): Promise<GraphEdge> {
    const id = validateRecordId(edgeId, 'edge id');
    const changes = parseOrThrow(updateEdgeSchema, patch, 'edge update');

    return this.exclusive(collection, async () => {
      const existing = await this.fetch(collection, 'edge', id);
      const updated = applyEdgePatch(existing, changes);

      if (updated.source !== existing.source || updated.target !== existing.target) {
        await this.assertEndpoints(collection, updated);
      }
      await ErrorHandler.guardStore('update edge', () => this.store.upsert(collection, 'edge', updated));

      console.log(`✏️ Updated edge ${id} in ${collection}`);
      return updated;
    });
  }

  async deleteEdge(collection: string, edgeId: string): Promise<GraphEdge> {
    const id = validateRecordId(edgeId, 'edge id');

    return this.exclusive(collection, async () => {
      const edge = await this.fetch(collection, 'edge', id);
      await ErrorHandler.guardStore('delete edge', () => this.store.delete(collection, 'edge', id));

      console.log(`🗑️ Deleted edge ${id} from ${collection}`);
      return edge;
    });
  }

  /**
   * Create nodes one by one; a failing item never aborts the others
   */
  async batchCreateNodes(collection: string, inputs: CreateNodeInput[]): Promise<BatchResult> {
    return this.exclusive(collection, () =>
      this.runBatch(collection, inputs, input => this.insertNode(collection, input))
    );
  }

  /**
   * Create edges one by one; edges may reference nodes created earlier in the same call
   */
  async batchCreateEdges(collection: string, inputs: CreateEdgeInput[]): Promise<BatchResult> {
    return this.exclusive(collection, () =>
      this.runBatch(collection, inputs, input => this.insertEdge(collection, input))
    );
  }

  /**
   * Remove every node and edge of the collection; clearing an empty collection succeeds
   */
  async clear(collection: string): Promise<ClearResult> {
    return this.exclusive(collection, () => this.clearUnlocked(collection));
  }

  /**
   * Clear without taking the lock; callers must already hold it
   */
  async clearUnlocked(collection: string): Promise<ClearResult> {
    const edges = await ErrorHandler.guardStore('list edges', () => this.store.list(collection, 'edge'));
    for (const edge of edges) {
      await ErrorHandler.guardStore('delete edge', () => this.store.delete(collection, 'edge', edge.id));
    }

    const nodes = await ErrorHandler.guardStore('list nodes', () => this.store.list(collection, 'node'));
    for (const node of nodes) {
      await ErrorHandler.guardStore('delete node', () => this.store.delete(collection, 'node', node.id));
    }

    console.log(`🧹 Cleared ${collection}: ${nodes.length} nodes, ${edges.length} edges`);
    return { collection, nodesRemoved: nodes.length, edgesRemoved: edges.length };
  }

  private async insertNode(collection: string, input: CreateNodeInput): Promise<GraphNode> {
    const draft = parseOrThrow(createNodeSchema, input, 'node');
    const node = buildNodeRecord(collection, draft);

    if (await this.exists(collection, 'node', node.id)) {
      throw new DuplicateIdError(collection, 'node', node.id);
    }
    await ErrorHandler.guardStore('create node', () => this.store.upsert(collection, 'node', node));

    console.log(`✨ Created node ${node.id} in ${collection}`);
    return node;
  }

  private async insertEdge(collection: string, input: CreateEdgeInput): Promise<GraphEdge> {
    const draft = parseOrThrow(createEdgeSchema, input, 'edge');
    const edge = buildEdgeRecord(collection, draft);

    if (await this.exists(collection, 'edge', edge.id)) {
      throw new DuplicateIdError(collection, 'edge', edge.id);
    }
    await this.assertEndpoints(collection, edge);
    await ErrorHandler.guardStore('create edge', () => this.store.upsert(collection, 'edge', edge));

    console.log(`🔗 Created edge ${edge.id} (${edge.source} -> ${edge.target}) in ${collection}`);
    return edge;
  }

  private async runBatch<T extends { id?: string }>(
    collection: string,
    inputs: T[],
    create: (input: T) => Promise<{ id: string }>
  ): Promise<BatchResult> {
    const results: BatchItemResult[] = [];

    for (const [index, input] of inputs.entries()) {
      const outcome: OperationResult<{ id: string }> = await ErrorHandler.wrapOperation(
        () => create(input),
        ErrorCategory.MUTATION,
        { collection, index }
      );

      if (outcome.success) {
        results.push({ index, success: true, id: outcome.data.id });
      } else {
        results.push({
          index,
          success: false,
          ...itemId(input),
          error: { kind: outcome.error.kind ?? 'internal', message: outcome.error.message }
        });
      }
    }

    const succeeded = results.filter(result => result.success).length;
    console.log(`📦 Batch in ${collection}: ${succeeded} succeeded, ${results.length - succeeded} failed`);
    return { succeeded, failed: results.length - succeeded, results };
  }

  private async assertEndpoints(collection: string, edge: GraphEdge): Promise<void> {
    const missing: string[] = [];
    for (const nodeId of new Set([edge.source, edge.target])) {
      if (!(await this.exists(collection, 'node', nodeId))) {
        missing.push(nodeId);
      }
    }
    if (missing.length > 0) {
      throw new EndpointNotFoundError(collection, [{ edgeId: edge.id, missing }]);
    }
  }

  private async exists(collection: string, kind: 'node' | 'edge', id: string): Promise<boolean> {
    const record = await ErrorHandler.guardStore(`get ${kind}`, () => this.store.get(collection, kind, id));
    return record !== undefined;
  }

  private async fetch(collection: string, kind: 'node', id: string): Promise<GraphNode>;
  private async fetch(collection: string, kind: 'edge', id: string): Promise<GraphEdge>;
  private async fetch(collection: string, kind: 'node' | 'edge', id: string): Promise<GraphNode | GraphEdge> {
    const record = await ErrorHandler.guardStore(`get ${kind}`, () => this.store.get(collection, kind, id));
    if (!record) {
      throw new NotFoundError(collection, kind, id);
    }
    return record;
  }
}

/**
 * Caller-supplied id of a batch item, read without trusting its shape
 */
function itemId(input: unknown): { id?: string } {
  if (typeof input === 'object' && input !== null && 'id' in input && typeof input.id === 'string') {
    return { id: input.id };
  }
  return {};
}
