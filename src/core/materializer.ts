/**
 * Builds graph snapshots of a collection from the record store
 *
 * Snapshots can be cached per collection. The cache is only sound when
 * every write goes through the engine, which invalidates the collection
 * while still holding its write lock.
 */

import type { RecordStore } from '../storage/types.js';
import { ErrorHandler } from '../utils/error-handler.js';
import { MaterializedGraph } from './graph.js';
import type { GraphEdge, GraphNode } from './types.js';

export interface MaterializerOptions {
  /** Reuse snapshots until the collection is invalidated */
  cache: boolean;
}

export class GraphMaterializer {
  private cache: Map<string, MaterializedGraph> = new Map();
  private building: Map<string, Promise<MaterializedGraph>> = new Map();
  private generations: Map<string, number> = new Map();
  private builds = 0;

  constructor(
    private readonly store: RecordStore,
    private readonly options: MaterializerOptions = { cache: true }
  ) {}

  /**
   * Snapshot of the collection's current records; empty collections give an empty graph
   */
  async materialize(collection: string): Promise<MaterializedGraph> {
    if (this.options.cache) {
      const cached = this.cache.get(collection);
      if (cached) {
        return cached;
      }
      const pending = this.building.get(collection);
      if (pending) {
        return pending;
      }
    }

    const generation = this.generations.get(collection) ?? 0;
    const build = this.build(collection);

    if (!this.options.cache) {
      return build;
    }

    this.building.set(collection, build);
    try {
      const graph = await build;
      // A write that landed while building makes this snapshot stale
      if ((this.generations.get(collection) ?? 0) === generation) {
        this.cache.set(collection, graph);
      }
      return graph;
    } finally {
      if (this.building.get(collection) === build) {
        this.building.delete(collection);
      }
    }
  }

  /**
   * Drop any cached snapshot of the collection
   */
  invalidate(collection: string): void {
    this.generations.set(collection, (this.generations.get(collection) ?? 0) + 1);
    this.cache.delete(collection);
    this.building.delete(collection);
  }

  /**
   * Number of snapshots built from the store so far
   */
  get buildCount(): number {
    return this.builds;
  }

  isCached(collection: string): boolean {
    return this.cache.has(collection);
  }

  private async build(collection: string): Promise<MaterializedGraph> {
    this.builds++;
    const [nodes, edges] = await ErrorHandler.guardStore(`materialize ${collection}`, () =>
      Promise.all([
        this.store.list(collection, 'node'),
        this.store.list(collection, 'edge')
      ])
    );
    return new MaterializedGraph(collection, nodes.map(freezeRecord), edges.map(freezeRecord));
  }
}

/**
 * Snapshot records may be shared between readers, so they are made immutable
 */
function freezeRecord<T extends GraphNode | GraphEdge>(record: T): T {
  deepFreeze(record.properties);
  Object.freeze(record);
  return record;
}

function deepFreeze(value: object): void {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null) {
      deepFreeze(child);
    }
  }
  Object.freeze(value);
}
