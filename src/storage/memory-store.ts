/**
 * In-process record store
 *
 * Keeps every collection in nested maps. Used by tests and by deployments
 * that do not need durability.
 */

import type { GraphEdge, GraphNode, RecordKind, RecordMap } from '../core/types.js';
import { selectRecords } from './filter.js';
import type { ListOptions, RecordStore } from './types.js';

type CollectionRecords = { [K in RecordKind]: Map<string, RecordMap[K]> };

export class InMemoryRecordStore implements RecordStore {
  private collections: Map<string, CollectionRecords> = new Map();

  async initialize(): Promise<void> {
    // nothing to prepare
  }

  async get<K extends RecordKind>(collection: string, kind: K, id: string): Promise<RecordMap[K] | undefined> {
    const record = this.collections.get(collection)?.[kind].get(id);
    return record ? cloneRecord(record) : undefined;
  }

  async list<K extends RecordKind>(collection: string, kind: K, options?: ListOptions): Promise<Array<RecordMap[K]>> {
    const records = this.collections.get(collection)?.[kind];
    if (!records) {
      return [];
    }
    return selectRecords(kind, records.values(), options).map(cloneRecord);
  }

  async upsert<K extends RecordKind>(collection: string, kind: K, record: RecordMap[K]): Promise<void> {
    this.ensureCollection(collection)[kind].set(record.id, cloneRecord(record));
  }

  async delete(collection: string, kind: RecordKind, id: string): Promise<boolean> {
    const records = this.collections.get(collection);
    if (!records) {
      return false;
    }
    const removed = records[kind].delete(id);
    if (records.node.size === 0 && records.edge.size === 0) {
      this.collections.delete(collection);
    }
    return removed;
  }

  async listCollections(): Promise<string[]> {
    return [...this.collections.keys()].sort();
  }

  async close(): Promise<void> {
    this.collections.clear();
  }

  private ensureCollection(collection: string): CollectionRecords {
    let records = this.collections.get(collection);
    if (!records) {
      records = { node: new Map<string, GraphNode>(), edge: new Map<string, GraphEdge>() };
      this.collections.set(collection, records);
    }
    return records;
  }
}

/**
 * Copy a record so callers never share mutable state with the store
 */
export function cloneRecord<T extends GraphNode | GraphEdge>(record: T): T {
  return {
    ...record,
    properties: structuredClone(record.properties),
    createdAt: new Date(record.createdAt.getTime()),
    updatedAt: new Date(record.updatedAt.getTime())
  };
}
