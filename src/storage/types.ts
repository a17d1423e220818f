/**
 * Record store contract
 *
 * The engine persists flat node and edge records grouped by collection.
 * Any key-sorted record store can back it as long as it provides the
 * operations below; adjacency and uniqueness are enforced by the engine.
 */

import type { RecordKind, RecordMap } from '../core/types.js';

/**
 * Field filters understood by `list`. All supplied filters must match.
 */
export interface RecordFilter {
  /** Node type equality (nodes only) */
  type?: string;
  /** Relation type equality (edges only) */
  relationType?: string;
  /** Edge has this node id as source or target (edges only) */
  touches?: string;
  /**
   * Case-insensitive substring over the record's textual fields:
   * name, type and serialized properties for nodes; relation type and
   * serialized properties for edges
   */
  keyword?: string;
}

export interface ListOptions {
  filter?: RecordFilter;
  limit?: number;
  offset?: number;
}

/**
 * Storage configuration options
 */
export interface StorageConfig {
  /** Backend implementation */
  type: 'memory' | 'jsonl';
  /** Base directory for file-backed stores */
  directory: string;
  /** Rewrite each collection log to its live records when first loaded */
  compactOnLoad: boolean;
}

/**
 * Base record store interface
 */
export interface RecordStore {
  /**
   * Prepare the backend (create directories, open handles)
   */
  initialize(): Promise<void>;

  get<K extends RecordKind>(collection: string, kind: K, id: string): Promise<RecordMap[K] | undefined>;

  /**
   * List records ordered by id
   */
  list<K extends RecordKind>(collection: string, kind: K, options?: ListOptions): Promise<Array<RecordMap[K]>>;

  /**
   * Insert or replace a record keyed by its id
   */
  upsert<K extends RecordKind>(collection: string, kind: K, record: RecordMap[K]): Promise<void>;

  /**
   * Remove a record; resolves false when it was not present
   */
  delete(collection: string, kind: RecordKind, id: string): Promise<boolean>;

  /**
   * Names of collections holding at least one record
   */
  listCollections(): Promise<string[]>;

  /**
   * Release handles and cached state
   */
  close(): Promise<void>;
}

/**
 * Storage factory for creating store instances
 */
export interface StoreFactory {
  create(config: StorageConfig): Promise<RecordStore>;

  getAvailableTypes(): Array<StorageConfig['type']>;

  validateConfig(config: StorageConfig): { valid: boolean; errors: string[] };
}
