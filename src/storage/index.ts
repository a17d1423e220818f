/**
 * Storage module for the knowledge graph engine
 *
 * Record stores hold flat node and edge records per collection; the
 * engine rebuilds adjacency from them on read.
 */

export type {
  RecordStore,
  RecordFilter,
  ListOptions,
  StorageConfig,
  StoreFactory
} from './types.js';

export { InMemoryRecordStore } from './memory-store.js';
export { JSONLRecordStore } from './jsonl-store.js';
export {
  DefaultStoreFactory,
  createDefaultStorageConfig,
  createRecordStore
} from './factory.js';
