/**
 * Storage factory for creating and initializing record stores
 *
 * Provides a centralized way to create the supported backends with
 * configuration validation.
 */

import { ValidationError } from '../core/errors.js';
import { JSONLRecordStore } from './jsonl-store.js';
import { InMemoryRecordStore } from './memory-store.js';
import type { RecordStore, StorageConfig, StoreFactory } from './types.js';

/**
 * Default storage factory implementation
 */
export class DefaultStoreFactory implements StoreFactory {
  /**
   * Create and initialize a store based on configuration
   */
  async create(config: StorageConfig): Promise<RecordStore> {
    const validation = this.validateConfig(config);
    if (!validation.valid) {
      throw new ValidationError(
        'Invalid storage configuration',
        validation.errors.map(message => ({ path: 'storage', message }))
      );
    }

    const store = config.type === 'jsonl'
      ? new JSONLRecordStore(config)
      : new InMemoryRecordStore();

    await store.initialize();
    return store;
  }

  getAvailableTypes(): Array<StorageConfig['type']> {
    return ['memory', 'jsonl'];
  }

  /**
   * Validate storage configuration
   */
  validateConfig(config: StorageConfig): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (!this.getAvailableTypes().includes(config.type)) {
      errors.push(`Unknown storage type: ${String(config.type)}`);
    }

    if (config.type === 'jsonl' && (!config.directory || config.directory.trim().length === 0)) {
      errors.push('Directory is required');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }
}

/**
 * Create a default storage configuration
 */
export function createDefaultStorageConfig(directory: string = './data'): StorageConfig {
  return {
    type: 'jsonl',
    directory,
    compactOnLoad: true
  };
}

/**
 * Create and initialize a store from configuration
 */
export async function createRecordStore(config: StorageConfig): Promise<RecordStore> {
  const factory = new DefaultStoreFactory();
  return factory.create(config);
}
