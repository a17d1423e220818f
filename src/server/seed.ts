/**
 * Data seeding utilities for the knowledge graph server
 * Loads an export document at start-up and merges it into a collection
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import type { ImportResult } from '../core/types.js';
import type { KnowledgeGraphService } from '../service/knowledge-graph-service.js';
import { ErrorCategory, ErrorHandler } from '../utils/error-handler.js';

export interface SeedResult {
  success: boolean;
  /** False when the file does not exist */
  seeded: boolean;
  result?: ImportResult;
  errors: string[];
}

/**
 * Import the export document at `filePath` into `collection`
 * @param options.clearExisting - Replace the collection instead of merging
 */
export async function seedCollectionFromFile(
  service: KnowledgeGraphService,
  filePath: string,
  collection: string,
  options: { clearExisting?: boolean; verbose?: boolean } = {}
): Promise<SeedResult> {
  const { clearExisting = false, verbose = true } = options;

  if (!existsSync(filePath)) {
    if (verbose) {
      console.log(`⚠️  Seed file not found: ${filePath}`);
    }
    return { success: true, seeded: false, errors: [] };
  }

  try {
    if (verbose) {
      console.log(`📖 Reading seed document from ${filePath}`);
    }
    const document: unknown = JSON.parse(await readFile(filePath, 'utf-8'));
    const result = await service.importCollection(collection, document, { clearExisting });

    if (verbose) {
      console.log(
        `🌱 Seeded ${collection}: ${result.nodesCreated} nodes and ${result.edgesCreated} edges created, ` +
        `${result.nodesUpdated + result.edgesUpdated} updated, ${result.nodesUnchanged + result.edgesUnchanged} unchanged`
      );
    }
    return { success: true, seeded: true, result, errors: [] };
  } catch (error) {
    const info = ErrorHandler.handle(ErrorCategory.TRANSFER, error, { filePath, collection });
    return { success: false, seeded: false, errors: [info.message] };
  }
}
