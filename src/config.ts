/**
 * Engine configuration
 *
 * Defaults are usable as-is for an in-memory engine; `loadEngineConfig`
 * overlays values from environment variables for the HTTP server.
 */

import type { StorageConfig } from './storage/types.js';

export interface EngineConfig {
  storage: StorageConfig;
  /** Keep materialized graphs between reads, invalidated on every write */
  cacheGraphs: boolean;
  limits: {
    /** Upper bound accepted for neighbor expansion depth */
    maxDepth: number;
    /** Upper bound accepted for path search length */
    maxPathLength: number;
    /** Upper bound accepted for search and list limits */
    maxSearchResults: number;
    /** Default cap on the number of paths returned by findAllPaths */
    maxPaths: number;
  };
  context: {
    topK: number;
    maxChars: number;
    /** Edges gathered per ranked node */
    edgesPerNode: number;
  };
  server: {
    port: number;
    host: string;
    corsOrigins: string[];
    /** Export document imported at start-up */
    seedFile?: string;
    seedCollection: string;
  };
}

export function createDefaultEngineConfig(): EngineConfig {
  return {
    storage: {
      type: 'memory',
      directory: './data',
      compactOnLoad: false
    },
    cacheGraphs: true,
    limits: {
      maxDepth: 6,
      maxPathLength: 10,
      maxSearchResults: 200,
      maxPaths: 10
    },
    context: {
      topK: 10,
      maxChars: 4000,
      edgesPerNode: 20
    },
    server: {
      port: 3001,
      host: '127.0.0.1',
      corsOrigins: ['http://localhost:5173', 'http://localhost:3000'],
      seedCollection: 'default'
    }
  };
}

/**
 * Build a configuration from environment variables on top of the defaults
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const defaults = createDefaultEngineConfig();

  return {
    storage: {
      type: env.KG_STORAGE === 'jsonl' ? 'jsonl' : defaults.storage.type,
      directory: env.KG_DATA_DIR || defaults.storage.directory,
      compactOnLoad: parseBoolean(env.KG_COMPACT_ON_LOAD, defaults.storage.compactOnLoad)
    },
    cacheGraphs: parseBoolean(env.KG_CACHE_GRAPHS, defaults.cacheGraphs),
    limits: { ...defaults.limits },
    context: {
      topK: parseInteger(env.KG_CONTEXT_TOP_K, defaults.context.topK),
      maxChars: parseInteger(env.KG_CONTEXT_MAX_CHARS, defaults.context.maxChars),
      edgesPerNode: defaults.context.edgesPerNode
    },
    server: {
      port: parseInteger(env.PORT, defaults.server.port),
      host: env.HOST || defaults.server.host,
      corsOrigins: env.KG_CORS_ORIGINS
        ? env.KG_CORS_ORIGINS.split(',').map(origin => origin.trim()).filter(Boolean)
        : defaults.server.corsOrigins,
      seedFile: env.KG_SEED_FILE || undefined,
      seedCollection: env.KG_SEED_COLLECTION || defaults.server.seedCollection
    }
  };
}

function parseInteger(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}
