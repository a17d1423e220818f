/**
 * Core exports for the knowledge graph engine
 *
 * Exposes the service, its building blocks and the record store
 * implementations for embedding the engine in other applications.
 */

// Service
export { KnowledgeGraphService } from './service/knowledge-graph-service.js';
export type {
  NeighborOptions,
  PathOptions,
  AllPathsOptions,
  ListNodesOptions,
  ListEdgesOptions,
  QueryContextOptions,
  IntegrityReport
} from './service/knowledge-graph-service.js';

// Configuration
export { createDefaultEngineConfig, loadEngineConfig } from './config.js';
export type { EngineConfig } from './config.js';

// Core graph components
export { MaterializedGraph } from './core/graph.js';
export { GraphTraversal } from './core/traversal.js';
export { GraphMaterializer } from './core/materializer.js';
export { CollectionLocks } from './core/collection-lock.js';
export { MutationManager } from './mutation/mutation-manager.js';

// Search, context and transfer
export { searchNodes, searchEdges, rankNode, rankEdge, NodeMatchTier, EdgeMatchTier } from './search/keyword-search.js';
export { formatContext, NO_CONTEXT_SENTINEL } from './context/context-formatter.js';
export { buildExportDocument, parseImportDocument, CollectionImporter } from './transfer/import-export.js';

// Storage
export * from './storage/index.js';

// Errors
export {
  KnowledgeGraphError,
  DuplicateIdError,
  NotFoundError,
  EndpointNotFoundError,
  ValidationError,
  StoreError,
  isKnowledgeGraphError
} from './core/errors.js';
export type { GraphErrorKind, ValidationIssue } from './core/errors.js';
export { ErrorHandler, ErrorCategory, ErrorSeverity } from './utils/error-handler.js';

// HTTP API
export { createApp } from './server/api.js';
export { seedCollectionFromFile } from './server/seed.js';

// Type definitions
export type {
  PropertyValue,
  Properties,
  Direction,
  RecordKind,
  GraphNode,
  GraphEdge,
  CreateNodeInput,
  UpdateNodeInput,
  CreateEdgeInput,
  UpdateEdgeInput,
  NeighborEntry,
  NeighborhoodResult,
  GraphPath,
  GraphStats,
  BatchItemResult,
  BatchResult,
  ExportedNode,
  ExportedEdge,
  ExportDocument,
  ImportResult,
  ClearResult,
  QueryContextResult
} from './core/types.js';
