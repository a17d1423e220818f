/**
 * Whole-collection export and import
 *
 * The export document is the only interchange format of the engine.
 * Fields are snake_case and may only ever be extended with optional ones.
 */

import { EndpointNotFoundError, ValidationError, type ValidationIssue } from '../core/errors.js';
import type {
  ExportDocument,
  ExportedEdge,
  ExportedNode,
  GraphEdge,
  GraphNode,
  ImportResult
} from '../core/types.js';
import type { MutationManager } from '../mutation/mutation-manager.js';
import { DEFAULT_EDGE_WEIGHT, deriveEdgeId, sameEdgeContent, sameNodeContent } from '../mutation/records.js';
import type { RecordStore } from '../storage/types.js';
import { ErrorHandler } from '../utils/error-handler.js';
import {
  exportDocumentSchema,
  parseOrThrow,
  type ImportDocument,
  type ImportedEdge,
  type ImportedNode
} from '../utils/validation.js';

export const EXPORT_FORMAT = 'knowledge-graph';
export const EXPORT_VERSION = 1;

export interface ImportOptions {
  /** Clear the collection before writing the document's records */
  clearExisting: boolean;
}

/**
 * Serialize a snapshot's records; nodes and edges are ordered by id
 */
export function buildExportDocument(
  collection: string,
  nodes: GraphNode[],
  edges: GraphEdge[],
  exportedAt: Date = new Date()
): ExportDocument {
  return {
    format: EXPORT_FORMAT,
    version: EXPORT_VERSION,
    collection,
    exported_at: exportedAt.toISOString(),
    nodes: nodes.map(toExportedNode),
    edges: edges.map(toExportedEdge)
  };
}

export function toExportedNode(node: GraphNode): ExportedNode {
  return {
    node_id: node.id,
    name: node.name,
    type: node.type,
    properties: node.properties,
    created_at: node.createdAt.toISOString(),
    updated_at: node.updatedAt.toISOString()
  };
}

export function toExportedEdge(edge: GraphEdge): ExportedEdge {
  return {
    edge_id: edge.id,
    source_node_id: edge.source,
    target_node_id: edge.target,
    relation_type: edge.relationType,
    properties: edge.properties,
    weight: edge.weight,
    created_at: edge.createdAt.toISOString(),
    updated_at: edge.updatedAt.toISOString()
  };
}

/**
 * Validate an import document: shape, and id uniqueness within the document
 */
export function parseImportDocument(document: unknown): ImportDocument {
  const parsed = parseOrThrow(exportDocumentSchema, document, 'import document');
  const issues: ValidationIssue[] = [
    ...duplicateIssues('nodes', parsed.nodes.map(node => node.node_id)),
    ...duplicateIssues('edges', parsed.edges.map(importedEdgeId))
  ];
  if (issues.length > 0) {
    throw new ValidationError('Invalid import document', issues);
  }
  return parsed;
}

/**
 * Applies import documents through the mutation manager's exclusive scope
 */
export class CollectionImporter {
  constructor(
    private readonly store: RecordStore,
    private readonly mutations: MutationManager
  ) {}

  /**
   * Import a document into `collection`, merging by id unless `clearExisting` is set.
   * Importing the same document twice leaves the collection as importing it once.
   */
  async importCollection(collection: string, document: unknown, options: ImportOptions): Promise<ImportResult> {
    const parsed = parseImportDocument(document);

    return this.mutations.exclusive(collection, async () => {
      const [existingNodes, existingEdges]: [Map<string, GraphNode>, Map<string, GraphEdge>] = options.clearExisting
        ? [new Map<string, GraphNode>(), new Map<string, GraphEdge>()]
        : await this.loadExisting(collection);

      this.assertEndpoints(collection, parsed, existingNodes);

      if (options.clearExisting) {
        await this.mutations.clearUnlocked(collection);
      }

      const now = new Date();
      const result: ImportResult = {
        collection,
        cleared: options.clearExisting,
        nodesCreated: 0,
        nodesUpdated: 0,
        nodesUnchanged: 0,
        edgesCreated: 0,
        edgesUpdated: 0,
        edgesUnchanged: 0
      };

      for (const imported of parsed.nodes) {
        const existing = existingNodes.get(imported.node_id);
        const node = fromImportedNode(collection, imported, existing, now);
        if (existing && sameNodeContent(existing, node)) {
          result.nodesUnchanged++;
          continue;
        }
        await ErrorHandler.guardStore('import node', () => this.store.upsert(collection, 'node', node));
        if (existing) {
          result.nodesUpdated++;
        } else {
          result.nodesCreated++;
        }
      }

      for (const imported of parsed.edges) {
        const existing = existingEdges.get(importedEdgeId(imported));
        const edge = fromImportedEdge(collection, imported, existing, now);
        if (existing && sameEdgeContent(existing, edge)) {
          result.edgesUnchanged++;
          continue;
        }
        await ErrorHandler.guardStore('import edge', () => this.store.upsert(collection, 'edge', edge));
        if (existing) {
          result.edgesUpdated++;
        } else {
          result.edgesCreated++;
        }
      }

      console.log(
        `📥 Imported into ${collection}: ${parsed.nodes.length} nodes, ${parsed.edges.length} edges` +
        (options.clearExisting ? ' (cleared first)' : '')
      );
      return result;
    });
  }

  private async loadExisting(collection: string): Promise<[Map<string, GraphNode>, Map<string, GraphEdge>]> {
    const [nodes, edges] = await ErrorHandler.guardStore('load collection for import', () =>
      Promise.all([this.store.list(collection, 'node'), this.store.list(collection, 'edge')])
    );
    return [new Map(nodes.map(node => [node.id, node])), new Map(edges.map(edge => [edge.id, edge]))];
  }

  /**
   * Every edge endpoint must exist in the collection after the import
   */
  private assertEndpoints(collection: string, document: ImportDocument, existingNodes: Map<string, GraphNode>): void {
    const available = new Set([...existingNodes.keys(), ...document.nodes.map(node => node.node_id)]);
    const broken: Array<{ edgeId: string; missing: string[] }> = [];

    for (const edge of document.edges) {
      const missing = [...new Set([edge.source_node_id, edge.target_node_id])].filter(id => !available.has(id));
      if (missing.length > 0) {
        broken.push({ edgeId: importedEdgeId(edge), missing });
      }
    }

    if (broken.length > 0) {
      throw new EndpointNotFoundError(collection, broken);
    }
  }
}

function importedEdgeId(edge: ImportedEdge): string {
  return edge.edge_id ?? deriveEdgeId(edge.source_node_id, edge.relation_type, edge.target_node_id);
}

function fromImportedNode(collection: string, imported: ImportedNode, existing: GraphNode | undefined, now: Date): GraphNode {
  return {
    id: imported.node_id,
    collection,
    name: imported.name,
    type: imported.type ?? null,
    properties: imported.properties ?? {},
    createdAt: imported.created_at ? new Date(imported.created_at) : existing?.createdAt ?? now,
    updatedAt: imported.updated_at ? new Date(imported.updated_at) : now
  };
}

function fromImportedEdge(collection: string, imported: ImportedEdge, existing: GraphEdge | undefined, now: Date): GraphEdge {
  return {
    id: importedEdgeId(imported),
    collection,
    source: imported.source_node_id,
    target: imported.target_node_id,
    relationType: imported.relation_type ?? null,
    properties: imported.properties ?? {},
    weight: imported.weight ?? DEFAULT_EDGE_WEIGHT,
    createdAt: imported.created_at ? new Date(imported.created_at) : existing?.createdAt ?? now,
    updatedAt: imported.updated_at ? new Date(imported.updated_at) : now
  };
}

function duplicateIssues(section: 'nodes' | 'edges', ids: string[]): ValidationIssue[] {
  const seen = new Map<string, number>();
  const issues: ValidationIssue[] = [];
  ids.forEach((id, index) => {
    const first = seen.get(id);
    if (first !== undefined) {
      issues.push({ path: `${section}.${index}`, message: `duplicate id ${id} (first at ${section}.${first})` });
    } else {
      seen.set(id, index);
    }
  });
  return issues;
}
