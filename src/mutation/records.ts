/**
 * Pure record construction and patching
 */

import { v4 as uuidv4 } from 'uuid';
import type { z } from 'zod';
import type { GraphEdge, GraphNode, Properties } from '../core/types.js';
import {
  validateRecordId,
  type createEdgeSchema,
  type createNodeSchema,
  type updateEdgeSchema,
  type updateNodeSchema
} from '../utils/validation.js';

export type NodeDraft = z.output<typeof createNodeSchema>;
export type EdgeDraft = z.output<typeof createEdgeSchema>;
export type NodePatch = z.output<typeof updateNodeSchema>;
export type EdgePatch = z.output<typeof updateEdgeSchema>;

export const DEFAULT_EDGE_WEIGHT = 1.0;

/**
 * Id used for an edge created without one
 */
export function deriveEdgeId(source: string, relationType: string | null | undefined, target: string): string {
  return validateRecordId(`${source}_${relationType ?? 'related'}_${target}`, 'derived edge id');
}

export function buildNodeRecord(collection: string, draft: NodeDraft, now: Date = new Date()): GraphNode {
  return {
    id: draft.id ?? uuidv4(),
    collection,
    name: draft.name,
    type: draft.type ?? null,
    properties: draft.properties ?? {},
    createdAt: now,
    updatedAt: now
  };
}

export function buildEdgeRecord(collection: string, draft: EdgeDraft, now: Date = new Date()): GraphEdge {
  return {
    id: draft.id ?? deriveEdgeId(draft.source, draft.relationType, draft.target),
    collection,
    source: draft.source,
    target: draft.target,
    relationType: draft.relationType ?? null,
    properties: draft.properties ?? {},
    weight: draft.weight ?? DEFAULT_EDGE_WEIGHT,
    createdAt: now,
    updatedAt: now
  };
}

/**
 * Apply a partial update; fields the patch leaves undefined keep their value
 */
export function applyNodePatch(node: GraphNode, patch: NodePatch, now: Date = new Date()): GraphNode {
  return {
    ...node,
    name: patch.name ?? node.name,
    type: patch.type === undefined ? node.type : patch.type,
    properties: patchProperties(node.properties, patch.properties, patch.mergeProperties),
    updatedAt: now
  };
}

export function applyEdgePatch(edge: GraphEdge, patch: EdgePatch, now: Date = new Date()): GraphEdge {
  return {
    ...edge,
    source: patch.source ?? edge.source,
    target: patch.target ?? edge.target,
    relationType: patch.relationType === undefined ? edge.relationType : patch.relationType,
    properties: patchProperties(edge.properties, patch.properties, patch.mergeProperties),
    weight: patch.weight ?? edge.weight,
    updatedAt: now
  };
}

/**
 * Content equality, ignoring timestamps
 */
export function sameNodeContent(a: GraphNode, b: GraphNode): boolean {
  return a.name === b.name && a.type === b.type && sameProperties(a.properties, b.properties);
}

export function sameEdgeContent(a: GraphEdge, b: GraphEdge): boolean {
  return (
    a.source === b.source &&
    a.target === b.target &&
    a.relationType === b.relationType &&
    a.weight === b.weight &&
    sameProperties(a.properties, b.properties)
  );
}

function sameProperties(a: Properties, b: Properties): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

function patchProperties(current: Properties, next: Properties | undefined, merge: boolean | undefined): Properties {
  if (next === undefined) {
    return current;
  }
  return merge ? { ...current, ...next } : next;
}
