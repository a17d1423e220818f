/**
 * Shared filtering and paging for record store implementations
 */

import type { GraphEdge, GraphNode, RecordKind, RecordMap } from '../core/types.js';
import type { ListOptions, RecordFilter } from './types.js';

/**
 * Lower-cased searchable text of a node
 */
export function nodeSearchText(node: GraphNode): string {
  return [node.name, node.type ?? '', JSON.stringify(node.properties)].join('\n').toLowerCase();
}

/**
 * Lower-cased searchable text of an edge
 */
export function edgeSearchText(edge: GraphEdge): string {
  return [edge.relationType ?? '', JSON.stringify(edge.properties)].join('\n').toLowerCase();
}

export function matchesNode(node: GraphNode, filter: RecordFilter): boolean {
  if (filter.type !== undefined && node.type !== filter.type) {
    return false;
  }
  if (filter.relationType !== undefined || filter.touches !== undefined) {
    return false;
  }
  if (filter.keyword !== undefined && !nodeSearchText(node).includes(filter.keyword.toLowerCase())) {
    return false;
  }
  return true;
}

export function matchesEdge(edge: GraphEdge, filter: RecordFilter): boolean {
  if (filter.type !== undefined) {
    return false;
  }
  if (filter.relationType !== undefined && edge.relationType !== filter.relationType) {
    return false;
  }
  if (filter.touches !== undefined && edge.source !== filter.touches && edge.target !== filter.touches) {
    return false;
  }
  if (filter.keyword !== undefined && !edgeSearchText(edge).includes(filter.keyword.toLowerCase())) {
    return false;
  }
  return true;
}

/**
 * Sort by id, apply the filter, then offset and limit
 */
export function selectRecords<K extends RecordKind>(
  kind: K,
  records: Iterable<RecordMap[K]>,
  options: ListOptions = {}
): Array<RecordMap[K]> {
  const sorted = [...records].sort((a, b) => compareIds(a.id, b.id));
  const filter = options.filter;
  const matching = filter
    ? sorted.filter(record => matchesRecord(kind, record, filter))
    : sorted;

  const offset = options.offset ?? 0;
  const end = options.limit !== undefined ? offset + options.limit : undefined;
  return matching.slice(offset, end);
}

/**
 * Code-unit ordering, independent of locale
 */
export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function matchesRecord<K extends RecordKind>(kind: K, record: RecordMap[K], filter: RecordFilter): boolean {
  if (isNodeRecord(kind, record)) {
    return matchesNode(record, filter);
  }
  return isEdgeRecord(kind, record) ? matchesEdge(record, filter) : false;
}

function isNodeRecord(kind: RecordKind, record: GraphNode | GraphEdge): record is GraphNode {
  return kind === 'node' && 'name' in record;
}

function isEdgeRecord(kind: RecordKind, record: GraphNode | GraphEdge): record is GraphEdge {
  return kind === 'edge' && 'source' in record;
}
