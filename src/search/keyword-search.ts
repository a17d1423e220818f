/**
 * Keyword search with deterministic tiered ranking
 *
 * Node tiers, best first:
 *   0. name equals the keyword
 *   1. name starts with the keyword
 *   2. name contains the keyword
 *   3. type contains the keyword
 *   4. serialized properties contain the keyword
 *
 * Edge tiers follow the same shape over the relation type, then properties.
 * Matching is case-insensitive; ties are broken by record id.
 */

import type { GraphEdge, GraphNode } from '../core/types.js';
import { compareIds } from '../storage/filter.js';

export interface RankedMatch<T> {
  record: T;
  /** Lower is better */
  tier: number;
}

export enum NodeMatchTier {
  NAME_EXACT = 0,
  NAME_PREFIX = 1,
  NAME_SUBSTRING = 2,
  TYPE = 3,
  PROPERTIES = 4
}

export enum EdgeMatchTier {
  RELATION_EXACT = 0,
  RELATION_PREFIX = 1,
  RELATION_SUBSTRING = 2,
  PROPERTIES = 3
}

/**
 * Tier of a node for a lower-cased keyword, undefined when it does not match
 */
export function rankNode(node: GraphNode, needle: string): NodeMatchTier | undefined {
  const name = node.name.toLowerCase();
  if (name === needle) return NodeMatchTier.NAME_EXACT;
  if (name.startsWith(needle)) return NodeMatchTier.NAME_PREFIX;
  if (name.includes(needle)) return NodeMatchTier.NAME_SUBSTRING;
  if (node.type !== null && node.type.toLowerCase().includes(needle)) return NodeMatchTier.TYPE;
  if (JSON.stringify(node.properties).toLowerCase().includes(needle)) return NodeMatchTier.PROPERTIES;
  return undefined;
}

/**
 * Tier of an edge for a lower-cased keyword, undefined when it does not match
 */
export function rankEdge(edge: GraphEdge, needle: string): EdgeMatchTier | undefined {
  const relation = edge.relationType?.toLowerCase();
  if (relation !== undefined) {
    if (relation === needle) return EdgeMatchTier.RELATION_EXACT;
    if (relation.startsWith(needle)) return EdgeMatchTier.RELATION_PREFIX;
    if (relation.includes(needle)) return EdgeMatchTier.RELATION_SUBSTRING;
  }
  if (JSON.stringify(edge.properties).toLowerCase().includes(needle)) return EdgeMatchTier.PROPERTIES;
  return undefined;
}

/**
 * Rank nodes against a keyword and keep the best `limit`
 */
export function searchNodes(nodes: Iterable<GraphNode>, keyword: string, limit: number): Array<RankedMatch<GraphNode>> {
  return rankAll(nodes, keyword, limit, rankNode);
}

/**
 * Rank edges against a keyword and keep the best `limit`
 */
export function searchEdges(edges: Iterable<GraphEdge>, keyword: string, limit: number): Array<RankedMatch<GraphEdge>> {
  return rankAll(edges, keyword, limit, rankEdge);
}

function rankAll<T extends { id: string }>(
  records: Iterable<T>,
  keyword: string,
  limit: number,
  rank: (record: T, needle: string) => number | undefined
): Array<RankedMatch<T>> {
  const needle = keyword.trim().toLowerCase();
  const matches: Array<RankedMatch<T>> = [];

  for (const record of records) {
    const tier = rank(record, needle);
    if (tier !== undefined) {
      matches.push({ record, tier });
    }
  }

  return matches
    .sort((a, b) => a.tier - b.tier || compareIds(a.record.id, b.record.id))
    .slice(0, limit);
}
