/**
 * Renders ranked search results as bounded prompt context
 *
 * Layout:
 *
 *   # Knowledge Graph Context
 *
 *   ## Entity: Alice (Person)
 *   Properties:
 *     - age: 30
 *   Relations:
 *     - knows -> Bob
 *     - Carol mentors -> Alice
 *
 * Entity blocks follow rank order. When the next block does not fit, its
 * heading line alone is tried and the output ends there, so the lowest
 * ranked entities are the first to go.
 *
 * Empty input always yields NO_CONTEXT_SENTINEL, whatever the budget:
 * the sentinel is a fixed marker for callers, not context text.
 */

import type { GraphEdge, GraphNode, PropertyValue } from '../core/types.js';
import { validateLimit } from '../utils/validation.js';

export const NO_CONTEXT_SENTINEL = 'No relevant knowledge found.';
export const CONTEXT_HEADER = '# Knowledge Graph Context';

/** Display name of a node id, for endpoints outside the ranked list */
export type NameResolver = (nodeId: string) => string | undefined;

export function formatContext(
  nodes: GraphNode[],
  edges: GraphEdge[],
  maxChars: number,
  resolveName?: NameResolver
): string {
  const [first] = nodes;
  if (!first) {
    return NO_CONTEXT_SENTINEL;
  }
  const limit = validateLimit(maxChars, 'maxChars');

  const ranked = new Map(nodes.map(node => [node.id, node.name]));
  const nameOf = (id: string): string => ranked.get(id) ?? resolveName?.(id) ?? id;

  let text = CONTEXT_HEADER;
  let included = 0;

  for (const node of nodes) {
    const heading = entityHeading(node);
    const block = [heading, ...entityDetails(node, edges, nameOf)].join('\n');

    const full = `${text}\n\n${block}`;
    if (full.length <= limit) {
      text = full;
      included++;
      continue;
    }

    const headingOnly = `${text}\n\n${heading}`;
    if (headingOnly.length <= limit) {
      text = headingOnly;
      included++;
    }
    break;
  }

  return included > 0 ? text : entityHeading(first).slice(0, limit);
}

export function entityHeading(node: GraphNode): string {
  return node.type ? `## Entity: ${node.name} (${node.type})` : `## Entity: ${node.name}`;
}

function entityDetails(node: GraphNode, edges: GraphEdge[], nameOf: (id: string) => string): string[] {
  const lines: string[] = [];

  const properties = Object.entries(node.properties);
  if (properties.length > 0) {
    lines.push('Properties:');
    for (const [key, value] of properties) {
      lines.push(`  - ${key}: ${formatValue(value)}`);
    }
  }

  const relations: string[] = [];
  for (const edge of edges) {
    const relation = edge.relationType ?? 'related';
    if (edge.source === node.id) {
      relations.push(`  - ${relation} -> ${nameOf(edge.target)}`);
    } else if (edge.target === node.id) {
      relations.push(`  - ${nameOf(edge.source)} ${relation} -> ${node.name}`);
    }
  }
  if (relations.length > 0) {
    lines.push('Relations:', ...relations);
  }

  return lines;
}

function formatValue(value: PropertyValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}
