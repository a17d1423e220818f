/**
 * Error kinds surfaced by the engine
 *
 * Every error carries a machine-readable `kind` plus the offending
 * collection, id or field so that callers can render a precise message.
 */

import type { RecordKind } from './types.js';

export type GraphErrorKind =
  | 'duplicate_id'
  | 'not_found'
  | 'endpoint_not_found'
  | 'validation'
  | 'store';

/**
 * A single validation problem
 */
export interface ValidationIssue {
  /** Dotted path of the offending field, empty for the value itself */
  path: string;
  message: string;
}

/**
 * Base class for all engine errors
 */
export abstract class KnowledgeGraphError extends Error {
  abstract readonly kind: GraphErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Structured detail for transport layers */
  abstract get details(): Record<string, unknown>;

  toJSON(): { kind: GraphErrorKind; message: string; details: Record<string, unknown> } {
    return { kind: this.kind, message: this.message, details: this.details };
  }
}

/**
 * Raised when a create call reuses an id that is already live in the collection
 */
export class DuplicateIdError extends KnowledgeGraphError {
  readonly kind = 'duplicate_id' as const;

  constructor(
    readonly collection: string,
    readonly recordKind: RecordKind,
    readonly id: string
  ) {
    super(`${recordKind === 'node' ? 'Node' : 'Edge'} ${id} already exists in collection ${collection}`);
  }

  get details(): Record<string, unknown> {
    return { collection: this.collection, recordKind: this.recordKind, id: this.id };
  }
}

/**
 * Raised when a referenced node or edge is absent
 */
export class NotFoundError extends KnowledgeGraphError {
  readonly kind = 'not_found' as const;

  constructor(
    readonly collection: string,
    readonly recordKind: RecordKind,
    readonly id: string
  ) {
    super(`${recordKind === 'node' ? 'Node' : 'Edge'} ${id} not found in collection ${collection}`);
  }

  get details(): Record<string, unknown> {
    return { collection: this.collection, recordKind: this.recordKind, id: this.id };
  }
}

/**
 * Raised when edges reference nodes that do not exist in the collection
 */
export class EndpointNotFoundError extends KnowledgeGraphError {
  readonly kind = 'endpoint_not_found' as const;

  constructor(
    readonly collection: string,
    readonly edges: Array<{ edgeId: string; missing: string[] }>
  ) {
    super(
      edges.length === 1 && edges[0]
        ? `Edge ${edges[0].edgeId} references missing node(s) ${edges[0].missing.join(', ')} in collection ${collection}`
        : `${edges.length} edges reference missing nodes in collection ${collection}`
    );
  }

  get details(): Record<string, unknown> {
    return { collection: this.collection, edges: this.edges };
  }
}

/**
 * Raised for malformed input: bad limits, missing fields, non-serializable values
 */
export class ValidationError extends KnowledgeGraphError {
  readonly kind = 'validation' as const;

  constructor(message: string, readonly issues: ValidationIssue[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.map(formatIssue).join('; ')}` : message);
  }

  get details(): Record<string, unknown> {
    return { issues: this.issues };
  }
}

/**
 * Raised when the record store fails. Retrying is left to the caller.
 */
export class StoreError extends KnowledgeGraphError {
  readonly kind = 'store' as const;

  constructor(readonly operation: string, cause: unknown) {
    super(`Record store failed during ${operation}: ${describeCause(cause)}`, { cause });
  }

  get details(): Record<string, unknown> {
    return { operation: this.operation };
  }
}

export function isKnowledgeGraphError(error: unknown): error is KnowledgeGraphError {
  return error instanceof KnowledgeGraphError;
}

function formatIssue(issue: ValidationIssue): string {
  return issue.path ? `${issue.path}: ${issue.message}` : issue.message;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
