/**
 * Boundary validation schemas
 *
 * Every value that enters the engine from a caller, a store log or an
 * import document passes through one of these schemas.
 */

import { z } from 'zod';
import { ValidationError, type ValidationIssue } from '../core/errors.js';
import type { Direction, PropertyValue } from '../core/types.js';

export const propertyValueSchema: z.ZodType<PropertyValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(propertyValueSchema),
    z.record(propertyValueSchema)
  ])
);

export const propertiesSchema = z.record(propertyValueSchema);

export const collectionNameSchema = z
  .string()
  .regex(/^[A-Za-z0-9_.-]{1,100}$/, 'must be 1-100 characters of letters, digits, "_", "." or "-"')
  .refine(name => name !== '.' && name !== '..', 'must not be "." or ".."');

export const recordIdSchema = z.string().min(1).max(200);

const labelSchema = z.string().min(1).max(200);

export const directionSchema = z.enum(['in', 'out', 'both']) satisfies z.ZodType<Direction>;

export const createNodeSchema = z.object({
  id: recordIdSchema.optional(),
  name: z.string().min(1),
  type: labelSchema.nullable().optional(),
  properties: propertiesSchema.optional()
});

export const updateNodeSchema = z
  .object({
    name: z.string().min(1).optional(),
    type: labelSchema.nullable().optional(),
    properties: propertiesSchema.optional(),
    mergeProperties: z.boolean().optional()
  })
  .refine(
    patch => patch.name !== undefined || patch.type !== undefined || patch.properties !== undefined,
    'at least one of name, type or properties is required'
  );

export const createEdgeSchema = z.object({
  id: recordIdSchema.optional(),
  source: recordIdSchema,
  target: recordIdSchema,
  relationType: labelSchema.nullable().optional(),
  properties: propertiesSchema.optional(),
  weight: z.number().finite().optional()
});

export const updateEdgeSchema = z
  .object({
    source: recordIdSchema.optional(),
    target: recordIdSchema.optional(),
    relationType: labelSchema.nullable().optional(),
    properties: propertiesSchema.optional(),
    weight: z.number().finite().optional(),
    mergeProperties: z.boolean().optional()
  })
  .refine(
    patch =>
      patch.source !== undefined ||
      patch.target !== undefined ||
      patch.relationType !== undefined ||
      patch.properties !== undefined ||
      patch.weight !== undefined,
    'at least one of source, target, relationType, properties or weight is required'
  );

export const positiveIntSchema = z.number().int().positive();

export const keywordSchema = z.string().trim().min(1, 'keyword must not be empty');

const timestampSchema = z.string().datetime({ offset: true });

export const exportedNodeSchema = z.object({
  node_id: recordIdSchema,
  name: z.string().min(1),
  type: labelSchema.nullable().optional(),
  properties: propertiesSchema.optional(),
  created_at: timestampSchema.optional(),
  updated_at: timestampSchema.optional()
});

export const exportedEdgeSchema = z.object({
  edge_id: recordIdSchema.optional(),
  source_node_id: recordIdSchema,
  target_node_id: recordIdSchema,
  relation_type: labelSchema.nullable().optional(),
  properties: propertiesSchema.optional(),
  weight: z.number().finite().optional(),
  created_at: timestampSchema.optional(),
  updated_at: timestampSchema.optional()
});

export const exportDocumentSchema = z.object({
  format: z.literal('knowledge-graph').optional(),
  version: z.literal(1).optional(),
  collection: z.string().optional(),
  exported_at: timestampSchema.optional(),
  nodes: z.array(exportedNodeSchema).default([]),
  edges: z.array(exportedEdgeSchema).default([])
});

export type ImportDocument = z.infer<typeof exportDocumentSchema>;
export type ImportedNode = z.infer<typeof exportedNodeSchema>;
export type ImportedEdge = z.infer<typeof exportedEdgeSchema>;

/**
 * Persisted record shapes, used when replaying store logs
 */
export const storedNodeSchema = z.object({
  id: recordIdSchema,
  collection: z.string(),
  name: z.string(),
  type: z.string().nullable(),
  properties: propertiesSchema,
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date()
});

export const storedEdgeSchema = z.object({
  id: recordIdSchema,
  collection: z.string(),
  source: recordIdSchema,
  target: recordIdSchema,
  relationType: z.string().nullable(),
  properties: propertiesSchema,
  weight: z.number().finite(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date()
});

/**
 * Convert zod issues into engine validation issues
 */
export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message
  }));
}

/**
 * Parse a value or throw a ValidationError naming what was being validated
 */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid ${what}`, toValidationIssues(result.error));
  }
  return result.data;
}

export function validateCollectionName(collection: unknown): string {
  return parseOrThrow(collectionNameSchema, collection, 'collection name');
}

export function validateRecordId(id: unknown, what: string = 'id'): string {
  return parseOrThrow(recordIdSchema, id, what);
}

/**
 * Validate a positive integer limit, optionally bounded above
 */
export function validateLimit(value: unknown, what: string, max?: number): number {
  const limit = parseOrThrow(positiveIntSchema, value, what);
  if (max !== undefined && limit > max) {
    throw new ValidationError(`Invalid ${what}`, [{ path: '', message: `must be at most ${max}` }]);
  }
  return limit;
}
