/**
 * Request and response shapes of the HTTP API
 */

import { z } from 'zod';
import type { GraphErrorKind } from '../core/errors.js';
import {
  createEdgeSchema,
  createNodeSchema,
  directionSchema
} from '../utils/validation.js';

/**
 * Body of every error response
 */
export interface ErrorResponse {
  error: string;
  kind: GraphErrorKind | 'internal' | 'route_not_found';
  details?: Record<string, unknown>;
}

export interface HealthResponse {
  status: 'healthy';
  timestamp: string;
  service: string;
}

/** Optional positive integer carried in a query string */
const queryInt = z.coerce.number().int().positive().optional();

/** Comma separated list carried in a query string */
const queryList = z
  .string()
  .optional()
  .transform(value => value?.split(',').map(item => item.trim()).filter(Boolean));

const queryBoolean = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform(value => value === 'true' || value === '1');

export const listNodesQuerySchema = z.object({
  type: z.string().min(1).optional(),
  limit: queryInt,
  offset: z.coerce.number().int().nonnegative().optional()
});

export const listEdgesQuerySchema = z.object({
  nodeId: z.string().min(1).optional(),
  relationType: z.string().min(1).optional(),
  limit: queryInt,
  offset: z.coerce.number().int().nonnegative().optional()
});

export const neighborsQuerySchema = z.object({
  direction: directionSchema.optional(),
  maxDepth: queryInt,
  relationTypes: queryList
});

export const pathQuerySchema = z.object({
  source: z.string().min(1),
  target: z.string().min(1),
  direction: directionSchema.optional(),
  maxLength: queryInt,
  relationTypes: queryList,
  /** Return every simple path instead of one shortest path */
  all: queryBoolean,
  maxPaths: queryInt
});

export const searchQuerySchema = z.object({
  q: z.string(),
  limit: queryInt
});

export const importQuerySchema = z.object({
  clearExisting: queryBoolean
});

export const batchNodesBodySchema = z.object({
  nodes: z.array(createNodeSchema)
});

export const batchEdgesBodySchema = z.object({
  edges: z.array(createEdgeSchema)
});

export const contextBodySchema = z.object({
  query: z.string(),
  topK: z.number().int().positive().optional(),
  maxChars: z.number().int().positive().optional(),
  edgesPerNode: z.number().int().positive().optional()
});
