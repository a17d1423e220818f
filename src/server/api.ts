/**
 * Hono HTTP API for the knowledge graph engine
 *
 * Exposes every collection-scoped service operation as a REST endpoint.
 * Handlers only parse input and shape output; engine errors are mapped to
 * status codes in one place by `onError`.
 */

import { Hono, type Context } from 'hono';
import { cors } from 'hono/cors';
import type { z } from 'zod';
import type { EngineConfig } from '../config.js';
import { isKnowledgeGraphError, ValidationError, type GraphErrorKind } from '../core/errors.js';
import type { KnowledgeGraphService } from '../service/knowledge-graph-service.js';
import { ErrorCategory, ErrorHandler } from '../utils/error-handler.js';
import {
  createEdgeSchema,
  createNodeSchema,
  parseOrThrow,
  updateEdgeSchema,
  updateNodeSchema
} from '../utils/validation.js';
import {
  batchEdgesBodySchema,
  batchNodesBodySchema,
  contextBodySchema,
  importQuerySchema,
  listEdgesQuerySchema,
  listNodesQuerySchema,
  neighborsQuerySchema,
  pathQuerySchema,
  searchQuerySchema,
  type ErrorResponse,
  type HealthResponse
} from './types.js';

const STATUS_BY_KIND = {
  validation: 400,
  not_found: 404,
  duplicate_id: 409,
  endpoint_not_found: 422,
  store: 503
} as const satisfies Record<GraphErrorKind, number>;

/**
 * Build the API around a service instance
 */
export function createApp(service: KnowledgeGraphService, config: EngineConfig) {
  const app = new Hono();

  // Enable CORS for UI communication
  app.use('/api/*', cors({
    origin: config.server.corsOrigins,
    allowHeaders: ['Content-Type', 'Authorization'],
    allowMethods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS']
  }));

  app.onError((error, c) => {
    if (isKnowledgeGraphError(error)) {
      if (error.kind === 'store') {
        ErrorHandler.handle(ErrorCategory.STORAGE, error, { path: c.req.path });
      }
      const body: ErrorResponse = { error: error.message, kind: error.kind, details: error.details };
      return c.json(body, STATUS_BY_KIND[error.kind]);
    }

    ErrorHandler.handle(ErrorCategory.SERVER, error, { path: c.req.path, method: c.req.method });
    const body: ErrorResponse = { error: 'Internal server error', kind: 'internal' };
    return c.json(body, 500);
  });

  app.notFound(c => {
    const body: ErrorResponse = { error: `No route for ${c.req.method} ${c.req.path}`, kind: 'route_not_found' };
    return c.json(body, 404);
  });

  /**
   * GET /api/health
   * Health check endpoint
   */
  app.get('/api/health', c => {
    const body: HealthResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: 'knowledge-graph-engine'
    };
    return c.json(body);
  });

  /**
   * GET /api/collections
   * Names of collections holding records
   */
  app.get('/api/collections', async c => {
    return c.json({ collections: await service.listCollections() });
  });

  /**
   * DELETE /api/collections/:collection
   * Remove every node and edge of a collection
   */
  app.delete('/api/collections/:collection', async c => {
    return c.json(await service.clear(c.req.param('collection')));
  });

  app.get('/api/collections/:collection/stats', async c => {
    return c.json(await service.stats(c.req.param('collection')));
  });

  app.get('/api/collections/:collection/integrity', async c => {
    return c.json(await service.checkIntegrity(c.req.param('collection')));
  });

  // Nodes

  app.get('/api/collections/:collection/nodes', async c => {
    const query = parseQuery(c, listNodesQuerySchema);
    return c.json({ nodes: await service.listNodes(c.req.param('collection'), query) });
  });

  app.post('/api/collections/:collection/nodes', async c => {
    const input = parseOrThrow(createNodeSchema, await readJson(c), 'node');
    return c.json(await service.createNode(c.req.param('collection'), input), 201);
  });

  /**
   * POST /api/collections/:collection/nodes/batch
   * Create many nodes; each item reports its own outcome
   */
  app.post('/api/collections/:collection/nodes/batch', async c => {
    const { nodes } = parseOrThrow(batchNodesBodySchema, await readJson(c), 'node batch');
    return c.json(await service.batchCreateNodes(c.req.param('collection'), nodes));
  });

  app.get('/api/collections/:collection/nodes/:nodeId', async c => {
    return c.json(await service.getNode(c.req.param('collection'), c.req.param('nodeId')));
  });

  app.patch('/api/collections/:collection/nodes/:nodeId', async c => {
    const patch = parseOrThrow(updateNodeSchema, await readJson(c), 'node update');
    return c.json(await service.updateNode(c.req.param('collection'), c.req.param('nodeId'), patch));
  });

  app.delete('/api/collections/:collection/nodes/:nodeId', async c => {
    return c.json(await service.deleteNode(c.req.param('collection'), c.req.param('nodeId')));
  });

  /**
   * GET /api/collections/:collection/nodes/:nodeId/neighbors
   * Bounded neighbor expansion; relationTypes is comma separated
   */
  app.get('/api/collections/:collection/nodes/:nodeId/neighbors', async c => {
    const query = parseQuery(c, neighborsQuerySchema);
    return c.json(await service.neighbors(c.req.param('collection'), c.req.param('nodeId'), query));
  });

  // Edges

  app.get('/api/collections/:collection/edges', async c => {
    const query = parseQuery(c, listEdgesQuerySchema);
    return c.json({ edges: await service.listEdges(c.req.param('collection'), query) });
  });

  app.post('/api/collections/:collection/edges', async c => {
    const input = parseOrThrow(createEdgeSchema, await readJson(c), 'edge');
    return c.json(await service.createEdge(c.req.param('collection'), input), 201);
  });

  app.post('/api/collections/:collection/edges/batch', async c => {
    const { edges } = parseOrThrow(batchEdgesBodySchema, await readJson(c), 'edge batch');
    return c.json(await service.batchCreateEdges(c.req.param('collection'), edges));
  });

  app.get('/api/collections/:collection/edges/:edgeId', async c => {
    return c.json(await service.getEdge(c.req.param('collection'), c.req.param('edgeId')));
  });

  app.patch('/api/collections/:collection/edges/:edgeId', async c => {
    const patch = parseOrThrow(updateEdgeSchema, await readJson(c), 'edge update');
    return c.json(await service.updateEdge(c.req.param('collection'), c.req.param('edgeId'), patch));
  });

  app.delete('/api/collections/:collection/edges/:edgeId', async c => {
    return c.json(await service.deleteEdge(c.req.param('collection'), c.req.param('edgeId')));
  });

  // Paths and search

  /**
   * GET /api/collections/:collection/paths?source=&target=
   * One shortest path, or every simple path with all=true
   */
  app.get('/api/collections/:collection/paths', async c => {
    const { source, target, all, maxPaths, ...options } = parseQuery(c, pathQuerySchema);
    const collection = c.req.param('collection');

    if (all) {
      return c.json({ paths: await service.findAllPaths(collection, source, target, { ...options, maxPaths }) });
    }
    const path = await service.findPath(collection, source, target, options);
    return c.json({ found: path !== null, path });
  });

  app.get('/api/collections/:collection/search/nodes', async c => {
    const { q, limit } = parseQuery(c, searchQuerySchema);
    return c.json({ query: q, nodes: await service.searchNodes(c.req.param('collection'), q, limit) });
  });

  app.get('/api/collections/:collection/search/edges', async c => {
    const { q, limit } = parseQuery(c, searchQuerySchema);
    return c.json({ query: q, edges: await service.searchEdges(c.req.param('collection'), q, limit) });
  });

  /**
   * POST /api/collections/:collection/context
   * Ranked nodes, connecting edges and their rendered context text
   */
  app.post('/api/collections/:collection/context', async c => {
    const { query, ...options } = parseOrThrow(contextBodySchema, await readJson(c), 'context request');
    return c.json(await service.queryContext(c.req.param('collection'), query, options));
  });

  // Transfer

  app.get('/api/collections/:collection/export', async c => {
    return c.json(await service.exportCollection(c.req.param('collection')));
  });

  /**
   * POST /api/collections/:collection/import?clearExisting=true
   * Body is an export document
   */
  app.post('/api/collections/:collection/import', async c => {
    const { clearExisting } = parseQuery(c, importQuerySchema);
    return c.json(await service.importCollection(c.req.param('collection'), await readJson(c), { clearExisting }));
  });

  return app;
}

function parseQuery<S extends z.ZodTypeAny>(c: Context, schema: S): z.output<S> {
  return parseOrThrow(schema, c.req.query(), 'query parameters');
}

async function readJson(c: Context): Promise<unknown> {
  try {
    const body: unknown = await c.req.json();
    return body;
  } catch (error) {
    throw new ValidationError('Request body must be valid JSON', [
      { path: '', message: error instanceof Error ? error.message : String(error) }
    ]);
  }
}
