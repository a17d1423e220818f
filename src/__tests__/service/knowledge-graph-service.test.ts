/**
 * Tests for the collection-scoped service surface
 *
 * Tests include:
 * - The create, neighbors, stats and delete scenario
 * - Search ranking through the service
 * - Record reads and listing
 * - Path queries and their bounds
 * - Integrity reports over externally written data
 * - The query context pipeline
 * - Reader isolation from concurrent writes
 */

import { NotFoundError, ValidationError } from '../../core/errors.js';
import { NO_CONTEXT_SENTINEL } from '../../context/context-formatter.js';
import type { KnowledgeGraphService } from '../../service/knowledge-graph-service.js';
import type { InMemoryRecordStore } from '../../storage/memory-store.js';
import { TestHelpers } from '../setup.js';

describe('KnowledgeGraphService', () => {
  let service: KnowledgeGraphService;
  let store: InMemoryRecordStore;

  beforeEach(async () => {
    ({ service, store } = TestHelpers.createService());
    await service.createNode('kg1', { id: 'p1', name: 'Alice', type: 'Person' });
    await service.createNode('kg1', { id: 'p2', name: 'Bob', type: 'Person' });
    await service.createEdge('kg1', { id: 'e1', source: 'p1', target: 'p2', relationType: 'knows' });
  });

  describe('Basic scenario', () => {
    test('should expand one hop along outgoing edges', async () => {
      const result = await service.neighbors('kg1', 'p1', { direction: 'out', maxDepth: 1 });

      expect(result.neighbors.map(entry => entry.node.id)).toEqual(['p2']);
      expect(result.neighbors[0]).toMatchObject({ depth: 1, via: { id: 'e1' } });
      expect(result.edges.map(e => e.id)).toEqual(['e1']);
    });

    test('should find nothing along incoming edges of the source', async () => {
      const result = await service.neighbors('kg1', 'p1', { direction: 'in' });

      expect(result.neighbors).toEqual([]);
    });

    test('should count nodes and edges before and after a cascading delete', async () => {
      expect(await service.stats('kg1')).toMatchObject({ nodeCount: 2, edgeCount: 1, density: 0.5 });

      const deleted = await service.deleteNode('kg1', 'p1');

      expect(deleted.removedEdges).toEqual(['e1']);
      expect(await service.stats('kg1')).toMatchObject({ nodeCount: 1, edgeCount: 0 });
    });

    test('should rank a name prefix match first', async () => {
      const results = await service.searchNodes('kg1', 'Ali', 10);

      expect(results.map(n => n.id)).toEqual(['p1']);
    });

    test('should search edges by relation type', async () => {
      expect((await service.searchEdges('kg1', 'know')).map(e => e.id)).toEqual(['e1']);
    });
  });

  describe('Record reads', () => {
    test('should get records by id', async () => {
      expect((await service.getNode('kg1', 'p1')).name).toBe('Alice');
      expect((await service.getEdge('kg1', 'e1')).target).toBe('p2');
    });

    test('should raise NotFoundError for missing records', async () => {
      await expect(service.getNode('kg1', 'nobody')).rejects.toBeInstanceOf(NotFoundError);
      await expect(service.getEdge('kg1', 'nothing')).rejects.toThrow('Edge nothing not found in collection kg1');
      await expect(service.neighbors('kg1', 'nobody')).rejects.toBeInstanceOf(NotFoundError);
    });

    test('should list nodes by type with paging', async () => {
      await service.createNode('kg1', { id: 'c1', name: 'Acme', type: 'Company' });

      expect((await service.listNodes('kg1')).map(n => n.id)).toEqual(['c1', 'p1', 'p2']);
      expect((await service.listNodes('kg1', { type: 'Person' })).map(n => n.id)).toEqual(['p1', 'p2']);
      expect((await service.listNodes('kg1', { limit: 1, offset: 1 })).map(n => n.id)).toEqual(['p1']);
    });

    test('should list edges touching a node', async () => {
      await service.createNode('kg1', { id: 'p3', name: 'Carol' });
      await service.createEdge('kg1', { id: 'e2', source: 'p3', target: 'p2', relationType: 'knows' });

      expect((await service.listEdges('kg1', { nodeId: 'p1' })).map(e => e.id)).toEqual(['e1']);
      expect((await service.listEdges('kg1', { relationType: 'knows' })).map(e => e.id)).toEqual(['e1', 'e2']);
    });

    test('should list collections holding records', async () => {
      await service.createNode('alpha', { id: 'a', name: 'A' });

      expect(await service.listCollections()).toEqual(['alpha', 'kg1']);
    });
  });

  describe('Paths', () => {
    beforeEach(async () => {
      await service.createNode('kg1', { id: 'p3', name: 'Carol' });
      await service.createEdge('kg1', { id: 'e2', source: 'p1', target: 'p3' });
      await service.createEdge('kg1', { id: 'e3', source: 'p3', target: 'p2' });
    });

    test('should return the shortest path', async () => {
      const path = await service.findPath('kg1', 'p1', 'p2');

      expect(path?.nodes).toEqual(['p1', 'p2']);
      expect(path?.edges.map(e => e.id)).toEqual(['e1']);
      expect(path?.length).toBe(1);
    });

    test('should report no path against the edge direction', async () => {
      expect(await service.findPath('kg1', 'p2', 'p1')).toBeNull();
      expect((await service.findPath('kg1', 'p2', 'p1', { direction: 'both' }))?.nodes).toEqual(['p2', 'p1']);
    });

    test('should list every simple path shortest first', async () => {
      const paths = await service.findAllPaths('kg1', 'p1', 'p2');

      expect(paths.map(p => p.nodes)).toEqual([['p1', 'p2'], ['p1', 'p3', 'p2']]);
      expect(await service.findAllPaths('kg1', 'p1', 'p2', { maxLength: 1 })).toHaveLength(1);
      expect(await service.findAllPaths('kg1', 'p1', 'p2', { maxPaths: 1 })).toHaveLength(1);
    });

    test('should fail for missing endpoints', async () => {
      await expect(service.findPath('kg1', 'p1', 'ghost')).rejects.toBeInstanceOf(NotFoundError);
    });

    test('should enforce the configured bounds', async () => {
      await expect(service.findPath('kg1', 'p1', 'p2', { maxLength: 11 })).rejects.toBeInstanceOf(ValidationError);
      await expect(service.neighbors('kg1', 'p1', { maxDepth: 7 })).rejects.toBeInstanceOf(ValidationError);
      await expect(service.neighbors('kg1', 'p1', { maxDepth: 0 })).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('Validation', () => {
    test('should reject bad collection names', async () => {
      await expect(service.stats('../etc')).rejects.toBeInstanceOf(ValidationError);
      await expect(service.createNode('', { name: 'X' })).rejects.toBeInstanceOf(ValidationError);
    });

    test('should reject bad search arguments', async () => {
      await expect(service.searchNodes('kg1', '   ', 10)).rejects.toBeInstanceOf(ValidationError);
      await expect(service.searchNodes('kg1', 'Ali', 0)).rejects.toBeInstanceOf(ValidationError);
      await expect(service.searchNodes('kg1', 'Ali', -1)).rejects.toBeInstanceOf(ValidationError);
      await expect(service.searchEdges('kg1', 'knows', 201)).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('Integrity', () => {
    test('should report a clean collection as valid', async () => {
      expect(await service.checkIntegrity('kg1')).toEqual({ collection: 'kg1', valid: true, danglingEdges: [] });
    });

    test('should list edges written around the engine with missing endpoints', async () => {
      await store.upsert('raw', 'node', TestHelpers.node('a', 'A', null, {}, 'raw'));
      await store.upsert('raw', 'edge', TestHelpers.edge('bad', 'a', 'ghost', null, { collection: 'raw' }));

      expect(await service.checkIntegrity('raw')).toEqual({ collection: 'raw', valid: false, danglingEdges: ['bad'] });
      expect(console.warn).toHaveBeenCalledWith('⚠️ 1 dangling edges in raw');
    });
  });

  describe('Query context', () => {
    test('should return ranked nodes, their edges and formatted context', async () => {
      const result = await service.queryContext('kg1', 'Ali');

      expect(result.query).toBe('Ali');
      expect(result.nodes.map(n => n.id)).toEqual(['p1']);
      expect(result.edges.map(e => e.id)).toEqual(['e1']);
      expect(result.context).toBe(
        ['# Knowledge Graph Context', '', '## Entity: Alice (Person)', 'Relations:', '  - knows -> Bob'].join('\n')
      );
    });

    test('should return the sentinel when nothing matches', async () => {
      const result = await service.queryContext('kg1', 'zebra');

      expect(result).toEqual({ query: 'zebra', nodes: [], edges: [], context: NO_CONTEXT_SENTINEL });
    });

    test('should cap the edges gathered per node', async () => {
      await service.createEdge('kg1', { id: 'e0', source: 'p2', target: 'p1', relationType: 'admires' });

      const result = await service.queryContext('kg1', 'Alice', { edgesPerNode: 1 });

      expect(result.edges).toHaveLength(1);
    });
  });

  describe('Concurrency', () => {
    test('should show readers the state before or after a delete, never between', async () => {
      const before = [service.stats('kg1'), service.stats('kg1'), service.stats('kg1')];
      const deletion = service.deleteNode('kg1', 'p1');
      const after = [service.stats('kg1'), service.stats('kg1')];

      const counts = (await Promise.all([...before, ...after])).map(s => [s.nodeCount, s.edgeCount]);
      await deletion;

      expect(counts).toEqual([[2, 1], [2, 1], [2, 1], [1, 0], [1, 0]]);
    });

    test('should serialize concurrent creates of the same id', async () => {
      const outcomes = await Promise.allSettled([
        service.createNode('kg1', { id: 'dup', name: 'First' }),
        service.createNode('kg1', { id: 'dup', name: 'Second' })
      ]);

      expect(outcomes.map(o => o.status)).toEqual(['fulfilled', 'rejected']);
      expect((await service.getNode('kg1', 'dup')).name).toBe('First');
    });
  });
});
