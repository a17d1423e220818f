/**
 * Unit tests for graph traversal algorithms
 *
 * Tests include:
 * - Breadth-first neighbor expansion with direction and depth bounds
 * - First-discovered depth and edge tracking
 * - Relationship type filtering
 * - Shortest path discovery and its deterministic tie-break
 * - All simple paths discovery
 */

import { MaterializedGraph } from '../../core/graph.js';
import { GraphTraversal } from '../../core/traversal.js';
import { TestHelpers } from '../setup.js';

const { node, edge } = TestHelpers;

describe('GraphTraversal', () => {
  // Test graph structure:
  //     A
  //   /   \
  //  B     C
  //  |     |
  //  D --> E
  //       / \
  //      F   G
  const graph = new MaterializedGraph(
    'kg1',
    ['A', 'B', 'C', 'D', 'E', 'F', 'G'].map(name => node(name, name, 'test')),
    [
      edge('eAB', 'A', 'B', 'parent_child'),
      edge('eAC', 'A', 'C', 'parent_child'),
      edge('eBD', 'B', 'D', 'sibling'),
      edge('eCE', 'C', 'E', 'sibling'),
      edge('eDE', 'D', 'E', 'connects'),
      edge('eEF', 'E', 'F', 'parent_child'),
      edge('eEG', 'E', 'G', 'parent_child')
    ]
  );
  const traversal = new GraphTraversal(graph);

  describe('Neighbor expansion', () => {
    test('should return direct successors at depth 1', () => {
      const result = traversal.expandNeighbors('A', { direction: 'out', maxDepth: 1 });

      expect(result?.neighbors.map(n => [n.node.id, n.depth, n.via.id])).toEqual([
        ['B', 1, 'eAB'],
        ['C', 1, 'eAC']
      ]);
      expect(result?.edges.map(e => e.id)).toEqual(['eAB', 'eAC']);
    });

    test('should keep the first-discovered depth for nodes reachable twice', () => {
      const result = traversal.expandNeighbors('A', { direction: 'out', maxDepth: 3 });

      expect(result?.neighbors.map(n => [n.node.id, n.depth])).toEqual([
        ['B', 1],
        ['C', 1],
        ['D', 2],
        ['E', 2],
        ['F', 3],
        ['G', 3]
      ]);
      expect(result?.edges.map(e => e.id)).toEqual(['eAB', 'eAC', 'eBD', 'eCE', 'eDE', 'eEF', 'eEG']);
    });

    test('should follow edges backwards for direction in', () => {
      const result = traversal.expandNeighbors('E', { direction: 'in', maxDepth: 1 });

      expect(result?.neighbors.map(n => n.node.id)).toEqual(['C', 'D']);
    });

    test('should merge both directions in edge id order', () => {
      const result = traversal.expandNeighbors('D', { direction: 'both', maxDepth: 1 });

      expect(result?.neighbors.map(n => n.node.id)).toEqual(['B', 'E']);
    });

    test('should only follow the requested relation types', () => {
      const result = traversal.expandNeighbors('A', {
        direction: 'out',
        maxDepth: 3,
        relationTypes: ['parent_child']
      });

      expect(result?.neighbors.map(n => n.node.id)).toEqual(['B', 'C']);
    });

    test('should stop adding nodes once maxNodes is reached', () => {
      const result = traversal.expandNeighbors('A', { direction: 'out', maxDepth: 3, maxNodes: 3 });

      expect(result?.neighbors.map(n => n.node.id)).toEqual(['B', 'C', 'D']);
    });

    test('should never include the start node', () => {
      const cyclic = new MaterializedGraph(
        'kg1',
        [node('x', 'X'), node('y', 'Y')],
        [edge('e1', 'x', 'y'), edge('e2', 'y', 'x')]
      );
      const result = new GraphTraversal(cyclic).expandNeighbors('x', { direction: 'out', maxDepth: 5 });

      expect(result?.neighbors.map(n => n.node.id)).toEqual(['y']);
      expect(result?.edges.map(e => e.id)).toEqual(['e1', 'e2']);
    });

    test('should return undefined for an unknown start node', () => {
      expect(traversal.expandNeighbors('Z', { direction: 'out', maxDepth: 1 })).toBeUndefined();
    });
  });

  describe('Shortest path', () => {
    test('should find the path with the fewest hops', () => {
      const path = traversal.findShortestPath('A', 'E', { maxLength: 5 });

      expect(path?.nodes).toEqual(['A', 'C', 'E']);
      expect(path?.edges.map(e => e.id)).toEqual(['eAC', 'eCE']);
      expect(path?.length).toBe(2);
    });

    test('should return null when the target is beyond maxLength', () => {
      expect(traversal.findShortestPath('A', 'G', { maxLength: 2 })).toBeNull();
      expect(traversal.findShortestPath('A', 'G', { maxLength: 3 })?.nodes).toEqual(['A', 'C', 'E', 'G']);
    });

    test('should respect edge direction', () => {
      expect(traversal.findShortestPath('G', 'A', { maxLength: 5 })).toBeNull();
      expect(traversal.findShortestPath('G', 'A', { maxLength: 5, direction: 'in' })?.nodes)
        .toEqual(['G', 'E', 'C', 'A']);
    });

    test('should return a zero-length path from a node to itself', () => {
      expect(traversal.findShortestPath('B', 'B', { maxLength: 1 })).toEqual({ nodes: ['B'], edges: [], length: 0 });
    });

    test('should break ties by edge id', () => {
      const diamond = new MaterializedGraph(
        'kg1',
        [node('s', 'S'), node('m1', 'M1'), node('m2', 'M2'), node('t', 'T')],
        [edge('b', 's', 'm2'), edge('a', 's', 'm1'), edge('c', 'm1', 't'), edge('d', 'm2', 't')]
      );

      expect(new GraphTraversal(diamond).findShortestPath('s', 't', { maxLength: 2 })?.nodes).toEqual(['s', 'm1', 't']);
    });
  });

  describe('All paths', () => {
    test('should list every simple path shortest first', () => {
      const paths = traversal.findAllPaths('A', 'E', { maxLength: 10, maxPaths: 10 });

      expect(paths.map(p => p.nodes)).toEqual([
        ['A', 'C', 'E'],
        ['A', 'B', 'D', 'E']
      ]);
    });

    test('should cap the number of paths', () => {
      const paths = traversal.findAllPaths('A', 'E', { maxLength: 10, maxPaths: 1 });

      expect(paths.map(p => p.nodes)).toEqual([['A', 'C', 'E']]);
    });

    test('should respect maxLength', () => {
      expect(traversal.findAllPaths('A', 'E', { maxLength: 2, maxPaths: 10 }).map(p => p.length)).toEqual([2]);
    });

    test('should collapse parallel edges onto the lowest edge id', () => {
      const parallel = new MaterializedGraph(
        'kg1',
        [node('x', 'X'), node('y', 'Y')],
        [edge('e2', 'x', 'y'), edge('e1', 'x', 'y')]
      );
      const paths = new GraphTraversal(parallel).findAllPaths('x', 'y', { maxLength: 1, maxPaths: 10 });

      expect(paths).toHaveLength(1);
      expect(paths[0]?.edges.map(e => e.id)).toEqual(['e1']);
    });

    test('should return nothing when the target is unreachable', () => {
      expect(traversal.findAllPaths('F', 'A', { maxLength: 10, maxPaths: 10 })).toEqual([]);
    });

    describe('Dense graphs', () => {
      function completeGraph(size: number): MaterializedGraph {
        const ids = Array.from({ length: size }, (_, i) => `n${String(i).padStart(2, '0')}`);
        const edges = ids.flatMap(source =>
          ids.filter(target => target !== source).map(target => edge(`${source}-${target}`, source, target))
        );
        return new MaterializedGraph('kg1', ids.map(id => node(id, id)), edges);
      }

      test('should order equal-length paths by node sequence', () => {
        const paths = new GraphTraversal(completeGraph(5)).findAllPaths('n00', 'n04', { maxLength: 4, maxPaths: 3 });

        expect(paths.map(p => p.nodes)).toEqual([
          ['n00', 'n04'],
          ['n00', 'n01', 'n04'],
          ['n00', 'n02', 'n04']
        ]);
      });

      test('should stop once the quota is filled by short paths', () => {
        const started = Date.now();
        const paths = new GraphTraversal(completeGraph(12)).findAllPaths('n00', 'n11', { maxLength: 10, maxPaths: 2 });

        expect(paths.map(p => p.nodes)).toEqual([['n00', 'n11'], ['n00', 'n01', 'n11']]);
        expect(Date.now() - started).toBeLessThan(1000);
      });
    });
  });
});
