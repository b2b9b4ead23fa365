import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { DependencyGraph } from '../../../src/core/dependency-resolver/graph.js';

function assertDependenciesFirst(graph: DependencyGraph, order: string[]): void {
  for (const edge of graph.edges()) {
    assert.ok(
      order.indexOf(edge.target.name) < order.indexOf(edge.source.name),
      `${edge.target.name} should come before ${edge.source.name}`
    );
  }
}

function diamond(): DependencyGraph {
  const graph = new DependencyGraph();
  graph.addEdge('a', 'b');
  graph.addEdge('a', 'c');
  graph.addEdge('b', 'd');
  graph.addEdge('c', 'd');
  return graph;
}

describe('DependencyGraph', () => {
  describe('nodes', () => {
    it('fills in a missing version', () => {
      const graph = new DependencyGraph();
      graph.addNode('a');
      graph.addNode('a', '1.0.0');
      assert.equal(graph.getNode('a')?.version, '1.0.0');
      assert.equal(graph.size, 1);
    });

    it('keeps the first known version', () => {
      const graph = new DependencyGraph();
      graph.addNode('a', '1.0.0');
      graph.addNode('a', '2.0.0');
      assert.equal(graph.getNode('a')?.version, '1.0.0');
    });

    it('creates both ends of an edge', () => {
      const graph = new DependencyGraph();
      graph.addEdge('app', 'lib', '>=1.0.0');
      assert.deepStrictEqual(graph.nodeNames(), ['app', 'lib']);
      assert.equal(graph.getDependents('lib')[0].source.name, 'app');
      assert.equal(graph.getDependencies('app')[0].constraint, '>=1.0.0');
    });

    it('keeps parallel edges but counts distinct targets', () => {
      const graph = new DependencyGraph();
      graph.addEdge('a', 'b', '>=1.0.0');
      graph.addEdge('a', 'b', '<2.0.0');
      assert.equal(graph.edges().length, 2);
      assert.equal(graph.outDegree('a'), 1);
    });
  });

  describe('topologicalOrder', () => {
    it('puts dependencies before dependents', () => {
      const graph = diamond();
      const order = graph.topologicalOrder();
      assert.deepStrictEqual(order, ['d', 'b', 'c', 'a']);
      assertDependenciesFirst(graph, order ?? []);
    });

    it('keeps insertion order among independent packages', () => {
      const graph = new DependencyGraph();
      graph.addNode('z');
      graph.addNode('y');
      graph.addNode('x');
      assert.deepStrictEqual(graph.topologicalOrder(), ['z', 'y', 'x']);
    });

    it('returns null when a cycle remains', () => {
      const graph = new DependencyGraph();
      graph.addEdge('a', 'b');
      graph.addEdge('b', 'a');
      assert.equal(graph.topologicalOrder(), null);
    });
  });

  describe('detectCycles', () => {
    it('finds nothing in an acyclic graph', () => {
      assert.deepStrictEqual(diamond().detectCycles(), []);
    });

    it('finds a self loop', () => {
      const graph = new DependencyGraph();
      graph.addEdge('a', 'a');
      assert.deepStrictEqual(graph.detectCycles(), [['a']]);
    });

    it('lists each cycle from its earliest-added package', () => {
      const graph = new DependencyGraph();
      graph.addEdge('a', 'b');
      graph.addEdge('b', 'a');
      graph.addEdge('b', 'c');
      graph.addEdge('c', 'b');
      assert.deepStrictEqual(graph.detectCycles(), [['a', 'b'], ['b', 'c']]);
    });
  });

  describe('breakCycles', () => {
    it('removes the first all-optional link of each cycle', () => {
      const graph = new DependencyGraph();
      graph.addEdge('a', 'b', undefined, true);
      graph.addEdge('b', 'c');
      graph.addEdge('c', 'a');

      const removed = graph.breakCycles();
      assert.deepStrictEqual(removed.map(edge => [edge.source.name, edge.target.name]), [['a', 'b']]);
      assert.equal(graph.hasEdge('a', 'b'), false);
      assert.deepStrictEqual(graph.topologicalOrder(), ['a', 'c', 'b']);
    });

    it('leaves a cycle without optional links', () => {
      const graph = new DependencyGraph();
      graph.addEdge('a', 'b');
      graph.addEdge('b', 'a');
      assert.deepStrictEqual(graph.breakCycles(), []);
      assert.equal(graph.topologicalOrder(), null);
    });

    it('does not break a link that also has a required edge', () => {
      const graph = new DependencyGraph();
      graph.addEdge('a', 'b', undefined, true);
      graph.addEdge('a', 'b');
      graph.addEdge('b', 'a');
      assert.deepStrictEqual(graph.breakCycles(), []);
    });
  });

  describe('resolveOrdering', () => {
    it('returns a plain topological order when there is no cycle', () => {
      assert.deepStrictEqual(diamond().resolveOrdering(), {
        order: ['d', 'b', 'c', 'a'],
        degraded: false,
        cycles: [],
        removedEdges: []
      });
    });

    it('breaks a cycle through an optional edge and orders every package once', () => {
      const graph = new DependencyGraph();
      graph.addEdge('a', 'b', undefined, true);
      graph.addEdge('b', 'c');
      graph.addEdge('c', 'a');

      const result = graph.resolveOrdering();
      assert.equal(result.degraded, false);
      assert.deepStrictEqual(result.order, ['a', 'c', 'b']);
      assert.deepStrictEqual(result.cycles, [['a', 'b', 'c']]);
      assert.equal(result.removedEdges.length, 1);
      assertDependenciesFirst(graph, result.order);
    });

    it('falls back to out-degree order for an unbreakable cycle', () => {
      const graph = new DependencyGraph();
      graph.addEdge('A', 'B');
      graph.addEdge('B', 'C');
      graph.addEdge('C', 'A');
      graph.addEdge('B', 'D', undefined, true);

      const result = graph.resolveOrdering();
      assert.equal(result.degraded, true);
      assert.deepStrictEqual(result.order, ['D', 'A', 'C', 'B']);
      assert.deepStrictEqual(result.cycles, [['A', 'B', 'C']]);
      assert.deepStrictEqual(result.removedEdges, []);
    });
  });

  describe('long cycles', () => {
    it('orders a 20,000 package ring without exhausting the stack', () => {
      const size = 20_000;
      const graph = new DependencyGraph();
      for (let i = 0; i < size; i++) {
        graph.addEdge(`p${i}`, `p${(i + 1) % size}`);
      }

      const result = graph.resolveOrdering();
      assert.equal(result.degraded, true);
      assert.equal(result.order.length, size);
      assert.equal(result.cycles.length, 1);
      assert.equal(result.cycles[0].length, size);
      assert.equal(result.cycles[0][0], 'p0');
      assert.equal(result.cycles[0][size - 1], `p${size - 1}`);
    });
  });

  describe('clone', () => {
    it('copies nodes and edges independently', () => {
      const graph = new DependencyGraph();
      graph.addNode('a', '1.0.0');
      graph.addEdge('a', 'b', '^1.0.0', true);

      const copy = graph.clone();
      assert.equal(copy.getNode('a')?.version, '1.0.0');
      assert.deepStrictEqual(copy.getDependencies('a').map(edge => edge.optional), [true]);

      copy.removeEdges('a', 'b');
      assert.equal(copy.hasEdge('a', 'b'), false);
      assert.equal(graph.hasEdge('a', 'b'), true);
    });
  });
});
