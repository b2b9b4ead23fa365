import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { DependencyGraph } from '../../../src/core/dependency-resolver/graph.js';
import {
  areRequirementsCompatible,
  checkVersionConflicts,
  compareRequirements
} from '../../../src/core/dependency-resolver/conflict-detector.js';
import { ConstraintParseError } from '../../../src/utils/errors.js';

describe('Conflict detection', () => {
  describe('compareRequirements', () => {
    it('flags a lower bound above an upper bound in either order', () => {
      assert.deepStrictEqual(compareRequirements('>=2.0.0', '<=1.0.0'), { success: true, compatible: false });
      assert.deepStrictEqual(compareRequirements('<=1.0.0', '>=2.0.0'), { success: true, compatible: false });
      assert.deepStrictEqual(compareRequirements('>=1.0.0', '<=1.0.0'), { success: true, compatible: true });
    });

    it('flags strict bounds that cannot overlap', () => {
      assert.deepStrictEqual(compareRequirements('>2.0.0', '<2.0.0'), { success: true, compatible: false });
      assert.deepStrictEqual(compareRequirements('<1.0.0', '>0.5.0'), { success: true, compatible: true });
    });

    it('flags differing pins', () => {
      assert.deepStrictEqual(compareRequirements('==1.0.0', '==1.1.0'), { success: true, compatible: false });
      assert.deepStrictEqual(compareRequirements('==1.0.0', '==1.0'), { success: true, compatible: true });
    });

    it('assumes compatibility for operators it does not compare', () => {
      assert.deepStrictEqual(compareRequirements('^1.0.0', '==2.0.0'), { success: true, compatible: true });
      assert.deepStrictEqual(compareRequirements('!=1.0.0', '==1.0.0'), { success: true, compatible: true });
      assert.deepStrictEqual(compareRequirements('>=1.0.0', '>=3.0.0'), { success: true, compatible: true });
    });

    it('reports an unreadable version as an error', () => {
      const result = compareRequirements('>=abc', '<=1.0.0');
      assert.equal(result.success, false);
      if (!result.success) {
        assert.ok(result.error instanceof ConstraintParseError);
      }
    });
  });

  describe('areRequirementsCompatible', () => {
    it('treats unreadable requirements as compatible', () => {
      assert.equal(areRequirementsCompatible('>=abc', '<=1.0.0'), true);
      assert.equal(areRequirementsCompatible('>=2.0.0', '<=1.0.0'), false);
    });
  });

  describe('checkVersionConflicts', () => {
    it('reports both requirers of an impossible pair', () => {
      const graph = new DependencyGraph();
      graph.addEdge('A', 'X', '>=2.0.0');
      graph.addEdge('B', 'X', '<=1.0.0');

      const description = 'Incompatible requirements: >=2.0.0 vs <=1.0.0';
      assert.deepStrictEqual(checkVersionConflicts(graph), [
        {
          packageName: 'X',
          conflicts: [
            { requiringPackage: 'A', requiredVersion: '>=2.0.0', description },
            { requiringPackage: 'B', requiredVersion: '<=1.0.0', description }
          ]
        }
      ]);
    });

    it('lists every first side before every second side', () => {
      const graph = new DependencyGraph();
      graph.addEdge('A', 'X', '>=2.0.0');
      graph.addEdge('B', 'X', '<=1.0.0');
      graph.addEdge('C', 'X', '<=1.5.0');

      const [conflict] = checkVersionConflicts(graph);
      assert.deepStrictEqual(
        conflict.conflicts.map(detail => [detail.requiringPackage, detail.description]),
        [
          ['A', 'Incompatible requirements: >=2.0.0 vs <=1.0.0'],
          ['A', 'Incompatible requirements: >=2.0.0 vs <=1.5.0'],
          ['B', 'Incompatible requirements: >=2.0.0 vs <=1.0.0'],
          ['C', 'Incompatible requirements: >=2.0.0 vs <=1.5.0']
        ]
      );
    });

    it('ignores compatible, unconstrained and duplicate requirements', () => {
      const graph = new DependencyGraph();
      graph.addEdge('A', 'X', '>=1.0.0');
      graph.addEdge('B', 'X', '<=2.0.0');
      graph.addEdge('C', 'X');
      graph.addEdge('D', 'Y', '>=2.0.0');
      graph.addEdge('D', 'Y', '>=2.0.0');
      assert.deepStrictEqual(checkVersionConflicts(graph), []);
    });

    it('does not let an unreadable requirement produce a conflict', () => {
      const graph = new DependencyGraph();
      graph.addEdge('A', 'X', '>=banana');
      graph.addEdge('B', 'X', '<=1.0.0');
      assert.deepStrictEqual(checkVersionConflicts(graph), []);
    });
  });
});
