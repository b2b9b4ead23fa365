import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { checkCommand } from '../../src/commands/check.js';
import { orderCommand } from '../../src/commands/order.js';
import { reportCommand } from '../../src/commands/report.js';
import { ConstraintParseError } from '../../src/utils/errors.js';
import { createCapturingOutput, createFixtureDir } from '../test-helpers.js';

const FILES = {
  'depsolve.jsonc': '{ "repositories": [{ "name": "main", "index": "main.yml" }] }',
  'main.yml': [
    'packages:',
    '  - name: app',
    '    version: "1.0.0"',
    '    dependencies: [lib, ghost]',
    '  - name: lib',
    '    version: "2.0.0"'
  ].join('\n')
};

describe('Commands', () => {
  describe('check', () => {
    it('reports whether the version satisfies the constraint', () => {
      const { output, events } = createCapturingOutput();
      assert.equal(checkCommand('^1.2.3', '1.9.9', output), true);
      assert.equal(checkCommand('^1.2.3', '2.0.0', output), false);
      assert.deepStrictEqual(events, [
        { kind: 'success', text: '1.9.9 satisfies ^1.2.3' },
        { kind: 'error', text: '2.0.0 does not satisfy ^1.2.3' }
      ]);
    });

    it('throws for an invalid constraint', () => {
      const { output } = createCapturingOutput();
      assert.throws(() => checkCommand('~>1.0', '1.0.0', output), ConstraintParseError);
    });
  });

  describe('order', () => {
    it('prints one package per line and the missing ones', async () => {
      const fixture = createFixtureDir(FILES);
      try {
        const { output, events } = createCapturingOutput();
        await orderCommand(['app'], {}, fixture.dir, output);
        assert.deepStrictEqual(events, [
          { kind: 'message', text: 'lib' },
          { kind: 'message', text: 'ghost' },
          { kind: 'message', text: 'app' },
          { kind: 'warn', text: 'Missing packages: ghost' }
        ]);
      } finally {
        fixture.cleanup();
      }
    });
  });

  describe('report', () => {
    it('prints the report as JSON', async () => {
      const fixture = createFixtureDir(FILES);
      try {
        const { output, events } = createCapturingOutput();
        await reportCommand(['app'], { json: true }, fixture.dir, output);

        assert.equal(events.length, 1);
        const json: unknown = JSON.parse(events[0].text);
        assert.ok(typeof json === 'object' && json !== null);
        assert.deepStrictEqual(Reflect.get(json, 'installation_order'), ['lib', 'ghost', 'app']);
        assert.deepStrictEqual(Reflect.get(json, 'missing_packages'), ['ghost']);
      } finally {
        fixture.cleanup();
      }
    });

    it('displays the report as text', async () => {
      const fixture = createFixtureDir(FILES);
      try {
        const { output, events } = createCapturingOutput();
        await reportCommand(['app'], {}, fixture.dir, output);

        assert.deepStrictEqual(events[0], { kind: 'info', text: 'app@1.0.0\n├── lib@2.0.0\n└── ghost' });
        assert.deepStrictEqual(events[events.length - 1], { kind: 'success', text: 'Total: 3 packages' });
      } finally {
        fixture.cleanup();
      }
    });
  });
});
