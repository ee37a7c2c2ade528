/**
 * Tests for toposort utility.
 *
 * Verifies Kahn's algorithm for resource ordering:
 * - Empty input, single item
 * - Linear chains, diamond dependencies
 * - Unknown dependencies rejected
 * - Cycle detection with the cycle path in the error
 * - Declaration order tiebreaker for independent items
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { toposort, CycleError, UnknownDependencyError, ConfigError } from '@provision/core';
import type { ToposortItem } from '@provision/core';

describe('toposort', () => {
  it('should return empty array for empty input', () => {
    assert.deepStrictEqual(toposort([]), []);
  });

  it('should return single item with no deps', () => {
    const items: ToposortItem[] = [{ id: 'A', dependencies: [] }];
    assert.deepStrictEqual(toposort(items), ['A']);
  });

  it('should sort linear chain declared backwards', () => {
    const items: ToposortItem[] = [
      { id: 'C', dependencies: ['B'] },
      { id: 'A', dependencies: [] },
      { id: 'B', dependencies: ['A'] },
    ];
    assert.deepStrictEqual(toposort(items), ['A', 'B', 'C']);
  });

  it('should handle diamond dependency (A -> B,C -> D)', () => {
    const items: ToposortItem[] = [
      { id: 'D', dependencies: ['B', 'C'] },
      { id: 'B', dependencies: ['A'] },
      { id: 'C', dependencies: ['A'] },
      { id: 'A', dependencies: [] },
    ];
    assert.deepStrictEqual(toposort(items), ['A', 'B', 'C', 'D']);
  });

  it('should keep declaration order for independent items', () => {
    const items: ToposortItem[] = [
      { id: 'filevault', dependencies: [] },
      { id: 'remote-login', dependencies: [] },
      { id: 'power-sleep', dependencies: [] },
    ];
    assert.deepStrictEqual(toposort(items), ['filevault', 'remote-login', 'power-sleep']);
  });

  it('should place a dependent right after its last prerequisite becomes free', () => {
    const items: ToposortItem[] = [
      { id: 'firewall', dependencies: ['pkg', 'daemon'] },
      { id: 'daemon', dependencies: ['pkg'] },
      { id: 'pkg', dependencies: [] },
    ];
    assert.deepStrictEqual(toposort(items), ['pkg', 'daemon', 'firewall']);
  });

  it('should ignore duplicate entries in a dependency list', () => {
    const items: ToposortItem[] = [
      { id: 'A', dependencies: [] },
      { id: 'B', dependencies: ['A', 'A'] },
    ];
    assert.deepStrictEqual(toposort(items), ['A', 'B']);
  });

  it('should be deterministic across calls', () => {
    const items: ToposortItem[] = [
      { id: 'x', dependencies: [] },
      { id: 'y', dependencies: ['x'] },
      { id: 'z', dependencies: [] },
      { id: 'w', dependencies: ['z', 'x'] },
    ];
    const first = toposort(items);
    assert.deepStrictEqual(first, ['x', 'z', 'y', 'w']);
    assert.deepStrictEqual(toposort(items), first);
  });

  it('should reject an unknown dependency', () => {
    const items: ToposortItem[] = [{ id: 'go', dependencies: ['homebrew'] }];
    assert.throws(
      () => toposort(items),
      (err: unknown) => {
        assert.ok(err instanceof UnknownDependencyError);
        assert.ok(err instanceof ConfigError);
        assert.strictEqual(err.code, 'ERR_UNKNOWN_DEPENDENCY');
        assert.strictEqual(err.message, 'Resource "go" depends on unknown resource "homebrew"');
        return true;
      }
    );
  });

  it('should detect a two-node cycle and name it', () => {
    const items: ToposortItem[] = [
      { id: 'A', dependencies: ['B'] },
      { id: 'B', dependencies: ['A'] },
    ];
    assert.throws(
      () => toposort(items),
      (err: unknown) => {
        assert.ok(err instanceof CycleError);
        assert.strictEqual(err.code, 'ERR_DEPENDENCY_CYCLE');
        assert.deepStrictEqual(err.cycle, ['A', 'B', 'A']);
        assert.strictEqual(err.message, 'Dependency cycle detected: A -> B -> A');
        return true;
      }
    );
  });

  it('should detect a self-dependency', () => {
    assert.throws(
      () => toposort([{ id: 'A', dependencies: ['A'] }]),
      (err: unknown) => err instanceof CycleError && err.cycle.join(',') === 'A,A'
    );
  });

  it('should report only the cycle when other items are fine', () => {
    const items: ToposortItem[] = [
      { id: 'ok', dependencies: [] },
      { id: 'tail', dependencies: ['x'] },
      { id: 'x', dependencies: ['y'] },
      { id: 'y', dependencies: ['z'] },
      { id: 'z', dependencies: ['x'] },
    ];
    assert.throws(
      () => toposort(items),
      (err: unknown) => {
        assert.ok(err instanceof CycleError);
        assert.deepStrictEqual(err.cycle, ['x', 'y', 'z', 'x']);
        return true;
      }
    );
  });
});
