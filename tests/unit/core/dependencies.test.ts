/**
 * Unit tests for dependency resolution
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  dependencyClosure,
  destroyOrder,
  detectCycle,
  findCycle,
  resolveOrder,
} from '../../../src/core/dependencies.js';
import { ConfigError, DependencyCycleError } from '../../../src/core/errors.js';
import { containerSpec, storeOf, vmSpec } from '../../helpers/fixtures.js';

const graph = storeOf([
  containerSpec({ id: 101, name: 'base', isTemplate: true }),
  containerSpec({ id: 102, name: 'web', cloneFrom: { id: 101 } }),
  containerSpec({ id: 103, name: 'cache', dependencies: [101] }),
  containerSpec({ id: 104, name: 'proxy', dependencies: [103, 102] }),
  vmSpec({ id: 200, name: 'db' }),
]);

describe('resolveOrder', () => {
  it('should place dependencies and clone sources first', () => {
    assert.deepStrictEqual(resolveOrder([104], graph), [101, 102, 103, 104]);
  });

  it('should break ties by ascending id', () => {
    assert.deepStrictEqual(resolveOrder([200, 101], graph), [101, 200]);
    assert.deepStrictEqual(resolveOrder(graph.ids(), graph), [101, 102, 103, 104, 200]);
  });

  it('should reject an unknown id', () => {
    assert.throws(
      () => resolveOrder([999], graph),
      (error: unknown) => error instanceof ConfigError && error.code === 'UNKNOWN_RESOURCE'
    );
  });

  it('should name the ids on a cycle', () => {
    const store = storeOf([
      containerSpec({ id: 101, dependencies: [103] }),
      containerSpec({ id: 102, dependencies: [101] }),
      containerSpec({ id: 103, dependencies: [102] }),
    ]);

    assert.throws(
      () => resolveOrder([101], store),
      (error: unknown) => {
        assert.ok(error instanceof DependencyCycleError);
        assert.deepStrictEqual(error.cycle, [101, 103, 102]);
        assert.strictEqual(error.message, 'Dependency cycle detected: 101 -> 103 -> 102 -> 101');
        return true;
      }
    );
  });

  it('should report only the cyclic part when some ids can be placed', () => {
    const store = storeOf([
      containerSpec({ id: 100 }),
      containerSpec({ id: 101, dependencies: [100, 102] }),
      containerSpec({ id: 102, dependencies: [101] }),
      containerSpec({ id: 103, dependencies: [100] }),
    ]);

    assert.throws(
      () => resolveOrder(store.ids(), store),
      (error: unknown) => error instanceof DependencyCycleError && error.cycle.join(',') === '101,102'
    );
  });
});

describe('destroyOrder', () => {
  it('should remove a clone before its template whatever the argument order', () => {
    assert.deepStrictEqual(destroyOrder([101, 102], graph), [102, 101]);
  });

  it('should reverse dependency order and leave unrequested ids out', () => {
    assert.deepStrictEqual(destroyOrder([101, 104, 200], graph), [200, 104, 101]);
  });

  it('should reject an unknown id before ordering anything', () => {
    assert.throws(
      () => destroyOrder([102, 999], graph),
      (error: unknown) => error instanceof ConfigError && error.code === 'UNKNOWN_RESOURCE'
    );
  });
});

describe('dependencyClosure', () => {
  it('should collect transitive dependencies only', () => {
    assert.deepStrictEqual([...dependencyClosure([102], graph)].sort(), [101, 102]);
  });
});

describe('detectCycle', () => {
  it('should return null for an acyclic graph', () => {
    assert.strictEqual(findCycle(graph), null);
  });

  it('should find a self-dependency', () => {
    assert.deepStrictEqual(detectCycle([5], () => [5]), [5]);
  });

  it('should start from the smallest id', () => {
    const edges = new Map<number, number[]>([
      [3, [1]],
      [1, [2]],
      [2, [3]],
    ]);

    assert.deepStrictEqual(detectCycle([3, 2, 1], (id) => edges.get(id) ?? []), [1, 2, 3]);
  });
});
