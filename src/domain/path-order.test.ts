import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { comparePaths, sortPaths } from './path-order.js';

describe('path-order', () => {
  it('compares component by component', () => {
    assert.ok(comparePaths('/src/a/b', '/src/a-b') < 0);
    assert.ok(comparePaths('/src/a-b', '/src/a/b') > 0);
    assert.equal(comparePaths('/src/a', '/src/a'), 0);
  });

  it('places a parent before its descendants', () => {
    assert.ok(comparePaths('/src/a', '/src/a/b') < 0);
  });

  it('sorts by code unit, uppercase first', () => {
    assert.deepEqual(sortPaths(['/r/b', '/r/a-b', '/r/a/b', '/r/B']), ['/r/B', '/r/a/b', '/r/a-b', '/r/b']);
  });

  it('does not modify its input', () => {
    const input = ['/r/b', '/r/a'];
    sortPaths(input);
    assert.deepEqual(input, ['/r/b', '/r/a']);
  });
});
