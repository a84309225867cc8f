import assert from 'node:assert/strict';
import path from 'node:path';
import { describe, it } from 'node:test';

import { createRepositoryResult, relativeRepositoryPath } from './repository.js';

describe('repository result', () => {
  it('defaults the ahead count to unknown and freezes the result', () => {
    const result = createRepositoryResult({ path: '/src/app', isDirty: true, isLocalOnly: false });

    assert.deepEqual(result, { path: '/src/app', isDirty: true, isLocalOnly: false, aheadCount: null });
    assert.equal(Object.isFrozen(result), true);
  });

  it('keeps a zero ahead count distinct from an unknown one', () => {
    const result = createRepositoryResult({ path: '/src/app', isDirty: false, isLocalOnly: false, aheadCount: 0 });
    assert.equal(result.aheadCount, 0);
  });

  it('rejects negative or fractional ahead counts', () => {
    assert.throws(
      () => createRepositoryResult({ path: '/src/app', isDirty: false, isLocalOnly: false, aheadCount: -1 }),
      RangeError
    );
    assert.throws(
      () => createRepositoryResult({ path: '/src/app', isDirty: false, isLocalOnly: false, aheadCount: 1.5 }),
      RangeError
    );
  });
});

describe('relativeRepositoryPath', () => {
  it('strips the scan root', () => {
    assert.equal(relativeRepositoryPath('/src', '/src/tools/cli'), path.join('tools', 'cli'));
  });

  it('shows the root itself as a dot', () => {
    assert.equal(relativeRepositoryPath('/src', '/src'), '.');
  });

  it('keeps paths outside the root absolute', () => {
    assert.equal(relativeRepositoryPath('/src', '/elsewhere/app'), '/elsewhere/app');
    assert.equal(relativeRepositoryPath('/src/a', '/src'), '/src');
  });
});
