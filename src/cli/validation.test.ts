import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  warnConfig,
  validateDepth,
  validateJobs,
  validateBoolean,
  pickFirst,
  type ConfigSource,
} from './validation.js';
import { createLogger } from '../infrastructure/logging/logger.js';

function collectingSource(configPath = 'config.json'): { source: ConfigSource; warnings: unknown[] } {
  const warnings: unknown[] = [];
  const logger = createLogger({ warn: (...args: unknown[]) => warnings.push(...args) });
  return { source: { path: configPath, logger }, warnings };
}

describe('CLI validation helpers', () => {
  it('warnConfig reports through the source logger', () => {
    const { source, warnings } = collectingSource();
    warnConfig(source, 'Test message');
    assert.deepEqual(warnings, ['Test message']);
  });

  it('validateDepth accepts non-negative integers and numeric strings', () => {
    const { source, warnings } = collectingSource();
    assert.equal(validateDepth(0, 'depth', source), 0);
    assert.equal(validateDepth(' 4 ', 'depth', source), 4);
    assert.equal(validateDepth(undefined, 'depth', source), undefined);
    assert.deepEqual(warnings, []);

    assert.equal(validateDepth(-1, 'depth', source), undefined);
    assert.equal(validateDepth('two', 'depth', source), undefined);
    assert.deepEqual(warnings, [
      'Ignoring invalid depth in config.json; expected a non-negative integer.',
      'Ignoring invalid depth in config.json; expected a non-negative integer.',
    ]);
  });

  it('validateJobs requires a positive integer', () => {
    const named = collectingSource();
    assert.equal(validateJobs(6, 'jobs', named.source), 6);
    assert.equal(validateJobs(0, 'jobs', named.source), undefined);
    assert.deepEqual(named.warnings, ['Ignoring invalid jobs in config.json; expected a positive integer.']);

    const unnamed = collectingSource('');
    assert.equal(validateJobs(2.5, 'jobs', unnamed.source), undefined);
    assert.deepEqual(unnamed.warnings, ['Ignoring invalid jobs in config; expected a positive integer.']);
  });

  it('validateBoolean accepts booleans and their string forms', () => {
    const { source, warnings } = collectingSource();
    assert.equal(validateBoolean(false, 'color', source), false);
    assert.equal(validateBoolean(' TRUE ', 'color', source), true);
    assert.equal(validateBoolean(null, 'color', source), undefined);
    assert.equal(validateBoolean('sometimes', 'color', source), undefined);

    assert.deepEqual(warnings, ['Ignoring invalid color in config.json; expected true or false.']);
  });

  it('pickFirst returns the first valid value', () => {
    const { source, warnings } = collectingSource();
    const picked = pickFirst(
      [
        { value: undefined, name: 'depth' },
        { value: -3, name: 'maxDepth' },
        { value: 2, name: 'fallback' },
      ],
      validateDepth,
      source,
    );

    assert.equal(picked, 2);
    assert.deepEqual(warnings, ['Ignoring invalid maxDepth in config.json; expected a non-negative integer.']);
  });
});
