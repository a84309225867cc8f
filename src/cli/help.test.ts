import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import { describe, it } from 'node:test';

import { getHelpText, readPackageVersion } from './help.js';

describe('CLI help utilities', () => {
  it('describes usage and every option', () => {
    const text = getHelpText();

    assert.ok(text.startsWith('Usage: dirty-repos [options] <path>\n'));
    for (const flag of ['--depth', '--dirty', '--local', '--unpushed', '--raw', '--jobs', '--no-color', '--help', '--version']) {
      assert.ok(text.includes(flag), flag);
    }
    assert.match(text, /\(default: 3\)/);
  });

  it('reads the version from package metadata', async () => {
    const raw = await fs.readFile(new URL('../../package.json', import.meta.url), 'utf8');
    const pkg: unknown = JSON.parse(raw);
    assert.ok(typeof pkg === 'object' && pkg !== null && 'version' in pkg);

    assert.equal(await readPackageVersion(), pkg.version);
  });
});
