#!/usr/bin/env node

import { main } from './cli.js';

// A closed pipe (e.g. `dirty-repos ~/src -r | head -1`) ends the run quietly.
process.stdout.on('error', (error: NodeJS.ErrnoException) => {
  if (error.code === 'EPIPE') {
    process.exit(0);
  }
  process.stderr.write(`${error.message}\n`);
  process.exit(1);
});

await main();
