import fs from 'node:fs/promises';

import { DEFAULT_DEPTH, PROGRAM_NAME } from './constants.js';

const PACKAGE_JSON_URL = new URL('../../package.json', import.meta.url);

export function getHelpText(): string {
  return `Usage: ${PROGRAM_NAME} [options] <path>

List git repos, their dirty status, and whether they're local-only.

Arguments:
  <path>                 Directory to scan

Options:
  -L, --depth <n>        Max depth to search for repos (default: ${DEFAULT_DEPTH})
  -d, --dirty            Only show dirty repos
  -l, --local            Only show local-only repos (no remotes)
      --unpushed         Only show repos with unpushed commits (ahead of upstream);
                         resolving upstream branches is slower, so counts are only
                         computed with this flag
  -r, --raw              Raw output for piping (one path per line)
  -j, --jobs <n>         Repositories inspected in parallel (default: CPU count)
      --no-color         Disable coloured output (also honours NO_COLOR)
      --verbose          Log skipped directories and repositories to stderr
  -h, --help             Display this help message
  -v, --version          Output the version number
`;
}

export async function readPackageVersion(): Promise<string> {
  const raw = await fs.readFile(PACKAGE_JSON_URL, 'utf8');
  const pkg: unknown = JSON.parse(raw);
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}
