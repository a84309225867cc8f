import type { StatusEntry, WorkingTreeStatusOptions } from '../types/git.js';

export const DEFAULT_STATUS_OPTIONS: WorkingTreeStatusOptions = {
  includeUntracked: true,
  recurseUntrackedDirs: false,
  excludeSubmodules: true,
};

function untrackedMode(options: WorkingTreeStatusOptions): string {
  if (!options.includeUntracked) {
    return 'no';
  }
  return options.recurseUntrackedDirs ? 'all' : 'normal';
}

/**
 * Builds the arguments for git status --porcelain -z
 */
export function buildStatusArgs(options: WorkingTreeStatusOptions = DEFAULT_STATUS_OPTIONS): string[] {
  return [
    'status',
    '--porcelain=v1',
    '-z',
    `--untracked-files=${untrackedMode(options)}`,
    `--ignore-submodules=${options.excludeSubmodules ? 'all' : 'none'}`,
  ];
}

/**
 * Parses file statuses from git status --porcelain -z output
 */
export function parseStatusEntries(raw: string): StatusEntry[] {
  const result: StatusEntry[] = [];
  if (!raw) {
    return result;
  }

  const entries = raw.split('\0');
  for (let index = 0; index < entries.length; index += 1) {
    const entry = entries[index];
    if (!entry || entry.length < 4) {
      continue;
    }

    const code = entry.slice(0, 2);
    const filePath = entry.slice(3);

    if (code === '!!') {
      // Ignored files never make a tree dirty.
      continue;
    }

    if (code === '??') {
      result.push({
        path: filePath,
        previousPath: null,
        indexStatus: '?',
        worktreeStatus: '?',
        kind: 'untracked',
      });
      continue;
    }

    const indexStatus = code.charAt(0);
    const worktreeStatus = code.charAt(1);
    let previousPath: string | null = null;
    if (indexStatus === 'R' || indexStatus === 'C') {
      previousPath = entries[index + 1] || null;
      index += 1;
    }

    result.push({
      path: filePath,
      previousPath,
      indexStatus,
      worktreeStatus,
      kind: 'tracked',
    });
  }

  return result;
}

/**
 * Drops a trailing partial record from streamed -z output
 */
export function completeStatusRecords(raw: string): string {
  return raw.slice(0, raw.lastIndexOf('\0') + 1);
}
