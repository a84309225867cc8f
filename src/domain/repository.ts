/**
 * Repository result domain helpers
 */
import path from 'node:path';

import type { RepositoryResult } from '../types/scan.js';

export interface RepositoryResultData {
  path: string;
  isDirty: boolean;
  isLocalOnly: boolean;
  aheadCount?: number | null;
}

/**
 * Creates an immutable repository result
 * @param data - Raw classification data
 * @returns Frozen repository result
 */
export function createRepositoryResult({
  path: repositoryPath,
  isDirty,
  isLocalOnly,
  aheadCount = null,
}: RepositoryResultData): RepositoryResult {
  if (aheadCount !== null && (!Number.isInteger(aheadCount) || aheadCount < 0)) {
    throw new RangeError(`aheadCount must be a non-negative integer, received ${aheadCount}`);
  }
  return Object.freeze({
    path: repositoryPath,
    isDirty,
    isLocalOnly,
    aheadCount,
  });
}

/**
 * Path of a repository relative to the scan root, '.' for the root itself.
 * Paths outside the root are returned unchanged.
 */
export function relativeRepositoryPath(root: string, repositoryPath: string): string {
  const relative = path.relative(root, repositoryPath);
  if (!relative) {
    return '.';
  }
  if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    return repositoryPath;
  }
  return relative;
}
