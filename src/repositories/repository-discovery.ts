import fs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import path from 'node:path';

import { PathUnavailableError, ValidationError, extractErrorMessage } from '../infrastructure/errors/index.js';
import { createSilentLogger, type Logger } from '../infrastructure/logging/logger.js';
import { sortPaths } from '../domain/path-order.js';

export const REPOSITORY_MARKER = '.git';

interface RepositoryDiscoveryDependencies {
  readDirectory: (dir: string) => Promise<Dirent[]>;
}

type RepositoryDiscoveryDependencyOverrides = Partial<RepositoryDiscoveryDependencies>;

const repositoryDiscoveryDependencies: RepositoryDiscoveryDependencies = {
  readDirectory: (dir) => fs.readdir(dir, { withFileTypes: true }),
};

let repositoryDiscoveryTestOverrides: RepositoryDiscoveryDependencyOverrides | null = null;

function resolveRepositoryDiscoveryDependency<K extends keyof RepositoryDiscoveryDependencies>(
  key: K
): RepositoryDiscoveryDependencies[K] {
  const overrides: RepositoryDiscoveryDependencyOverrides = repositoryDiscoveryTestOverrides || {};
  return overrides[key] ?? repositoryDiscoveryDependencies[key];
}

export function __setRepositoryDiscoveryTestOverrides(overrides?: RepositoryDiscoveryDependencyOverrides): void {
  repositoryDiscoveryTestOverrides = overrides ?? null;
}

export interface DiscoveryOptions {
  logger?: Logger;
}

/**
 * Resolves the scan root to its canonical absolute form
 * @param root - Root as given by the user
 * @returns Canonical path with symlinks resolved
 * @throws {PathUnavailableError} If the root cannot be resolved
 */
export async function resolveScanRoot(root: string): Promise<string> {
  try {
    return await fs.realpath(path.resolve(root));
  } catch (error: unknown) {
    throw new PathUnavailableError(root, error instanceof Error ? error : null);
  }
}

/**
 * Checks if a directory holds repository metadata
 */
export async function hasRepositoryMarker(dir: string): Promise<boolean> {
  try {
    await fs.stat(path.join(dir, REPOSITORY_MARKER));
    return true;
  } catch {
    return false;
  }
}

async function collectRepositories(
  dir: string,
  maxDepth: number,
  depth: number,
  repositories: string[],
  logger: Logger
): Promise<void> {
  if (depth > maxDepth) {
    return;
  }

  if (await hasRepositoryMarker(dir)) {
    repositories.push(dir);
    return;
  }

  const readDirectory = resolveRepositoryDiscoveryDependency('readDirectory');
  let entries: Dirent[];
  try {
    entries = await readDirectory(dir);
  } catch (error: unknown) {
    logger.debug(`Skipping unreadable directory ${dir}: ${extractErrorMessage(error)}`);
    return;
  }

  for (const entry of entries) {
    // Dirent types come from lstat, so symlinked directories are never followed.
    if (!entry.isDirectory()) {
      continue;
    }
    // eslint-disable-next-line no-await-in-loop
    await collectRepositories(path.join(dir, entry.name), maxDepth, depth + 1, repositories, logger);
  }
}

/**
 * Discovers repository roots beneath a directory
 * @param root - Directory to scan
 * @param maxDepth - Number of directory levels below the root to search
 * @param options - Discovery options
 * @returns Repository roots sorted in path order
 * @throws {PathUnavailableError} If the root cannot be resolved
 * @throws {ValidationError} If maxDepth is not a non-negative integer
 */
export async function discoverRepositories(
  root: string,
  maxDepth: number,
  options: DiscoveryOptions = {}
): Promise<string[]> {
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new ValidationError(`Invalid depth: ${maxDepth}`);
  }

  const logger = options.logger ?? createSilentLogger();
  const base = await resolveScanRoot(root);
  const repositories: string[] = [];
  await collectRepositories(base, maxDepth, 0, repositories, logger);
  return sortPaths(repositories);
}
