import { createGitBackend } from '../repositories/git-backend.js';
import { DEFAULT_STATUS_OPTIONS } from '../repositories/git-status-repository.js';
import { createRepositoryResult } from '../domain/repository.js';
import { extractErrorMessage } from '../infrastructure/errors/index.js';
import { createSilentLogger, type Logger } from '../infrastructure/logging/logger.js';
import type { GitBackend, GitRepositoryHandle } from '../types/git.js';
import type { RepositoryResult } from '../types/scan.js';

export interface ClassifyOptions {
  backend?: GitBackend;
  logger?: Logger;
}

/**
 * Checks whether the working tree has tracked changes or untracked top-level
 * entries. Reading stops at the first entry.
 */
export async function isWorkingTreeDirty(repository: GitRepositoryHandle): Promise<boolean> {
  const entries = await repository.status(DEFAULT_STATUS_OPTIONS, 1);
  return entries.length > 0;
}

/**
 * A repository whose remotes cannot be listed is treated as having none.
 */
export async function isLocalOnly(repository: GitRepositoryHandle, logger: Logger): Promise<boolean> {
  try {
    const remotes = await repository.remotes();
    return remotes.length === 0;
  } catch (error: unknown) {
    logger.debug(`Unable to list remotes for ${repository.path}: ${extractErrorMessage(error)}`);
    return true;
  }
}

/**
 * Counts commits on the current branch that are missing from its upstream.
 * @returns Ahead count, or null for detached and unborn heads, branches
 *   without a resolvable upstream, and failing queries
 */
export async function countAheadOfUpstream(
  repository: GitRepositoryHandle,
  logger: Logger
): Promise<number | null> {
  try {
    const head = await repository.head();
    if (!head) {
      return null;
    }
    const upstream = await repository.upstream(head);
    if (!upstream) {
      return null;
    }
    const { ahead } = await repository.aheadBehind(head.oid, upstream.oid);
    return ahead;
  } catch (error: unknown) {
    logger.debug(`Unable to compare ${repository.path} with its upstream: ${extractErrorMessage(error)}`);
    return null;
  }
}

/**
 * Classifies a single repository
 * @param repositoryPath - Repository root found by discovery
 * @param computeAhead - Whether to resolve the upstream and count unpushed commits
 * @param options - Backend and logger
 * @returns Classification, or null when the repository cannot be opened or its status read
 */
export async function classifyRepository(
  repositoryPath: string,
  computeAhead: boolean,
  options: ClassifyOptions = {}
): Promise<RepositoryResult | null> {
  const backend = options.backend ?? createGitBackend();
  const logger = options.logger ?? createSilentLogger();

  let repository: GitRepositoryHandle;
  let dirty: boolean;
  try {
    repository = await backend.open(repositoryPath);
    dirty = await isWorkingTreeDirty(repository);
  } catch (error: unknown) {
    logger.debug(`Skipping ${repositoryPath}: ${extractErrorMessage(error)}`);
    return null;
  }

  const localOnly = await isLocalOnly(repository, logger);
  const aheadCount = computeAhead ? await countAheadOfUpstream(repository, logger) : null;

  return createRepositoryResult({
    path: repositoryPath,
    isDirty: dirty,
    isLocalOnly: localOnly,
    aheadCount,
  });
}
