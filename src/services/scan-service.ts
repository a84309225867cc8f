import { discoverRepositories, resolveScanRoot } from '../repositories/repository-discovery.js';
import { createGitBackend } from '../repositories/git-backend.js';
import { classifyRepository } from '../core/classifier.js';
import { matchesFilters, requiresAheadCount } from '../domain/repository-filter.js';
import { comparePaths } from '../domain/path-order.js';
import { NoMatchingRepositoriesError, NoRepositoriesFoundError } from '../infrastructure/errors/index.js';
import { createSilentLogger, type Logger } from '../infrastructure/logging/logger.js';
import { defaultConcurrency, mapWithConcurrency } from '../utils/concurrency.js';
import type { GitBackend } from '../types/git.js';
import type { RepositoryResult, ScanOptions, ScanReport } from '../types/scan.js';
import type { IRepositoryScanService } from '../types/services.js';

interface ScanServiceDependencies {
  resolveScanRoot: typeof resolveScanRoot;
  discoverRepositories: typeof discoverRepositories;
  classifyRepository: typeof classifyRepository;
}

type ScanServiceDependencyOverrides = Partial<ScanServiceDependencies>;

const scanServiceDependencies: ScanServiceDependencies = {
  resolveScanRoot,
  discoverRepositories,
  classifyRepository,
};

let scanServiceTestOverrides: ScanServiceDependencyOverrides | null = null;

function resolveScanServiceDependency<K extends keyof ScanServiceDependencies>(
  key: K
): ScanServiceDependencies[K] {
  const overrides: ScanServiceDependencyOverrides = scanServiceTestOverrides || {};
  return overrides[key] ?? scanServiceDependencies[key];
}

export function __setScanServiceTestOverrides(overrides?: ScanServiceDependencyOverrides): void {
  scanServiceTestOverrides = overrides ?? null;
}

export interface RepositoryScanServiceOptions {
  backend?: GitBackend;
  logger?: Logger;
}

/**
 * Service for scanning a directory tree for repositories
 */
export class RepositoryScanService implements IRepositoryScanService {
  private readonly backend: GitBackend;
  private readonly logger: Logger;

  constructor(options: RepositoryScanServiceOptions = {}) {
    this.backend = options.backend ?? createGitBackend();
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Classifies every repository path, dropping the ones that cannot be classified
   * @param paths - Repository roots
   * @param computeAhead - Whether to count unpushed commits
   * @param concurrency - Worker pool size
   * @returns Results in path order
   */
  async classifyAll(
    paths: readonly string[],
    computeAhead: boolean,
    concurrency: number = defaultConcurrency()
  ): Promise<RepositoryResult[]> {
    const classify = resolveScanServiceDependency('classifyRepository');
    const results = await mapWithConcurrency(paths, concurrency, (repositoryPath) =>
      classify(repositoryPath, computeAhead, { backend: this.backend, logger: this.logger })
    );
    return results
      .filter((result): result is RepositoryResult => result !== null)
      .sort((left, right) => comparePaths(left.path, right.path));
  }

  /**
   * Discovers, classifies and filters repositories
   * @param options - Scan options
   * @returns Report with the matching repositories
   * @throws {PathUnavailableError} If the root cannot be resolved
   * @throws {NoRepositoriesFoundError} If no repository was discovered
   * @throws {NoMatchingRepositoriesError} If the filters excluded every repository
   */
  async scan(options: ScanOptions): Promise<ScanReport> {
    const resolveRoot = resolveScanServiceDependency('resolveScanRoot');
    const discover = resolveScanServiceDependency('discoverRepositories');

    const root = await resolveRoot(options.root);
    const paths = await discover(root, options.maxDepth, { logger: this.logger });
    this.logger.debug(`Discovered ${paths.length} repositories under ${root}`);

    const computeAhead = requiresAheadCount(options.filters);
    const classified = await this.classifyAll(paths, computeAhead, options.concurrency);
    const results = classified.filter((result) => matchesFilters(result, options.filters));

    if (results.length === 0) {
      if (paths.length === 0) {
        throw new NoRepositoriesFoundError(root);
      }
      throw new NoMatchingRepositoriesError(paths.length);
    }

    return {
      root,
      discovered: paths.length,
      results,
      computeAhead,
    };
  }
}

export function createRepositoryScanService(options?: RepositoryScanServiceOptions): RepositoryScanService {
  return new RepositoryScanService(options);
}
