import type { RepositoryResult, ScanOptions, ScanReport } from './scan.js';

/**
 * Interface for repository scan operations
 */
export interface IRepositoryScanService {
  /**
   * Classifies a list of repository roots
   * @param paths - Repository roots
   * @param computeAhead - Whether to count unpushed commits
   * @param concurrency - Worker pool size
   */
  classifyAll(paths: readonly string[], computeAhead: boolean, concurrency?: number): Promise<RepositoryResult[]>;

  /**
   * Discovers, classifies and filters repositories below a root
   */
  scan(options: ScanOptions): Promise<ScanReport>;
}
