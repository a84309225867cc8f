/**
 * Scan type definitions
 */

/**
 * Classification of a single discovered repository
 */
export interface RepositoryResult {
  readonly path: string;
  readonly isDirty: boolean;
  readonly isLocalOnly: boolean;
  /**
   * Commits not yet on the upstream branch. Null when the count was not
   * requested or could not be determined.
   */
  readonly aheadCount: number | null;
}

export interface ScanFilters {
  dirtyOnly: boolean;
  localOnly: boolean;
  unpushedOnly: boolean;
}

export interface ScanOptions {
  root: string;
  maxDepth: number;
  concurrency: number;
  filters: ScanFilters;
}

export interface ScanReport {
  /** Canonical scan root */
  root: string;
  /** Number of repositories found before filtering */
  discovered: number;
  /** Filtered results sorted by path */
  results: RepositoryResult[];
  computeAhead: boolean;
}
