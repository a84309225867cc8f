import type { RepositoryResult, ScanFilters } from '../types/scan.js';

export const NO_FILTERS: ScanFilters = Object.freeze({
  dirtyOnly: false,
  localOnly: false,
  unpushedOnly: false,
});

/**
 * Whether the ahead count must be computed for the given filters
 */
export function requiresAheadCount(filters: ScanFilters): boolean {
  return filters.unpushedOnly;
}

/**
 * Checks a repository result against the active filters. An unknown ahead
 * count counts as zero, so indeterminate repositories never show as unpushed.
 */
export function matchesFilters(result: RepositoryResult, filters: ScanFilters): boolean {
  return (
    (!filters.dirtyOnly || result.isDirty) &&
    (!filters.localOnly || result.isLocalOnly) &&
    (!filters.unpushedOnly || (result.aheadCount ?? 0) > 0)
  );
}
