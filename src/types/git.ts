/**
 * Git backend type definitions
 */

/**
 * Options applied when reading working-tree status
 */
export interface WorkingTreeStatusOptions {
  includeUntracked: boolean;
  recurseUntrackedDirs: boolean;
  excludeSubmodules: boolean;
}

/**
 * Single record from the working-tree status
 */
export interface StatusEntry {
  path: string;
  previousPath: string | null;
  indexStatus: string;
  worktreeStatus: string;
  kind: 'tracked' | 'untracked';
}

/**
 * Current branch of a repository. Detached and unborn heads have none.
 */
export interface HeadReference {
  name: string;
  oid: string;
}

/**
 * Upstream tracking reference of a local branch
 */
export interface UpstreamReference {
  name: string;
  oid: string;
}

export interface AheadBehind {
  ahead: number;
  behind: number;
}

/**
 * Handle onto a single opened repository. Every call is read-only and
 * rejects when git cannot answer.
 */
export interface GitRepositoryHandle {
  readonly path: string;
  /** Reads at most `limit` entries when a limit is given */
  status(options: WorkingTreeStatusOptions, limit?: number): Promise<StatusEntry[]>;
  remotes(): Promise<string[]>;
  head(): Promise<HeadReference | null>;
  upstream(branch: HeadReference): Promise<UpstreamReference | null>;
  aheadBehind(localOid: string, upstreamOid: string): Promise<AheadBehind>;
}

/**
 * Version-control capability used by the classifier
 */
export interface GitBackend {
  open(repositoryPath: string): Promise<GitRepositoryHandle>;
}
