import { GitCommandError } from './git-repository.js';
import type {
  AheadBehind,
  GitBackend,
  GitRepositoryHandle,
  HeadReference,
  StatusEntry,
  UpstreamReference,
  WorkingTreeStatusOptions,
} from '../types/git.js';

export type GitQuery = 'open' | 'status' | 'remotes' | 'head' | 'upstream' | 'aheadBehind';

/**
 * State of one repository held by the in-memory backend. A query listed in
 * `failing` rejects the way a broken git call would.
 */
export interface InMemoryRepositoryState {
  entries?: StatusEntry[];
  remotes?: string[];
  branch?: string | null;
  headOid?: string | null;
  upstream?: string | null;
  upstreamOid?: string | null;
  ahead?: number;
  behind?: number;
  failing?: GitQuery[];
}

export function untrackedEntry(filePath: string): StatusEntry {
  return { path: filePath, previousPath: null, indexStatus: '?', worktreeStatus: '?', kind: 'untracked' };
}

export function modifiedEntry(filePath: string): StatusEntry {
  return { path: filePath, previousPath: null, indexStatus: ' ', worktreeStatus: 'M', kind: 'tracked' };
}

class InMemoryRepositoryHandle implements GitRepositoryHandle {
  constructor(
    readonly path: string,
    private readonly state: InMemoryRepositoryState,
    private readonly onQuery: (query: GitQuery) => void
  ) {}

  private check(query: GitQuery): void {
    this.onQuery(query);
    if (this.state.failing?.includes(query)) {
      throw new GitCommandError('git', [query], new Error(`${query} failed`), this.path);
    }
  }

  async status(options: WorkingTreeStatusOptions, limit?: number): Promise<StatusEntry[]> {
    this.check('status');
    const all = this.state.entries ?? [];
    const entries = options.includeUntracked ? [...all] : all.filter((entry) => entry.kind !== 'untracked');
    return limit === undefined ? entries : entries.slice(0, limit);
  }

  async remotes(): Promise<string[]> {
    this.check('remotes');
    return [...(this.state.remotes ?? [])];
  }

  async head(): Promise<HeadReference | null> {
    this.check('head');
    const { branch, headOid } = this.state;
    if (!branch || !headOid) {
      return null;
    }
    return { name: `refs/heads/${branch}`, oid: headOid };
  }

  async upstream(_branch: HeadReference): Promise<UpstreamReference | null> {
    this.check('upstream');
    const { upstream, upstreamOid } = this.state;
    if (!upstream || !upstreamOid) {
      return null;
    }
    return { name: `refs/remotes/${upstream}`, oid: upstreamOid };
  }

  async aheadBehind(_localOid: string, _upstreamOid: string): Promise<AheadBehind> {
    this.check('aheadBehind');
    return { ahead: this.state.ahead ?? 0, behind: this.state.behind ?? 0 };
  }
}

/**
 * Git backend serving repositories from memory. Every open hands out a fresh
 * handle; `queries` records which capabilities were used, per path.
 */
export class InMemoryGitBackend implements GitBackend {
  private readonly repositories = new Map<string, InMemoryRepositoryState>();
  readonly queries: Array<{ path: string; query: GitQuery }> = [];

  constructor(repositories: Record<string, InMemoryRepositoryState> = {}) {
    for (const [repositoryPath, state] of Object.entries(repositories)) {
      this.repositories.set(repositoryPath, state);
    }
  }

  set(repositoryPath: string, state: InMemoryRepositoryState): void {
    this.repositories.set(repositoryPath, state);
  }

  async open(repositoryPath: string): Promise<GitRepositoryHandle> {
    const state = this.repositories.get(repositoryPath);
    const record = (query: GitQuery): void => {
      this.queries.push({ path: repositoryPath, query });
    };
    record('open');
    if (!state || state.failing?.includes('open')) {
      throw new GitCommandError('git', ['rev-parse', '--git-dir'], new Error('not a git repository'), repositoryPath);
    }
    return new InMemoryRepositoryHandle(repositoryPath, state, record);
  }
}
