import path from 'node:path';

import { executeGitCommandInRepo, GitCommandError, streamGitCommandInRepo } from './git-repository.js';
import { buildStatusArgs, completeStatusRecords, parseStatusEntries } from './git-status-repository.js';
import type {
  AheadBehind,
  GitBackend,
  GitRepositoryHandle,
  HeadReference,
  StatusEntry,
  UpstreamReference,
  WorkingTreeStatusOptions,
} from '../types/git.js';

export interface CliGitBackendOptions {
  env?: NodeJS.ProcessEnv;
}

/** Variables that point git at one fixed repository regardless of -C */
const REPOSITORY_OVERRIDE_VARIABLES = [
  'GIT_DIR',
  'GIT_WORK_TREE',
  'GIT_INDEX_FILE',
  'GIT_OBJECT_DIRECTORY',
  'GIT_COMMON_DIR',
] as const;

/**
 * Environment for read-only git invocations. Optional locks are disabled so
 * status never refreshes (and locks) the index of the scanned repository.
 */
export function createReadOnlyGitEnv(base: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...base, GIT_OPTIONAL_LOCKS: '0' };
  for (const name of REPOSITORY_OVERRIDE_VARIABLES) {
    delete env[name];
  }
  return env;
}

/**
 * Stops git's upward repository search at the directory itself, so broken
 * metadata fails to open rather than resolving to an enclosing repository.
 */
export function createRepositoryGitEnv(base: NodeJS.ProcessEnv, repositoryPath: string): NodeJS.ProcessEnv {
  return { ...base, GIT_CEILING_DIRECTORIES: path.dirname(repositoryPath) };
}

function parseCount(value: string | undefined, args: string[], repositoryPath: string): number {
  const parsed = Number.parseInt(value ?? '', 10);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new GitCommandError('git', args, new Error(`Unexpected rev-list output: ${value ?? ''}`), repositoryPath);
  }
  return parsed;
}

/**
 * Repository handle backed by the git executable
 */
class CliGitRepositoryHandle implements GitRepositoryHandle {
  constructor(
    readonly path: string,
    private readonly env: NodeJS.ProcessEnv
  ) {}

  private async run(args: string[]): Promise<string> {
    const { stdout } = await executeGitCommandInRepo(this.path, args, { env: this.env });
    return stdout;
  }

  private async tryRun(args: string[]): Promise<string | null> {
    try {
      const output = (await this.run(args)).trim();
      return output || null;
    } catch (error: unknown) {
      if (error instanceof GitCommandError) {
        return null;
      }
      throw error;
    }
  }

  async status(options: WorkingTreeStatusOptions, limit?: number): Promise<StatusEntry[]> {
    const until =
      limit === undefined
        ? undefined
        : (stdout: string): boolean => parseStatusEntries(completeStatusRecords(stdout)).length >= limit;
    const { stdout } = await streamGitCommandInRepo(this.path, buildStatusArgs(options), { env: this.env, until });
    const entries = parseStatusEntries(limit === undefined ? stdout : completeStatusRecords(stdout));
    return limit === undefined ? entries : entries.slice(0, limit);
  }

  async remotes(): Promise<string[]> {
    const raw = await this.run(['remote']);
    return raw
      .split('\n')
      .map((line) => line.trim())
      .filter(Boolean);
  }

  async head(): Promise<HeadReference | null> {
    // symbolic-ref fails on a detached HEAD, rev-parse on an unborn branch
    const name = await this.tryRun(['symbolic-ref', '-q', 'HEAD']);
    if (!name) {
      return null;
    }
    const oid = await this.tryRun(['rev-parse', '-q', '--verify', 'HEAD^{commit}']);
    if (!oid) {
      return null;
    }
    return { name, oid };
  }

  async upstream(branch: HeadReference): Promise<UpstreamReference | null> {
    const name = await this.tryRun(['for-each-ref', '--format=%(upstream)', branch.name]);
    if (!name) {
      return null;
    }
    const oid = await this.tryRun(['rev-parse', '-q', '--verify', `${name}^{commit}`]);
    if (!oid) {
      return null;
    }
    return { name, oid };
  }

  async aheadBehind(localOid: string, upstreamOid: string): Promise<AheadBehind> {
    const args = ['rev-list', '--left-right', '--count', `${localOid}...${upstreamOid}`];
    const raw = await this.run(args);
    const [ahead, behind] = raw.trim().split(/\s+/);
    return {
      ahead: parseCount(ahead, args, this.path),
      behind: parseCount(behind, args, this.path),
    };
  }
}

/**
 * Git backend driving the git executable, one handle per repository
 */
export class CliGitBackend implements GitBackend {
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: CliGitBackendOptions = {}) {
    this.env = createReadOnlyGitEnv(options.env);
  }

  /**
   * Opens a repository
   * @throws {GitCommandError} If the path is not a readable repository
   */
  async open(repositoryPath: string): Promise<GitRepositoryHandle> {
    const env = createRepositoryGitEnv(this.env, repositoryPath);
    await executeGitCommandInRepo(repositoryPath, ['rev-parse', '--git-dir'], { env });
    return new CliGitRepositoryHandle(repositoryPath, env);
  }
}

export function createGitBackend(options?: CliGitBackendOptions): GitBackend {
  return new CliGitBackend(options);
}
