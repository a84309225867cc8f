import { promisify } from 'node:util';
import { execFile, spawn, type ExecFileOptions } from 'node:child_process';

const promisifiedExecFile = promisify(execFile);

/**
 * Output limit for buffered git commands (refs, remotes, counts). Commands
 * whose output grows with the working tree are streamed instead.
 */
export const GIT_MAX_BUFFER = 1024 * 64;

export interface GitCommandOptions {
  env?: NodeJS.ProcessEnv;
  repositoryPath?: string | null;
}

export interface GitStreamOptions {
  env?: NodeJS.ProcessEnv;
  /** Called with the output read so far; returning true ends the command early */
  until?: (stdout: string) => boolean;
}

export interface GitCommandResult {
  stdout: string;
}

type ExecFileAsync = (
  command: string,
  args: string[],
  options: ExecFileOptions
) => Promise<GitCommandResult>;

type StreamFile = (
  command: string,
  args: string[],
  options: GitStreamOptions
) => Promise<GitCommandResult>;

async function execFileAsync(command: string, args: string[], options: ExecFileOptions): Promise<GitCommandResult> {
  const { stdout } = await promisifiedExecFile(command, args, { ...options, encoding: 'utf8' });
  return { stdout };
}

/**
 * Runs a command without an output limit. Once `until` accepts the output
 * read so far the child is killed and that output is returned.
 */
function streamFile(command: string, args: string[], options: GitStreamOptions): Promise<GitCommandResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { env: options.env, stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';
    let settled = false;

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');

    child.stdout.on('data', (chunk: string) => {
      if (settled) {
        return;
      }
      stdout += chunk;
      if (options.until?.(stdout)) {
        settled = true;
        child.kill();
        resolve({ stdout });
      }
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });
    child.on('error', (error: Error) => {
      if (!settled) {
        settled = true;
        reject(error);
      }
    });
    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      if (settled) {
        return;
      }
      settled = true;
      if (code === 0) {
        resolve({ stdout });
        return;
      }
      const reason = code === null ? `signal ${signal ?? 'unknown'}` : `code ${code}`;
      reject(Object.assign(new Error(`${command} exited with ${reason}`), { code, stdout, stderr }));
    });
  });
}

interface GitRepositoryDependencies {
  execFileAsync: ExecFileAsync;
  streamFile: StreamFile;
}

type GitRepositoryDependencyOverrides = Partial<GitRepositoryDependencies>;

const gitRepositoryDependencies: GitRepositoryDependencies = {
  execFileAsync,
  streamFile,
};

let gitRepositoryTestOverrides: GitRepositoryDependencyOverrides | null = null;

function resolveGitRepositoryDependency<K extends keyof GitRepositoryDependencies>(
  key: K
): GitRepositoryDependencies[K] {
  const overrides: GitRepositoryDependencyOverrides = gitRepositoryTestOverrides || {};
  return overrides[key] ?? gitRepositoryDependencies[key];
}

export function __setGitRepositoryTestOverrides(overrides?: GitRepositoryDependencyOverrides): void {
  gitRepositoryTestOverrides = overrides ?? null;
}

function readField(source: unknown, key: string): unknown {
  if (typeof source !== 'object' || source === null) {
    return undefined;
  }
  return Reflect.get(source, key);
}

function outputToString(value: unknown): string {
  if (typeof value === 'string') {
    return value.trim();
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('utf8').trim();
  }
  return '';
}

/**
 * Custom error for git operations
 */
export class GitCommandError extends Error {
  public readonly command: string;
  public readonly args: string[];
  public readonly repositoryPath: string | null;
  public readonly stderr: string;
  public readonly stdout: string;

  constructor(command: string, args: string[], originalError: unknown, repositoryPath: string | null = null) {
    const stderr = outputToString(readField(originalError, 'stderr'));
    const stdout = outputToString(readField(originalError, 'stdout'));
    const original = readField(originalError, 'message');
    const fallback = typeof original === 'string' ? original : '';
    const message = stderr || stdout || fallback || 'Unknown git error';

    super(message);
    this.name = 'GitCommandError';
    this.command = command;
    this.args = args;
    this.repositoryPath = repositoryPath;
    this.stderr = stderr;
    this.stdout = stdout;

    if (originalError instanceof Error) {
      this.cause = originalError;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  override toString(): string {
    return `GitCommandError: ${this.message} (git ${this.args.join(' ')})`;
  }
}

/**
 * Executes a git command with standard error handling
 * @param args - Git command arguments (without 'git' itself)
 * @param options - Execution options
 * @returns Command output
 * @throws {GitCommandError}
 */
export async function executeGitCommand(
  args: string[],
  options: GitCommandOptions = {}
): Promise<GitCommandResult> {
  const { env = process.env, repositoryPath = null } = options;

  const run = resolveGitRepositoryDependency('execFileAsync');
  try {
    return await run('git', args, {
      maxBuffer: GIT_MAX_BUFFER,
      env: { ...env },
    });
  } catch (error: unknown) {
    throw new GitCommandError('git', args, error, repositoryPath);
  }
}

/**
 * Executes a git command in a specific repository directory
 * @param repositoryPath - Path to the repository
 * @param commandArgs - Git command arguments (after -C flag)
 * @param options - Additional options
 * @returns Command result
 */
export async function executeGitCommandInRepo(
  repositoryPath: string,
  commandArgs: string[],
  options: Omit<GitCommandOptions, 'repositoryPath'> = {}
): Promise<GitCommandResult> {
  const args = ['-C', repositoryPath, ...commandArgs];
  return executeGitCommand(args, {
    ...options,
    repositoryPath,
  });
}

/**
 * Streams a git command in a repository directory, without an output limit
 * @param repositoryPath - Path to the repository
 * @param commandArgs - Git command arguments (after -C flag)
 * @param options - Environment and early-stop predicate
 * @throws {GitCommandError}
 */
export async function streamGitCommandInRepo(
  repositoryPath: string,
  commandArgs: string[],
  options: GitStreamOptions = {}
): Promise<GitCommandResult> {
  const args = ['-C', repositoryPath, ...commandArgs];
  const run = resolveGitRepositoryDependency('streamFile');
  try {
    return await run('git', args, { ...options, env: { ...(options.env ?? process.env) } });
  } catch (error: unknown) {
    throw new GitCommandError('git', args, error, repositoryPath);
  }
}
