import assert from 'node:assert/strict';
import { afterEach, describe, it } from 'node:test';

import {
  __setGitRepositoryTestOverrides,
  executeGitCommand,
  executeGitCommandInRepo,
  GIT_MAX_BUFFER,
  GitCommandError,
  streamGitCommandInRepo,
} from './git-repository.js';

describe('git-repository', () => {
  afterEach(() => {
    __setGitRepositoryTestOverrides();
  });

  it('executes git commands with provided options', async () => {
    const calls: Array<{
      command: string;
      args: string[];
      options: { maxBuffer?: number; env?: NodeJS.ProcessEnv };
    }> = [];

    __setGitRepositoryTestOverrides({
      execFileAsync: async (command, args, options) => {
        calls.push({
          command,
          args,
          options: { maxBuffer: options.maxBuffer, env: options.env },
        });
        return { stdout: 'ok' };
      },
    });

    const result = await executeGitCommand(['status'], {
      env: { TEST_ENV: '1' },
    });

    assert.equal(result.stdout, 'ok');
    assert.equal(calls.length, 1);
    const call = calls[0];
    assert.ok(call);
    assert.equal(call.command, 'git');
    assert.deepEqual(call.args, ['status']);
    assert.deepEqual(call.options, {
      maxBuffer: GIT_MAX_BUFFER,
      env: { TEST_ENV: '1' },
    });
  });

  it('wraps errors in GitCommandError with metadata', async () => {
    const error = Object.assign(new Error('boom'), {
      stderr: Buffer.from('fatal: not a git repository'),
      stdout: Buffer.from(''),
    });

    __setGitRepositoryTestOverrides({
      execFileAsync: async () => {
        throw error;
      },
    });

    await assert.rejects(
      executeGitCommand(['status'], { repositoryPath: '/tmp/repo' }),
      (err: unknown) => {
        assert.ok(err instanceof GitCommandError);
        assert.equal(err.command, 'git');
        assert.deepEqual(err.args, ['status']);
        assert.equal(err.repositoryPath, '/tmp/repo');
        assert.equal(err.stderr, 'fatal: not a git repository');
        assert.equal(err.stdout, '');
        assert.equal(err.message, 'fatal: not a git repository');
        assert.equal(err.cause, error);
        return true;
      }
    );
  });

  it('executes git commands in repository context', async () => {
    const calls: string[][] = [];

    __setGitRepositoryTestOverrides({
      execFileAsync: async (_command, args) => {
        calls.push(args);
        return { stdout: 'done' };
      },
    });

    const result = await executeGitCommandInRepo('/repo/path', ['status', '--short']);

    assert.equal(result.stdout, 'done');
    assert.equal(calls.length, 1);
    assert.deepEqual(calls[0], ['-C', '/repo/path', 'status', '--short']);
  });

  it('records the repository path on failures inside a repository', async () => {
    __setGitRepositoryTestOverrides({
      execFileAsync: async () => {
        throw new Error('spawn git ENOENT');
      },
    });

    await assert.rejects(
      executeGitCommandInRepo('/repo/path', ['remote']),
      (err: unknown) => {
        assert.ok(err instanceof GitCommandError);
        assert.equal(err.repositoryPath, '/repo/path');
        assert.equal(err.message, 'spawn git ENOENT');
        return true;
      }
    );
  });

  it('derives messages from stderr, stdout, message or a fallback', () => {
    const fromStderr = new GitCommandError('git', ['fetch'], { stderr: 'fatal: access denied\n' });
    assert.equal(fromStderr.message, 'fatal: access denied');

    const fromStdout = new GitCommandError('git', ['fetch'], { stdout: Buffer.from('warning only') });
    assert.equal(fromStdout.message, 'warning only');

    const fromMessage = new GitCommandError('git', ['fetch'], { message: 'custom error' });
    assert.equal(fromMessage.message, 'custom error');
    assert.equal(fromMessage.cause, undefined);

    const fallback = new GitCommandError('git', ['fetch'], null);
    assert.equal(fallback.message, 'Unknown git error');
    assert.equal(fallback.toString(), 'GitCommandError: Unknown git error (git fetch)');
  });

  it('streams git commands in repository context', async () => {
    const calls: Array<{ args: string[]; env: NodeJS.ProcessEnv | undefined; stopsAt: boolean | undefined }> = [];

    __setGitRepositoryTestOverrides({
      streamFile: async (_command, args, options) => {
        calls.push({ args, env: options.env, stopsAt: options.until?.('?? a\0') });
        return { stdout: '?? a\0' };
      },
    });

    const result = await streamGitCommandInRepo('/repo/path', ['status', '-z'], {
      env: { TEST_ENV: '1' },
      until: (stdout) => stdout.includes('\0'),
    });

    assert.equal(result.stdout, '?? a\0');
    assert.deepEqual(calls, [
      { args: ['-C', '/repo/path', 'status', '-z'], env: { TEST_ENV: '1' }, stopsAt: true },
    ]);
  });

  it('wraps streaming failures in GitCommandError', async () => {
    __setGitRepositoryTestOverrides({
      streamFile: async () => {
        throw Object.assign(new Error('git exited with code 128'), { stderr: 'fatal: bad object HEAD\n' });
      },
    });

    await assert.rejects(streamGitCommandInRepo('/repo/path', ['status']), (err: unknown) => {
      assert.ok(err instanceof GitCommandError);
      assert.equal(err.repositoryPath, '/repo/path');
      assert.equal(err.message, 'fatal: bad object HEAD');
      return true;
    });
  });
});
