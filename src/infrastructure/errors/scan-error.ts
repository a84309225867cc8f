import { CliError } from './cli-error.js';

/**
 * The scan root cannot be resolved or accessed
 */
export class PathUnavailableError extends CliError {
  public readonly path: string;

  constructor(targetPath: string, cause: Error | null = null) {
    super(`cannot access '${targetPath}'`, 1, cause);
    this.path = targetPath;
  }
}

/**
 * Discovery found no repositories at all
 */
export class NoRepositoriesFoundError extends CliError {
  public readonly root: string;

  constructor(root: string) {
    super(`No git repos found in ${root}`, 1);
    this.root = root;
  }
}

/**
 * Repositories were found but the active filters excluded all of them
 */
export class NoMatchingRepositoriesError extends CliError {
  public readonly discovered: number;

  constructor(discovered: number) {
    super('No matching repos found', 1);
    this.discovered = discovered;
  }
}
