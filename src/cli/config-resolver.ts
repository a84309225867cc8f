import { DEFAULT_DEPTH } from './constants.js';
import { defaultConcurrency } from '../utils/concurrency.js';
import { ValidationError } from '../infrastructure/errors/index.js';
import type { FileConfig, ParsedArgs, ResolvedConfig } from './types.js';

function resolveValue<T>(
  provided: boolean,
  cliValue: T,
  configValue: T | undefined,
  defaultValue: T,
): T {
  if (provided) {
    return cliValue;
  }
  return configValue ?? defaultValue;
}

/**
 * NO_COLOR disables colour whenever it is set to a non-empty value
 */
export function colorDisabledByEnv(env: NodeJS.ProcessEnv): boolean {
  const value = env['NO_COLOR'];
  return typeof value === 'string' && value.length > 0;
}

export function resolveConfig(
  args: ParsedArgs,
  fileConfig: FileConfig,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedConfig {
  const { _provided: provided } = args;

  if (!args.path) {
    throw new ValidationError('Missing required argument: <path>');
  }

  const maxDepth = resolveValue(provided['depth'] ?? false, args.depth, fileConfig.depth, DEFAULT_DEPTH) ?? DEFAULT_DEPTH;
  const concurrency = resolveValue(provided['jobs'] ?? false, args.jobs, fileConfig.jobs, null) ?? defaultConcurrency();

  const color = (provided['color'] ?? false)
    ? args.color ?? true
    : !colorDisabledByEnv(env) && (fileConfig.color ?? true);

  return {
    root: args.path,
    maxDepth,
    concurrency,
    filters: {
      dirtyOnly: args.dirty,
      localOnly: args.local,
      unpushedOnly: args.unpushed,
    },
    raw: args.raw,
    color,
    verbose: args.verbose,
  };
}
