import { ValidationError } from '../infrastructure/errors/index.js';
import type { ParsedArgs } from './types.js';

/** Short flags that take a value; the rest of a bundle is that value. */
const SHORT_VALUE_FLAGS = new Set(['L', 'j']);

/**
 * Expands bundled short flags: `-dl` becomes `-d -l`, `-L2` becomes `-L 2`.
 */
export function expandShortFlags(token: string): string[] {
  if (!/^-[A-Za-z][A-Za-z0-9]+$/.test(token)) {
    return [token];
  }

  const expanded: string[] = [];
  const letters = token.slice(1);
  for (let index = 0; index < letters.length; index += 1) {
    const letter = letters.charAt(index);
    expanded.push(`-${letter}`);
    if (SHORT_VALUE_FLAGS.has(letter)) {
      const rest = letters.slice(index + 1);
      if (rest) {
        expanded.push(rest);
      }
      break;
    }
  }
  return expanded;
}

/**
 * Splits `--name=value` into `--name value`
 */
function expandLongOption(token: string): string[] {
  if (!token.startsWith('--')) {
    return [token];
  }
  const separator = token.indexOf('=');
  if (separator === -1) {
    return [token];
  }
  return [token.slice(0, separator), token.slice(separator + 1)];
}

function normalizeTokens(argv: string[]): string[] {
  const tokens: string[] = [];
  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index] ?? '';
    if (token === '--') {
      tokens.push(...argv.slice(index));
      break;
    }
    for (const part of expandLongOption(token)) {
      tokens.push(...expandShortFlags(part));
    }
  }
  return tokens;
}

class ArgumentParser {
  private args: Omit<ParsedArgs, '_provided'>;
  private provided: Record<string, boolean>;

  constructor() {
    this.args = this.createDefaultArgs();
    this.provided = this.createProvidedTracker();
  }

  private createDefaultArgs() {
    return {
      path: null,
      depth: null,
      dirty: false,
      local: false,
      unpushed: false,
      raw: false,
      jobs: null,
      color: null,
      verbose: false,
      help: false,
      version: false,
    };
  }

  private createProvidedTracker() {
    return {
      path: false,
      depth: false,
      dirty: false,
      local: false,
      unpushed: false,
      raw: false,
      jobs: false,
      color: false,
      verbose: false,
    };
  }

  private requireValue(token: string, value: string | undefined): string {
    if (value === undefined || value === '') {
      throw new ValidationError(`Expected value after ${token}`);
    }
    return value;
  }

  private parseDepth(_token: string, value: string): number {
    const trimmed = value.trim();
    const parsed = Number.parseInt(trimmed, 10);
    if (!/^\d+$/.test(trimmed) || !Number.isInteger(parsed)) {
      throw new ValidationError(`Invalid depth: ${value}`);
    }
    return parsed;
  }

  private parseJobs(_token: string, value: string): number {
    const trimmed = value.trim();
    const parsed = Number.parseInt(trimmed, 10);
    if (!/^\d+$/.test(trimmed) || parsed < 1) {
      throw new ValidationError(`Invalid jobs: ${value}`);
    }
    return parsed;
  }

  private setPath(token: string): void {
    if (this.provided['path']) {
      throw new ValidationError(`Unexpected argument: ${token}`);
    }
    this.args.path = token;
    this.provided['path'] = true;
  }

  parse(argv: string[]): ParsedArgs {
    const tokens = normalizeTokens(argv);

    for (let i = 0; i < tokens.length; i += 1) {
      const token = tokens[i] ?? '';

      switch (token) {
        case '--depth':
        case '-L': {
          const value = this.requireValue(token, tokens[++i]);
          this.args.depth = this.parseDepth(token, value);
          this.provided['depth'] = true;
          break;
        }
        case '--dirty':
        case '-d': {
          this.args.dirty = true;
          this.provided['dirty'] = true;
          break;
        }
        case '--local':
        case '-l': {
          this.args.local = true;
          this.provided['local'] = true;
          break;
        }
        case '--unpushed': {
          this.args.unpushed = true;
          this.provided['unpushed'] = true;
          break;
        }
        case '--raw':
        case '-r': {
          this.args.raw = true;
          this.provided['raw'] = true;
          break;
        }
        case '--jobs':
        case '-j': {
          const value = this.requireValue(token, tokens[++i]);
          this.args.jobs = this.parseJobs(token, value);
          this.provided['jobs'] = true;
          break;
        }
        case '--color': {
          this.args.color = true;
          this.provided['color'] = true;
          break;
        }
        case '--no-color': {
          this.args.color = false;
          this.provided['color'] = true;
          break;
        }
        case '--verbose': {
          this.args.verbose = true;
          this.provided['verbose'] = true;
          break;
        }
        case '--help':
        case '-h':
          this.args.help = true;
          break;
        case '--version':
        case '-v':
          this.args.version = true;
          break;
        case '--': {
          for (const positional of tokens.slice(i + 1)) {
            this.setPath(positional);
          }
          i = tokens.length;
          break;
        }
        default:
          if (token.startsWith('-') && token !== '-') {
            throw new ValidationError(`Unknown option: ${token}`);
          }
          this.setPath(token);
      }
    }

    if (!this.args.path && !this.args.help && !this.args.version) {
      throw new ValidationError('Missing required argument: <path>');
    }

    return {
      ...this.args,
      _provided: this.provided,
    };
  }
}

export function parseArgs(argv: string[]): ParsedArgs {
  const parser = new ArgumentParser();
  return parser.parse(argv);
}
