import type { Logger } from '../infrastructure/logging/logger.js';

/**
 * Where a config value came from and where to report problems with it
 */
export interface ConfigSource {
  path: string;
  logger: Logger;
}

export function warnConfig(source: ConfigSource, message: string): void {
  source.logger.warn(message);
}

function parseInteger(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : undefined;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!/^\d+$/.test(trimmed)) {
      return undefined;
    }
    return Number.parseInt(trimmed, 10);
  }
  return undefined;
}

export function validateDepth(value: unknown, name: string, source: ConfigSource): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  const depth = parseInteger(value);
  if (depth === undefined || depth < 0) {
    warnConfig(source, `Ignoring invalid ${name} in ${source.path || 'config'}; expected a non-negative integer.`);
    return undefined;
  }

  return depth;
}

export function validateJobs(value: unknown, name: string, source: ConfigSource): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  const jobs = parseInteger(value);
  if (jobs === undefined || jobs < 1) {
    warnConfig(source, `Ignoring invalid ${name} in ${source.path || 'config'}; expected a positive integer.`);
    return undefined;
  }

  return jobs;
}

export function validateBoolean(value: unknown, name: string, source: ConfigSource): boolean | undefined {
  if (typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'string') {
    const trimmed = value.trim().toLowerCase();
    if (trimmed === 'true') {
      return true;
    }
    if (trimmed === 'false') {
      return false;
    }
  }

  if (value !== undefined && value !== null) {
    warnConfig(source, `Ignoring invalid ${name} in ${source.path || 'config'}; expected true or false.`);
  }
  return undefined;
}

export function pickFirst<T>(
  sources: Array<{ value: unknown; name: string }>,
  validator: (value: unknown, name: string, source: ConfigSource) => T | undefined,
  source: ConfigSource,
): T | undefined {
  for (const { value, name } of sources) {
    if (value === undefined || value === null) {
      continue;
    }
    const validated = validator(value, name, source);
    if (validated !== undefined) {
      return validated;
    }
  }
  return undefined;
}
