import fs from 'node:fs/promises';
import { validateBoolean, validateDepth, validateJobs, pickFirst, warnConfig, type ConfigSource } from './validation.js';
import { extractErrorMessage } from '../infrastructure/errors/index.js';
import { createStderrLogger, type Logger } from '../infrastructure/logging/logger.js';
import { getConfigFilePath, LOG_PREFIX } from './constants.js';
import type { FileConfig, NormalizedConfig } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function extractNestedObject(config: Record<string, unknown>, key: string): Record<string, unknown> | null {
  const value = config[key];
  return isRecord(value) ? value : null;
}

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

export function normalizeConfig(rawConfig: unknown, source: ConfigSource): FileConfig {
  if (!isRecord(rawConfig)) {
    if (rawConfig !== undefined) {
      warnConfig(source, `Ignoring config at ${source.path || 'config'} because it is not a JSON object.`);
    }
    return {};
  }

  const config = rawConfig;
  const normalized: FileConfig = {};
  const output = extractNestedObject(config, 'output');

  // Depth
  const depth = pickFirst(
    [
      { value: config['depth'], name: 'depth' },
      { value: config['maxDepth'], name: 'maxDepth' },
    ],
    validateDepth,
    source,
  );
  if (depth !== undefined) normalized.depth = depth;

  // Worker pool size
  const jobs = pickFirst(
    [
      { value: config['jobs'], name: 'jobs' },
      { value: config['concurrency'], name: 'concurrency' },
    ],
    validateJobs,
    source,
  );
  if (jobs !== undefined) normalized.jobs = jobs;

  // Colour
  const color = pickFirst(
    [
      { value: config['color'], name: 'color' },
      { value: output?.['color'], name: 'output.color' },
    ],
    validateBoolean,
    source,
  );
  if (color !== undefined) normalized.color = color;

  return normalized;
}

export async function loadConfig(
  configPath: string | null = getConfigFilePath(),
  logger: Logger = createStderrLogger({ prefix: LOG_PREFIX }),
): Promise<NormalizedConfig> {
  if (!configPath) {
    return { values: {}, path: null };
  }

  const source: ConfigSource = { path: configPath, logger };
  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf8');
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return { values: {}, path: configPath };
    }
    warnConfig(source, `Failed to read config at ${configPath}: ${extractErrorMessage(error, String(error))}`);
    return { values: {}, path: configPath };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    warnConfig(source, `Failed to parse config at ${configPath}: ${extractErrorMessage(error, String(error))}`);
    return { values: {}, path: configPath };
  }

  return { values: normalizeConfig(parsed, source), path: configPath };
}
