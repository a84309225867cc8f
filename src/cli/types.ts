import type { ScanFilters } from '../types/scan.js';

export interface CliConfig {
  path: string | null;
  depth: number | null;
  dirty: boolean;
  local: boolean;
  unpushed: boolean;
  raw: boolean;
  jobs: number | null;
  color: boolean | null;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

export interface ParsedArgs extends CliConfig {
  _provided: Record<string, boolean>;
}

/**
 * Values accepted from the config file
 */
export interface FileConfig {
  depth?: number;
  jobs?: number;
  color?: boolean;
}

export interface NormalizedConfig {
  values: FileConfig;
  path: string | null;
}

export interface ResolvedConfig {
  root: string;
  maxDepth: number;
  concurrency: number;
  filters: ScanFilters;
  raw: boolean;
  color: boolean;
  verbose: boolean;
}
