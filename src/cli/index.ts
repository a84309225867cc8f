/**
 * CLI Module
 *
 * - arg-parser: Command-line argument parsing
 * - config: Configuration file loading and normalization
 * - config-resolver: Merges CLI args with file config and resolves final values
 * - validation: Validation utilities for config values
 * - report-formatter: Human and raw report rendering
 * - help: Help text and version display
 * - types: TypeScript type definitions
 * - constants: Shared constants
 */

export { parseArgs, expandShortFlags } from './arg-parser.js';
export { loadConfig, normalizeConfig } from './config.js';
export { resolveConfig, colorDisabledByEnv } from './config-resolver.js';
export { getHelpText, readPackageVersion } from './help.js';
export { formatRepositoryLine, formatSummary, renderReport, ANSI } from './report-formatter.js';
export type { ReportFormatOptions } from './report-formatter.js';
export * from './types.js';
export * from './constants.js';
