import { relativeRepositoryPath } from '../domain/repository.js';
import type { RepositoryResult, ScanReport } from '../types/scan.js';

export const ANSI = {
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  reset: '\x1b[0m',
} as const;

export interface ReportFormatOptions {
  raw: boolean;
  color: boolean;
}

function paint(text: string, code: string, color: boolean): string {
  return color ? `${code}${text}${ANSI.reset}` : text;
}

/**
 * Formats one repository for the human-readable report
 */
export function formatRepositoryLine(
  result: RepositoryResult,
  root: string,
  options: { color: boolean; showAhead: boolean }
): string {
  const { color, showAhead } = options;
  const dirty = result.isDirty ? paint('*', ANSI.red, color) : ' ';
  const relative = relativeRepositoryPath(root, result.path);
  const local = result.isLocalOnly ? ` ${paint('[local]', ANSI.yellow, color)}` : '';
  const ahead = showAhead ? ` ${paint(`[↑${result.aheadCount ?? 0}]`, ANSI.blue, color)}` : '';
  return ` ${dirty} ${relative}${local}${ahead}`;
}

export function formatSummary(results: readonly RepositoryResult[]): string {
  const dirtyCount = results.filter((result) => result.isDirty).length;
  const localCount = results.filter((result) => result.isLocalOnly).length;
  return `${results.length} repos, ${dirtyCount} dirty, ${localCount} local-only`;
}

/**
 * Renders a scan report. Raw mode emits bare relative paths for piping.
 */
export function renderReport(report: ScanReport, options: ReportFormatOptions): string {
  if (options.raw) {
    return report.results
      .map((result) => `${relativeRepositoryPath(report.root, result.path)}\n`)
      .join('');
  }

  const lines = report.results.map((result) =>
    formatRepositoryLine(result, report.root, { color: options.color, showAhead: report.computeAhead })
  );
  return `${lines.join('\n')}\n\n${formatSummary(report.results)}\n`;
}
