import {
  getConfigFilePath,
  getHelpText,
  LOG_PREFIX,
  loadConfig,
  parseArgs,
  readPackageVersion,
  renderReport,
  resolveConfig,
} from './cli/index.js';
import { handleError, NoMatchingRepositoriesError } from './infrastructure/errors/index.js';
import { createStderrLogger, type Logger } from './infrastructure/logging/logger.js';
import { createRepositoryScanService } from './services/scan-service.js';
import type { IRepositoryScanService } from './types/services.js';

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface CliContext {
  stdout?: OutputStream;
  stderr?: OutputStream;
  env?: NodeJS.ProcessEnv;
  configPath?: string | null;
  createScanService?: (logger: Logger) => IRepositoryScanService;
}

/**
 * Runs the command line and returns the process exit code
 */
export async function runCli(argv: string[], context: CliContext = {}): Promise<number> {
  const {
    stdout = process.stdout,
    stderr = process.stderr,
    env = process.env,
    configPath = getConfigFilePath(),
    createScanService = (logger: Logger) => createRepositoryScanService({ logger }),
  } = context;

  // Parse CLI arguments
  let args;
  try {
    args = parseArgs(argv);
  } catch (err) {
    const exitCode = handleError(err, stderr, 2);
    stderr.write('Use --help to see usage.\n');
    return exitCode;
  }

  // Handle help and version flags
  if (args.help) {
    stdout.write(getHelpText());
    return 0;
  }

  const logger = createStderrLogger({ verbose: args.verbose, prefix: LOG_PREFIX, stream: stderr });

  try {
    if (args.version) {
      stdout.write(`${await readPackageVersion()}\n`);
      return 0;
    }

    // Load and merge configuration
    const { values: fileConfig } = await loadConfig(configPath, logger);
    const config = resolveConfig(args, fileConfig, env);

    const report = await createScanService(logger).scan({
      root: config.root,
      maxDepth: config.maxDepth,
      concurrency: config.concurrency,
      filters: config.filters,
    });

    logger.debug(`Showing ${report.results.length} of ${report.discovered} repositories`);
    stdout.write(renderReport(report, { raw: config.raw, color: config.color }));
    return 0;
  } catch (err) {
    if (err instanceof NoMatchingRepositoriesError) {
      logger.debug(`Filters excluded all ${err.discovered} discovered repositories`);
    }
    return handleError(err, stderr);
  }
}

async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  process.exitCode = await runCli(argv);
}

export { main, parseArgs };
