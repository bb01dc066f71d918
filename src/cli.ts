#!/usr/bin/env node
import { App } from './app.js';
import { logger } from './utils/logger.js';
import { getErrorMessage } from './utils/errorHandling.js';
import { ValidationError } from './errors/index.js';
import { parseArgs, USAGE } from './cli/args.js';
import type { CliCommand } from './cli/args.js';
import { formatBenchmarkReport, formatScanSummary } from './cli/summaryReport.js';

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled promise rejection detected - this indicates a bug that must be fixed', {
    reason: reason instanceof Error ? {
      name: reason.name,
      message: reason.message,
      stack: reason.stack,
    } : reason,
  });
  process.exit(1);
});

async function main(argv: readonly string[]): Promise<number> {
  let parsed: CliCommand;
  try {
    parsed = parseArgs(argv);
  } catch (error) {
    if (error instanceof ValidationError) {
      console.error(error.message);
      console.error(USAGE);
      return 2;
    }
    throw error;
  }

  if (parsed.command === 'help') {
    console.log(USAGE);
    return 0;
  }

  const app = new App();

  if (parsed.command === 'scan') {
    const summary = await app.scan({ rootPath: parsed.rootPath, apply: parsed.apply });
    console.log(formatScanSummary(summary));
    return 0;
  }

  const report = await app.benchmark(parsed.positiveDir, parsed.negativeDir);
  console.log(formatBenchmarkReport(report));
  return 0;
}

main(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    logger.error('clipsift failed', { error: getErrorMessage(error) });
    console.error(getErrorMessage(error));
    process.exitCode = 1;
  });
