/**
 * promptcheck run
 * Run suite files against their providers and report every case
 */

import { type Command, InvalidArgumentError } from 'commander';
import { PriceTable } from '../providers/pricing.ts';
import { ProviderRegistry, secretVariables } from '../providers/provider-factory.ts';
import { exitCodeFor, summarize } from '../runner/result-aggregator.ts';
import { FileSnapshotStore } from '../runner/snapshot-store.ts';
import { runSuite } from '../runner/test-engine.ts';
import type { TestOutcome } from '../runner/types.ts';
import { ConsoleReporter } from '../ui/console-reporter.ts';
import { ConfigLoader } from '../utils/config-loader.ts';
import { renderFailure } from '../utils/error-renderer.ts';
import { ConsoleLogger, type Logger, SilentLogger } from '../utils/logger.ts';
import { Redactor } from '../utils/redactor.ts';
import { loadSuites, reportValidation, resolveSuiteFiles, useColor } from './shared.ts';

export interface RunCommandOptions {
  concurrency?: number;
  timeout?: number;
  maxAttempts?: number;
  filter?: string;
  updateSnapshots?: boolean;
  validate: boolean;
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function nonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

export async function executeRun(patterns: string[], options: RunCommandOptions, logger: Logger): Promise<number> {
  const config = ConfigLoader.load();
  const files = await resolveSuiteFiles(patterns);
  if (files.length === 0) {
    logger.error('❌ No suite files matched');
    return 1;
  }

  const suites = loadSuites(files);
  if (options.validate && reportValidation(suites, Object.keys(config.providers), logger) > 0) {
    logger.error('Fix the issues above, or pass --no-validate to run anyway.');
    return 1;
  }

  const engineLogger = options.json ? new SilentLogger() : logger;
  const registry = new ProviderRegistry(config);
  const redactor = Redactor.fromEnvironment(secretVariables(config));
  const pricing = new PriceTable(config.pricing);
  const snapshotStore = await FileSnapshotStore.open(config.snapshot_dir, {
    updateMode: options.updateSnapshots ?? false,
    logger: engineLogger,
  });
  const reporter = new ConsoleReporter(logger, {
    quiet: options.quiet,
    verbose: options.verbose,
    color: useColor(),
  });

  // First Ctrl-C stops new work; cases already in flight finish
  const controller = new AbortController();
  const onSigint = () => {
    if (!controller.signal.aborted) {
      logger.warn('\n🛑 Cancelling: no new cases will start (Ctrl-C again to exit)');
      controller.abort();
    } else {
      process.exit(130);
    }
  };
  process.on('SIGINT', onSigint);

  const started = performance.now();
  const allTests: TestOutcome[] = [];
  try {
    for (const { file, suite } of suites) {
      const summary = await runSuite(suite, {
        resolveProvider: (modelConfig) => registry.resolve(modelConfig),
        concurrency: options.concurrency ?? config.concurrency,
        timeoutMs: options.timeout ?? config.timeout_ms,
        retry: {
          maxAttempts: options.maxAttempts ?? config.retry.max_attempts,
          baseDelayMs: config.retry.base_delay_ms,
          jitter: config.retry.jitter,
        },
        snapshotStore,
        pricing,
        filter: options.filter,
        signal: controller.signal,
        logger: engineLogger,
        redactor,
      });
      allTests.push(...summary.tests);
      if (!options.json) {
        reporter.suite(file, summary.tests);
      }
    }
  } finally {
    process.off('SIGINT', onSigint);
  }

  const combined = summarize(allTests, Math.round(performance.now() - started));
  if (options.json) {
    logger.log(JSON.stringify(redactor.redactValue(combined), null, 2));
  } else {
    reporter.summary(combined);
  }
  return exitCodeFor(combined);
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run prompt regression tests')
    .argument('[files...]', 'Suite files or glob patterns (default: tests.yaml)')
    .option('-c, --concurrency <n>', 'Maximum cases in flight', positiveInt)
    .option('-t, --timeout <ms>', 'Per-attempt provider timeout in ms (0 disables)', nonNegativeInt)
    .option('--max-attempts <n>', 'Provider attempts per case, including the first', positiveInt)
    .option('-f, --filter <pattern>', 'Only run tests whose id contains this text or matches this glob')
    .option('-u, --update-snapshots', 'Overwrite stored snapshots with the current output')
    .option('--no-validate', 'Skip static validation before running')
    .option('--json', 'Print the run summary as JSON')
    .option('-v, --verbose', 'Show debug output and the full model output of every case')
    .option('-q, --quiet', 'Only print the summary')
    .action(async (patterns: string[], options: RunCommandOptions) => {
      const logger = new ConsoleLogger({ verbose: options.verbose });
      try {
        process.exitCode = await executeRun(patterns, options, logger);
      } catch (error) {
        logger.error(renderFailure(error, useColor()));
        process.exitCode = 1;
      }
    });
}
