import { minimatch } from 'minimatch';
import type { ProviderCall } from '../providers/provider.ts';
import { PriceTable } from '../providers/pricing.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';
import type { Redactor } from '../utils/redactor.ts';
import { AssertionEvaluator } from './assertion-evaluator.ts';
import { CaseExecutor, erroredOutcome } from './case-executor.ts';
import { CaseExpander, caseLabel } from './case-expander.ts';
import { CaseScheduler } from './case-scheduler.ts';
import { ConfigError, DataSourceError } from './errors.ts';
import { aggregate, summarize } from './result-aggregator.ts';
import { type Clock, RetryPolicy, type RetryState, type Sleep } from './retry-policy.ts';
import { MemorySnapshotStore, type SnapshotStore } from './snapshot-store.ts';
import type { Case, CaseOutcome, ModelConfig, RunSummary, Suite, TestDefinition } from './types.ts';

export interface RetrySettings {
  maxAttempts?: number;
  baseDelayMs?: number;
  jitter?: number;
}

export interface RunSuiteOptions {
  resolveProvider: (modelConfig: ModelConfig) => ProviderCall;
  /** Global limit on cases in flight across all tests (default: 5) */
  concurrency?: number;
  retry?: RetrySettings;
  /** Per-attempt timeout in ms (default: 30000) */
  timeoutMs?: number;
  /** Defaults to an in-memory store that is discarded after the run */
  snapshotStore?: SnapshotStore;
  pricing?: PriceTable;
  /** Substring of a test id, or a glob when it contains glob characters */
  filter?: string;
  signal?: AbortSignal;
  logger?: Logger;
  redactor?: Redactor;
  expander?: CaseExpander;
  clock?: Clock;
  sleep?: Sleep;
  random?: () => number;
  onOutcome?: (outcome: CaseOutcome) => void;
  onRetryStateChange?: (from: RetryState, to: RetryState) => void;
}

const GLOB_CHARS = /[*?[\]{}]/;

export function matchesFilter(testId: string, filter: string | undefined): boolean {
  if (!filter) return true;
  if (GLOB_CHARS.test(filter)) {
    return minimatch(testId, filter);
  }
  return testId.includes(filter);
}

interface ExpandedTest {
  test: TestDefinition;
  cases: Case[];
  /** Outcomes decided before the run: every declared case of a definition that failed validation */
  errored: CaseOutcome[];
  error?: string;
}

/**
 * A definition whose inline cases are known still reports each of them as errored;
 * one whose cases never loaded is counted once by the aggregator.
 */
function unexpandable(test: TestDefinition, error: ConfigError | DataSourceError): ExpandedTest {
  const errored =
    error instanceof ConfigError
      ? test.cases.map((inline, ordinal) =>
          erroredOutcome({ testId: test.id, ordinal, bindings: inline.input, label: caseLabel(inline.input) }, error)
        )
      : [];
  return { test, cases: [], errored, error: `${error.name}: ${error.message}` };
}

/**
 * Run every (filtered) test of a suite and fold the outcomes into a RunSummary.
 *
 * Cases from all tests share one scheduler, so the concurrency limit is global.
 * The snapshot store is flushed once at the end of the run, even when it fails;
 * a failed flush then never replaces the run's error.
 */
export async function runSuite(suite: Suite, options: RunSuiteOptions): Promise<RunSummary> {
  const logger = options.logger ?? new ConsoleLogger();
  const clock = options.clock ?? { now: () => performance.now() };
  const snapshotStore = options.snapshotStore ?? new MemorySnapshotStore([], { logger });
  const expander = options.expander ?? new CaseExpander();
  const started = clock.now();

  const selected = suite.tests.filter((test) => matchesFilter(test.id, options.filter));
  if (options.filter && selected.length === 0) {
    logger.warn(`⚠️  No tests match filter "${options.filter}"`);
  }

  const expanded: ExpandedTest[] = [];
  for (const test of selected) {
    try {
      expanded.push({ test, cases: await expander.expand(test), errored: [] });
    } catch (error) {
      if (error instanceof DataSourceError || error instanceof ConfigError) {
        logger.error(`  ✗ ${test.id}: ${error.message}`);
        expanded.push(unexpandable(test, error));
        continue;
      }
      throw error;
    }
  }

  const retryPolicy = new RetryPolicy({
    ...options.retry,
    timeoutMs: options.timeoutMs,
    random: options.random,
    sleep: options.sleep,
    clock,
    logger,
    onStateChange: options.onRetryStateChange,
  });
  const executor = new CaseExecutor({
    resolveProvider: options.resolveProvider,
    retryPolicy,
    evaluator: new AssertionEvaluator({ snapshotStore, logger }),
    pricing: options.pricing ?? new PriceTable(),
    redactor: options.redactor,
  });
  const scheduler = new CaseScheduler((testCase, signal) => executor.execute(testCase, signal), {
    concurrency: options.concurrency,
    signal: options.signal,
    logger,
    onOutcome: options.onOutcome,
  });

  let outcomes: CaseOutcome[];
  try {
    outcomes = await scheduler.run(expanded.flatMap((entry) => entry.cases));
  } catch (error) {
    // Keep what was recorded, but the run's own error is the one to report
    try {
      await snapshotStore.flush();
    } catch (flushError) {
      logger.error(`  ✗ ${flushError instanceof Error ? flushError.message : String(flushError)}`);
    }
    throw error;
  }
  await snapshotStore.flush();

  // Outcomes come back in input order, so each test owns a contiguous slice
  let offset = 0;
  const tests = expanded.map((entry) => {
    const slice = outcomes.slice(offset, offset + entry.cases.length);
    offset += entry.cases.length;
    return aggregate(entry.test.id, [...entry.errored, ...slice], entry.error);
  });
  return summarize(tests, Math.max(0, Math.round(clock.now() - started)));
}
