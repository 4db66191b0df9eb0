import { CaseStatus, type CaseStatusType } from '../types/status.ts';
import type { CaseOutcome, LatencyStats, RunSummary, TestOutcome } from '../runner/types.ts';
import type { Logger } from '../utils/logger.ts';

const ICONS: Record<CaseStatusType, string> = {
  [CaseStatus.PASSED]: '✅',
  [CaseStatus.FAILED]: '❌',
  [CaseStatus.ERRORED]: '💥',
  [CaseStatus.SKIPPED]: '⏭️ ',
};

const ANSI = {
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
  reset: '\x1b[0m',
};

type Paint = (code: keyof typeof ANSI, text: string) => string;

function painter(color: boolean): Paint {
  return (code, text) => (color ? `${ANSI[code]}${text}${ANSI.reset}` : text);
}

export function formatCost(usd: number): string {
  return `$${usd.toFixed(6)}`;
}

export function formatDuration(ms: number): string {
  return ms < 1000 ? `${Math.round(ms)}ms` : `${(ms / 1000).toFixed(1)}s`;
}

export function formatLatency(stats: LatencyStats | null): string {
  if (!stats) return 'latency n/a';
  return `p50 ${stats.p50}ms · p90 ${stats.p90}ms · p95 ${stats.p95}ms · p99 ${stats.p99}ms`;
}

function caseName(outcome: CaseOutcome): string {
  const name = `${outcome.testId} #${outcome.ordinal}`;
  return outcome.label ? `${name} (${outcome.label})` : name;
}

export interface FormatOptions {
  color?: boolean;
  /** Follow each case with the full model output */
  verbose?: boolean;
}

/**
 * One status line per case, followed by every assertion and its detail.
 */
export function formatCaseOutcome(outcome: CaseOutcome, options: FormatOptions = {}): string[] {
  const { color = false, verbose = false } = options;
  const paint = painter(color);
  const icon = ICONS[outcome.status];
  const lines: string[] = [];

  if (outcome.response) {
    const plural = outcome.attempts === 1 ? 'attempt' : 'attempts';
    const metrics = [
      `${outcome.response.latencyMs}ms`,
      `${outcome.attempts} ${plural}`,
      `${outcome.tokensIn}/${outcome.tokensOut} tokens`,
      formatCost(outcome.costUsd),
    ].join(' · ');
    lines.push(`  ${icon} ${caseName(outcome)}  ${paint('dim', metrics)}`);
  } else {
    lines.push(`  ${icon} ${caseName(outcome)}`);
    if (outcome.error && outcome.assertions.length === 0) {
      lines.push(`     ${paint(outcome.status === CaseStatus.SKIPPED ? 'yellow' : 'red', outcome.error)}`);
    }
  }

  for (const result of outcome.assertions) {
    const mark = result.passed ? paint('green', '✓') : paint('red', '✗');
    lines.push(`     ${mark} ${result.label}: ${result.detail}`);
  }

  if (verbose && outcome.response) {
    lines.push(`     ${paint('bold', 'output:')}`);
    for (const line of outcome.response.text.split('\n')) {
      lines.push(`     │ ${paint('dim', line)}`);
    }
  }

  return lines;
}

export function formatTestOutcome(test: TestOutcome, options: FormatOptions = {}): string[] {
  const paint = painter(options.color ?? false);
  const header = `📋 ${paint('bold', test.testId)}  ${test.passed}/${test.total - test.skipped} passed`;
  const lines = [header];
  if (test.error) {
    lines.push(`  💥 ${paint('red', test.error)}`);
  }
  for (const outcome of test.cases) {
    lines.push(...formatCaseOutcome(outcome, options));
  }
  return lines;
}

export function formatSummary(summary: RunSummary, color = false): string {
  const paint = painter(color);
  const { totals } = summary;
  const counts = [
    paint('green', `${totals.passed} passed`),
    paint(totals.failed > 0 ? 'red' : 'dim', `${totals.failed} failed`),
    paint(totals.errored > 0 ? 'red' : 'dim', `${totals.errored} errored`),
    paint(totals.skipped > 0 ? 'yellow' : 'dim', `${totals.skipped} skipped`),
  ].join(', ');

  return [
    `${summary.passed ? '✨' : '❌'} ${totals.tests} test(s), ${totals.total} case(s): ${counts} (${(totals.passRate * 100).toFixed(1)}%)`,
    `   tokens ${totals.tokensIn}/${totals.tokensOut} · cost ${formatCost(totals.costUsd)} · ${formatLatency(totals.latency)} · ${formatDuration(summary.durationMs)}`,
  ].join('\n');
}

export interface ConsoleReporterOptions {
  /** Print only the summary */
  quiet?: boolean;
  color?: boolean;
  /** Print each case's full model output */
  verbose?: boolean;
}

/**
 * Terminal output for a finished run.
 */
export class ConsoleReporter {
  private readonly quiet: boolean;
  private readonly color: boolean;
  private readonly verbose: boolean;

  constructor(
    private readonly logger: Logger,
    options: ConsoleReporterOptions = {}
  ) {
    this.quiet = options.quiet ?? false;
    this.color = options.color ?? false;
    this.verbose = options.verbose ?? false;
  }

  /**
   * Every test of one suite file, in declaration order.
   */
  suite(suiteFile: string, tests: readonly TestOutcome[]): void {
    if (this.quiet) return;
    this.logger.log(`\n🧪 ${suiteFile}`);
    for (const test of tests) {
      this.logger.log(formatTestOutcome(test, { color: this.color, verbose: this.verbose }).join('\n'));
    }
  }

  summary(summary: RunSummary): void {
    this.logger.log(`\n${formatSummary(summary, this.color)}`);
  }
}
