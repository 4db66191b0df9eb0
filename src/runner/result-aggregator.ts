import { CaseStatus } from '../types/status.ts';
import type { CaseOutcome, LatencyStats, OutcomeCounts, RunSummary, TestOutcome } from './types.ts';

/**
 * Nearest-rank percentile over an ascending list.
 */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return 0;
  const rank = Math.ceil((p / 100) * sorted.length);
  const index = Math.min(sorted.length - 1, Math.max(0, rank - 1));
  return sorted[index];
}

export function latencyStats(latencies: readonly number[]): LatencyStats | null {
  if (latencies.length === 0) return null;
  const sorted = [...latencies].sort((a, b) => a - b);
  const sum = sorted.reduce((total, value) => total + value, 0);
  return {
    count: sorted.length,
    min: sorted[0],
    max: sorted[sorted.length - 1],
    mean: sum / sorted.length,
    p50: percentile(sorted, 50),
    p90: percentile(sorted, 90),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
  };
}

function countOutcomes(outcomes: readonly CaseOutcome[]): OutcomeCounts {
  const counts: OutcomeCounts = { total: outcomes.length, passed: 0, failed: 0, errored: 0, skipped: 0 };
  for (const outcome of outcomes) {
    switch (outcome.status) {
      case CaseStatus.PASSED:
        counts.passed += 1;
        break;
      case CaseStatus.FAILED:
        counts.failed += 1;
        break;
      case CaseStatus.ERRORED:
        counts.errored += 1;
        break;
      case CaseStatus.SKIPPED:
        counts.skipped += 1;
        break;
    }
  }
  return counts;
}

function passRate(counts: OutcomeCounts): number {
  const decided = counts.total - counts.skipped;
  return decided === 0 ? 0 : counts.passed / decided;
}

/**
 * Fold one test's case outcomes into a TestOutcome.
 * Depends only on the ordinal-ordered sequence, never on arrival order.
 */
export function aggregate(testId: string, outcomes: readonly CaseOutcome[], error?: string): TestOutcome {
  const cases = [...outcomes].sort((a, b) => a.ordinal - b.ordinal);
  const counts = countOutcomes(cases);
  // A definition that could not be expanded has no cases but still counts as one errored case
  if (error !== undefined && cases.length === 0) {
    counts.total += 1;
    counts.errored += 1;
  }

  // Latency over successful calls only; cost and tokens over every attempted case
  const latencies = cases.flatMap((outcome) => (outcome.response ? [outcome.response.latencyMs] : []));

  return {
    testId,
    cases,
    ...(error !== undefined ? { error } : {}),
    ...counts,
    passRate: passRate(counts),
    tokensIn: cases.reduce((total, outcome) => total + outcome.tokensIn, 0),
    tokensOut: cases.reduce((total, outcome) => total + outcome.tokensOut, 0),
    costUsd: cases.reduce((total, outcome) => total + outcome.costUsd, 0),
    latency: latencyStats(latencies),
  };
}

export function summarize(tests: readonly TestOutcome[], durationMs: number): RunSummary {
  const counts: OutcomeCounts = { total: 0, passed: 0, failed: 0, errored: 0, skipped: 0 };
  for (const test of tests) {
    counts.total += test.total;
    counts.passed += test.passed;
    counts.failed += test.failed;
    counts.errored += test.errored;
    counts.skipped += test.skipped;
  }

  const latencies = tests.flatMap((test) =>
    test.cases.flatMap((outcome) => (outcome.response ? [outcome.response.latencyMs] : []))
  );

  return {
    tests: [...tests],
    totals: {
      tests: tests.length,
      erroredTests: tests.filter((test) => test.error !== undefined).length,
      ...counts,
      passRate: passRate(counts),
      tokensIn: tests.reduce((total, test) => total + test.tokensIn, 0),
      tokensOut: tests.reduce((total, test) => total + test.tokensOut, 0),
      costUsd: tests.reduce((total, test) => total + test.costUsd, 0),
      latency: latencyStats(latencies),
    },
    durationMs,
    passed: counts.failed === 0 && counts.errored === 0,
  };
}

/**
 * Non-zero when any case failed or errored.
 */
export function exitCodeFor(summary: RunSummary): number {
  return summary.totals.failed > 0 || summary.totals.errored > 0 ? 1 : 0;
}
