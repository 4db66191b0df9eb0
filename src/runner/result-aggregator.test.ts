import { describe, expect, it } from 'vitest';
import { caseOutcome } from '../__fixtures__/index.ts';
import { CaseStatus } from '../types/status.ts';
import { aggregate, exitCodeFor, latencyStats, percentile, summarize } from './result-aggregator.ts';
import type { CaseOutcome } from './types.ts';

function withLatency(ordinal: number, latencyMs: number): CaseOutcome {
  return caseOutcome({
    ordinal,
    response: { text: 'ok', latencyMs, tokensIn: 10, tokensOut: 5, costUsd: 0.01 },
    tokensIn: 10,
    tokensOut: 5,
    costUsd: 0.01,
  });
}

function shuffled<T>(items: readonly T[], seed: number): T[] {
  const copy = [...items];
  let state = seed;
  for (let i = copy.length - 1; i > 0; i--) {
    state = (state * 16807) % 2147483647;
    const j = state % (i + 1);
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
}

describe('aggregate', () => {
  const outcomes = Array.from({ length: 10 }, (_, i) => withLatency(i, (i + 1) * 10));

  it('orders cases by ordinal whatever the arrival order', () => {
    const expected = aggregate('t', outcomes);
    for (const seed of [1, 7, 42, 99, 1234]) {
      const result = aggregate('t', shuffled(outcomes, seed));
      expect(result.cases.map((c) => c.ordinal)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
      expect(result).toEqual(expected);
    }
  });

  it('computes nearest-rank latency percentiles', () => {
    expect(aggregate('t', outcomes).latency).toEqual({
      count: 10,
      min: 10,
      max: 100,
      mean: 55,
      p50: 50,
      p90: 90,
      p95: 100,
      p99: 100,
    });
  });

  it('takes latency from successful calls only but cost and tokens from every case', () => {
    const failed = caseOutcome({
      ordinal: 2,
      status: CaseStatus.FAILED,
      passed: false,
      attempts: 4,
      tokensIn: 40,
      tokensOut: 0,
      costUsd: 0.5,
    });
    const result = aggregate('t', [withLatency(0, 100), withLatency(1, 300), failed]);

    expect(result.latency?.count).toBe(2);
    expect(result.latency?.mean).toBe(200);
    expect(result.tokensIn).toBe(60);
    expect(result.costUsd).toBeCloseTo(0.52, 10);
    expect(result).toMatchObject({ total: 3, passed: 2, failed: 1, errored: 0, skipped: 0 });
    expect(result.passRate).toBeCloseTo(2 / 3, 10);
  });

  it('counts a test that could not be expanded as errored', () => {
    const result = aggregate('broken', [], 'DataSourceError: Cases file x.csv: ENOENT');
    expect(result).toMatchObject({ total: 1, errored: 1, passRate: 0, latency: null });
    expect(result.error).toBe('DataSourceError: Cases file x.csv: ENOENT');
  });

  it('leaves skipped cases out of the pass rate', () => {
    const result = aggregate('t', [
      caseOutcome({ ordinal: 0 }),
      caseOutcome({ ordinal: 1, status: CaseStatus.SKIPPED, passed: false }),
    ]);
    expect(result.passRate).toBe(1);
  });
});

describe('percentile', () => {
  it('returns 0 for no samples and the only value for one', () => {
    expect(percentile([], 50)).toBe(0);
    expect(percentile([7], 99)).toBe(7);
    expect(latencyStats([])).toBeNull();
  });
});

describe('summarize', () => {
  it('adds up tests and decides the exit code', () => {
    const passing = aggregate('a', [withLatency(0, 10)]);
    const failing = aggregate('b', [caseOutcome({ ordinal: 0, status: CaseStatus.FAILED, passed: false })]);

    const good = summarize([passing], 5);
    expect(good.passed).toBe(true);
    expect(exitCodeFor(good)).toBe(0);

    const bad = summarize([passing, failing], 5);
    expect(bad.totals).toMatchObject({ tests: 2, total: 2, passed: 1, failed: 1, erroredTests: 0 });
    expect(exitCodeFor(bad)).toBe(1);
  });

  it('fails the run when a test definition errored', () => {
    const summary = summarize([aggregate('broken', [], 'ConfigError: bad')], 1);
    expect(summary.totals.erroredTests).toBe(1);
    expect(exitCodeFor(summary)).toBe(1);
  });

  it('passes a run where everything was skipped', () => {
    const summary = summarize([aggregate('t', [caseOutcome({ ordinal: 0, status: CaseStatus.SKIPPED, passed: false })])], 1);
    expect(exitCodeFor(summary)).toBe(0);
  });
});
