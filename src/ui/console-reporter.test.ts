import { describe, expect, it } from 'vitest';
import { caseOutcome } from '../__fixtures__/index.ts';
import { aggregate, summarize } from '../runner/result-aggregator.ts';
import type { CaseOutcome } from '../runner/types.ts';
import { CaseStatus } from '../types/status.ts';
import type { Logger } from '../utils/logger.ts';
import {
  ConsoleReporter,
  formatCaseOutcome,
  formatDuration,
  formatLatency,
  formatSummary,
  formatTestOutcome,
} from './console-reporter.ts';

const passed: CaseOutcome = caseOutcome({
  testId: 'greeting',
  ordinal: 0,
  label: 'name=Alice',
  response: { text: 'Hello Alice', latencyMs: 120, tokensIn: 10, tokensOut: 5, costUsd: 0.25 },
  tokensIn: 10,
  tokensOut: 5,
  costUsd: 0.25,
  assertions: [
    { assertion: { kind: 'contains', value: 'Alice' }, label: 'contains "Alice"', passed: true, detail: 'found in output' },
  ],
});

const failed: CaseOutcome = caseOutcome({
  testId: 'greeting',
  ordinal: 1,
  status: CaseStatus.FAILED,
  passed: false,
  attempts: 4,
  error: 'ProviderTransientError: [stub] API error (503): down',
  assertions: [
    {
      assertion: { kind: 'provider' },
      label: 'provider call',
      passed: false,
      detail: 'failed after 4 attempt(s): [stub] API error (503): down',
    },
  ],
});

class LinesLogger implements Logger {
  readonly lines: string[] = [];
  log(message: string): void {
    this.lines.push(message);
  }
  info(): void {}
  warn(): void {}
  error(): void {}
  debug(): void {}
}

describe('formatCaseOutcome', () => {
  it('shows metrics and each assertion', () => {
    expect(formatCaseOutcome(passed)).toEqual([
      '  ✅ greeting #0 (name=Alice)  120ms · 1 attempt · 10/5 tokens · $0.250000',
      '     ✓ contains "Alice": found in output',
    ]);
  });

  it('shows the synthetic provider assertion of a failed call', () => {
    expect(formatCaseOutcome(failed)).toEqual([
      '  ❌ greeting #1',
      '     ✗ provider call: failed after 4 attempt(s): [stub] API error (503): down',
    ]);
  });

  it('shows the error of an errored or skipped case', () => {
    const errored = caseOutcome({
      ordinal: 2,
      status: CaseStatus.ERRORED,
      passed: false,
      error: 'TemplateError: Undefined template variable: name',
    });
    expect(formatCaseOutcome(errored)).toEqual(['  💥 t #2', '     TemplateError: Undefined template variable: name']);

    const skipped = caseOutcome({ ordinal: 3, status: CaseStatus.SKIPPED, passed: false, error: 'run cancelled' });
    expect(formatCaseOutcome(skipped)).toEqual(['  ⏭️  t #3', '     run cancelled']);
  });

  it('colours assertion marks when asked', () => {
    expect(formatCaseOutcome(passed, { color: true })[1]).toBe('     \x1b[32m✓\x1b[0m contains "Alice": found in output');
  });
});

describe('verbose output', () => {
  it('follows the assertions with every line of the model output', () => {
    const multiline = caseOutcome({
      ordinal: 4,
      response: { text: 'Hello Alice\nHow are you?', latencyMs: 80, tokensIn: 3, tokensOut: 6, costUsd: 0 },
    });
    expect(formatCaseOutcome(multiline, { verbose: true })).toEqual([
      '  ✅ t #4  80ms · 1 attempt · 0/0 tokens · $0.000000',
      '     output:',
      '     │ Hello Alice',
      '     │ How are you?',
    ]);
  });

  it('prints nothing extra for a case without a response', () => {
    const errored = caseOutcome({ ordinal: 5, status: CaseStatus.ERRORED, passed: false, error: 'TemplateError: x' });
    expect(formatCaseOutcome(errored, { verbose: true })).toEqual(['  💥 t #5', '     TemplateError: x']);
  });

  it('is passed through by the reporter', () => {
    const logger = new LinesLogger();
    new ConsoleReporter(logger, { verbose: true }).suite('tests.yaml', [aggregate('greeting', [passed])]);
    expect(logger.lines[1].split('\n')).toEqual([
      '📋 greeting  1/1 passed',
      '  ✅ greeting #0 (name=Alice)  120ms · 1 attempt · 10/5 tokens · $0.250000',
      '     ✓ contains "Alice": found in output',
      '     output:',
      '     │ Hello Alice',
    ]);
  });
});

describe('formatTestOutcome', () => {
  it('puts a header over the cases', () => {
    const lines = formatTestOutcome(aggregate('greeting', [failed, passed]));
    expect(lines[0]).toBe('📋 greeting  1/2 passed');
    expect(lines[1]).toBe('  ✅ greeting #0 (name=Alice)  120ms · 1 attempt · 10/5 tokens · $0.250000');
  });

  it('shows why a test could not run', () => {
    expect(formatTestOutcome(aggregate('bulk', [], 'DataSourceError: Cases file a.csv: missing header row'))).toEqual([
      '📋 bulk  0/1 passed',
      '  💥 DataSourceError: Cases file a.csv: missing header row',
    ]);
  });
});

describe('formatSummary', () => {
  it('prints counts, totals and latency', () => {
    const summary = summarize([aggregate('greeting', [passed, failed])], 1500);
    expect(formatSummary(summary)).toBe(
      [
        '❌ 1 test(s), 2 case(s): 1 passed, 1 failed, 0 errored, 0 skipped (50.0%)',
        '   tokens 10/5 · cost $0.250000 · p50 120ms · p90 120ms · p95 120ms · p99 120ms · 1.5s',
      ].join('\n')
    );
  });

  it('formats durations and missing latency', () => {
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(61_000)).toBe('61.0s');
    expect(formatLatency(null)).toBe('latency n/a');
  });
});

describe('ConsoleReporter', () => {
  const summary = summarize([aggregate('greeting', [passed])], 10);

  it('prints each suite and the summary', () => {
    const logger = new LinesLogger();
    const reporter = new ConsoleReporter(logger);
    reporter.suite('tests.yaml', summary.tests);
    reporter.summary(summary);

    expect(logger.lines[0]).toBe('\n🧪 tests.yaml');
    expect(logger.lines[1].split('\n')[0]).toBe('📋 greeting  1/1 passed');
    expect(logger.lines[2].startsWith('\n✨ 1 test(s), 1 case(s): 1 passed')).toBe(true);
  });

  it('prints only the summary when quiet', () => {
    const logger = new LinesLogger();
    const reporter = new ConsoleReporter(logger, { quiet: true });
    reporter.suite('tests.yaml', summary.tests);
    reporter.summary(summary);
    expect(logger.lines).toHaveLength(1);
  });
});
