import { setTimeout as delay } from 'node:timers/promises';
import { describe, expect, it } from 'vitest';
import { caseOutcome, resolvedCase } from '../__fixtures__/index.ts';
import { CaseKind, CaseStatus } from '../types/status.ts';
import { SilentLogger } from '../utils/logger.ts';
import { CaseScheduler, type ExecuteCase } from './case-scheduler.ts';
import { TemplateError } from './errors.ts';
import type { Case, ResolvedCase } from './types.ts';

const CASES: ResolvedCase[] = Array.from({ length: 8 }, (_, i) => resolvedCase('t', i, `prompt ${i}`));

// Later cases finish first
const reversed: ExecuteCase = async (testCase) => {
  await delay((CASES.length - testCase.ordinal) * 2);
  return caseOutcome({ ordinal: testCase.ordinal, passed: testCase.ordinal % 3 !== 0 });
};

describe('CaseScheduler', () => {
  it.each([1, 2, 3, 5, 8, 20])('returns outcomes in input order with concurrency %i', async (concurrency) => {
    const scheduler = new CaseScheduler(reversed, { concurrency, logger: new SilentLogger() });
    const outcomes = await scheduler.run(CASES);

    expect(outcomes.map((o) => o.ordinal)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    expect(outcomes.map((o) => o.passed)).toEqual([false, true, true, false, true, true, false, true]);
    expect(scheduler.peakConcurrency).toBeLessThanOrEqual(concurrency);
    expect(scheduler.peakConcurrency).toBe(Math.min(concurrency, CASES.length));
  });

  it('dispatches every case exactly once', async () => {
    const seen: number[] = [];
    const scheduler = new CaseScheduler(
      async (testCase) => {
        seen.push(testCase.ordinal);
        await delay(1);
        return caseOutcome({ ordinal: testCase.ordinal });
      },
      { concurrency: 3, logger: new SilentLogger() }
    );
    await scheduler.run(CASES);
    expect([...seen].sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
  });

  it('skips cases not yet started once the run is cancelled', async () => {
    const controller = new AbortController();
    const scheduler = new CaseScheduler(
      async (testCase) => {
        if (testCase.ordinal === 1) controller.abort();
        return caseOutcome({ ordinal: testCase.ordinal });
      },
      { concurrency: 1, signal: controller.signal, logger: new SilentLogger() }
    );

    const outcomes = await scheduler.run(CASES.slice(0, 4));

    expect(outcomes.map((o) => o.status)).toEqual([
      CaseStatus.PASSED,
      CaseStatus.PASSED,
      CaseStatus.SKIPPED,
      CaseStatus.SKIPPED,
    ]);
    expect(outcomes[2].error).toBe('run cancelled');
  });

  it('errors an unresolved case without executing it', async () => {
    const executed: number[] = [];
    const unresolved: Case = {
      kind: CaseKind.UNRESOLVED,
      testId: 't',
      ordinal: 1,
      bindings: {},
      label: '',
      error: new TemplateError('name', 'Hi {{name}}'),
    };
    const scheduler = new CaseScheduler(
      async (testCase) => {
        executed.push(testCase.ordinal);
        return caseOutcome({ ordinal: testCase.ordinal });
      },
      { logger: new SilentLogger() }
    );

    const outcomes = await scheduler.run([CASES[0], unresolved, CASES[2]]);

    expect(executed.sort()).toEqual([0, 2]);
    expect(outcomes[1].status).toBe(CaseStatus.ERRORED);
    expect(outcomes[1].error).toBe('TemplateError: Undefined template variable: name');
  });

  it('keeps going when one execution throws', async () => {
    const scheduler = new CaseScheduler(
      async (testCase) => {
        if (testCase.ordinal === 0) throw new Error('executor bug');
        return caseOutcome({ ordinal: testCase.ordinal });
      },
      { concurrency: 2, logger: new SilentLogger() }
    );

    const outcomes = await scheduler.run(CASES.slice(0, 3));

    expect(outcomes.map((o) => o.status)).toEqual([CaseStatus.ERRORED, CaseStatus.PASSED, CaseStatus.PASSED]);
    expect(outcomes[0].error).toBe('Error: executor bug');
  });

  it('rejects a non-positive concurrency limit', () => {
    expect(() => new CaseScheduler(reversed, { concurrency: 0 })).toThrow(RangeError);
  });
});
