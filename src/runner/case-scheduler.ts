import { CaseKind } from '../types/status.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';
import { erroredOutcome, skippedOutcome } from './case-executor.ts';
import type { Case, CaseOutcome, ResolvedCase } from './types.ts';

export type ExecuteCase = (testCase: ResolvedCase, signal?: AbortSignal) => Promise<CaseOutcome>;

export interface CaseSchedulerOptions {
  /** Maximum number of cases in flight at once (default: 5) */
  concurrency?: number;
  /** Checked before each new dispatch; cases not yet started are skipped */
  signal?: AbortSignal;
  logger?: Logger;
  /** Called as each case completes, in completion order */
  onOutcome?: (outcome: CaseOutcome) => void;
}

/**
 * Bounded worker pool over an ordered list of cases.
 *
 * Workers claim the next index synchronously, so no case is handed out twice.
 * Each outcome lands in the slot of its input position, so the returned list is
 * in input order no matter which calls finish first.
 */
export class CaseScheduler {
  private readonly concurrency: number;
  private readonly signal?: AbortSignal;
  private readonly logger: Logger;
  private readonly onOutcome: (outcome: CaseOutcome) => void;
  private active = 0;
  private peak = 0;

  constructor(
    private readonly executeCase: ExecuteCase,
    options: CaseSchedulerOptions = {}
  ) {
    const concurrency = options.concurrency ?? 5;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }
    this.concurrency = concurrency;
    this.signal = options.signal;
    this.logger = options.logger ?? new ConsoleLogger();
    this.onOutcome = options.onOutcome ?? (() => {});
  }

  /**
   * Highest number of provider-bound cases that were in flight at once during the last run.
   */
  get peakConcurrency(): number {
    return this.peak;
  }

  async run(cases: readonly Case[]): Promise<CaseOutcome[]> {
    const slots: Array<CaseOutcome | undefined> = new Array(cases.length).fill(undefined);
    let next = 0;
    let skipped = 0;
    this.peak = 0;

    const write = (index: number, outcome: CaseOutcome): void => {
      if (slots[index] !== undefined) {
        throw new Error(`Outcome slot ${index} written twice`);
      }
      slots[index] = outcome;
      this.onOutcome(outcome);
    };

    const worker = async (): Promise<void> => {
      while (next < cases.length) {
        const index = next;
        next += 1;
        const testCase = cases[index];

        if (this.signal?.aborted) {
          skipped += 1;
          write(index, skippedOutcome(testCase));
          continue;
        }

        if (testCase.kind === CaseKind.UNRESOLVED) {
          write(index, erroredOutcome(testCase, testCase.error));
          continue;
        }

        this.active += 1;
        this.peak = Math.max(this.peak, this.active);
        let outcome: CaseOutcome;
        try {
          outcome = await this.executeCase(testCase, this.signal);
        } catch (error) {
          // A throwing executor errors only its own case
          const reason = error instanceof Error ? error : new Error(String(error));
          this.logger.error(`  ✗ ${testCase.testId} #${testCase.ordinal}: ${reason.message}`);
          outcome = erroredOutcome(testCase, reason);
        } finally {
          this.active -= 1;
        }
        write(index, outcome);
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, cases.length) }, () => worker());
    await Promise.all(workers);

    if (skipped > 0) {
      this.logger.info(`  ⏭️  Run cancelled: ${skipped} case(s) skipped`);
    }

    return slots.map((outcome, index) => {
      if (!outcome) {
        throw new Error(`No outcome recorded for case at position ${index}`);
      }
      return outcome;
    });
  }
}
