/**
 * Retry policy for provider calls.
 *
 * The policy is an explicit state machine:
 * - ATTEMPTING: a call is in flight
 * - WAITING: a transient failure happened, backing off before the next attempt
 * - SUCCEEDED / FAILED / CANCELLED: terminal
 *
 * `transition` is pure, so the attempt count and delay schedule can be checked
 * without a network or a real clock.
 */
import { setTimeout as sleepFor } from 'node:timers/promises';
import type { ProviderCall } from '../providers/provider.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';
import { type ProviderError, classifyProviderError } from './llm-errors.ts';
import { withTimeout } from './timeout.ts';
import type { AttemptRecord, ModelConfig, ProviderCompletion } from './types.ts';

export enum RetryPhase {
  ATTEMPTING = 'ATTEMPTING',
  WAITING = 'WAITING',
  SUCCEEDED = 'SUCCEEDED',
  FAILED = 'FAILED',
  CANCELLED = 'CANCELLED',
}

export type RetryState =
  | { phase: RetryPhase.ATTEMPTING; attempt: number }
  | { phase: RetryPhase.WAITING; attempt: number; delayMs: number; error: ProviderError }
  | { phase: RetryPhase.SUCCEEDED; attempt: number }
  | { phase: RetryPhase.FAILED; attempt: number; error: ProviderError }
  | { phase: RetryPhase.CANCELLED; attempt: number };

export type RetryEvent =
  | { type: 'success' }
  | { type: 'failure'; error: ProviderError }
  | { type: 'resume' }
  | { type: 'cancel' };

export type RetryOutcome =
  | {
      kind: 'success';
      completion: ProviderCompletion;
      latencyMs: number;
      attempts: number;
      history: AttemptRecord[];
    }
  | { kind: 'failure'; error: ProviderError; attempts: number; history: AttemptRecord[] }
  | { kind: 'cancelled'; attempts: number; history: AttemptRecord[] };

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface Clock {
  now(): number;
}

export interface RetryPolicyOptions {
  /** Total attempts including the first (default: 4) */
  maxAttempts?: number;
  /** Delay before the second attempt; doubles for each one after (default: 500) */
  baseDelayMs?: number;
  /** Uniform jitter as a fraction of the delay, 0 disables (default: 0.2) */
  jitter?: number;
  /** Per-attempt timeout in ms, 0 disables (default: 30000) */
  timeoutMs?: number;
  random?: () => number;
  sleep?: Sleep;
  clock?: Clock;
  logger?: Logger;
  /** Optional callback on every state change */
  onStateChange?: (from: RetryState, to: RetryState) => void;
}

export interface RetryCallOptions {
  /** Checked before every retry; an abort also interrupts the backoff wait */
  signal?: AbortSignal;
  /** Used in log lines */
  label?: string;
}

const defaultSleep: Sleep = (ms, signal) => sleepFor(ms, undefined, { signal });

const systemClock: Clock = { now: () => performance.now() };

function isTerminal(state: RetryState): boolean {
  return (
    state.phase === RetryPhase.SUCCEEDED ||
    state.phase === RetryPhase.FAILED ||
    state.phase === RetryPhase.CANCELLED
  );
}

export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly jitter: number;
  readonly timeoutMs: number;
  private readonly random: () => number;
  private readonly sleep: Sleep;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly onStateChange: (from: RetryState, to: RetryState) => void;

  constructor(options: RetryPolicyOptions = {}) {
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? 4));
    this.baseDelayMs = Math.max(0, options.baseDelayMs ?? 500);
    this.jitter = Math.min(1, Math.max(0, options.jitter ?? 0.2));
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? defaultSleep;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? new ConsoleLogger();
    this.onStateChange = options.onStateChange ?? (() => {});
  }

  /**
   * Backoff before attempt k (k >= 2): baseDelay * 2^(k-2), jittered by up to ±jitter.
   */
  delayBefore(attempt: number): number {
    if (attempt < 2) return 0;
    const nominal = this.baseDelayMs * 2 ** (attempt - 2);
    if (this.jitter === 0) return nominal;
    const factor = 1 + (this.random() * 2 - 1) * this.jitter;
    return Math.max(0, Math.round(nominal * factor));
  }

  transition(state: RetryState, event: RetryEvent): RetryState {
    if (isTerminal(state)) {
      return state;
    }

    if (event.type === 'cancel') {
      return { phase: RetryPhase.CANCELLED, attempt: state.attempt };
    }

    switch (state.phase) {
      case RetryPhase.ATTEMPTING:
        if (event.type === 'success') {
          return { phase: RetryPhase.SUCCEEDED, attempt: state.attempt };
        }
        if (event.type === 'failure') {
          if (!event.error.transient || state.attempt >= this.maxAttempts) {
            return { phase: RetryPhase.FAILED, attempt: state.attempt, error: event.error };
          }
          return {
            phase: RetryPhase.WAITING,
            attempt: state.attempt,
            delayMs: this.delayBefore(state.attempt + 1),
            error: event.error,
          };
        }
        return state;
      case RetryPhase.WAITING:
        if (event.type === 'resume') {
          return { phase: RetryPhase.ATTEMPTING, attempt: state.attempt + 1 };
        }
        return state;
      default:
        return state;
    }
  }

  private advance(state: RetryState, event: RetryEvent): RetryState {
    const next = this.transition(state, event);
    if (next !== state) {
      this.onStateChange(state, next);
    }
    return next;
  }

  async call(
    provider: ProviderCall,
    prompt: string,
    modelConfig: ModelConfig,
    options: RetryCallOptions = {}
  ): Promise<RetryOutcome> {
    const { signal } = options;
    const label = options.label ?? provider.name;
    const history: AttemptRecord[] = [];
    let state: RetryState = { phase: RetryPhase.ATTEMPTING, attempt: 1 };
    let success: { completion: ProviderCompletion; latencyMs: number } | undefined;

    while (!isTerminal(state)) {
      if (state.phase === RetryPhase.ATTEMPTING) {
        const attempt = state.attempt;
        // In-flight work is never interrupted; cancellation only stops further attempts
        if (attempt > 1 && signal?.aborted) {
          state = this.advance(state, { type: 'cancel' });
          continue;
        }

        const controller = new AbortController();
        const started = this.clock.now();
        try {
          const completion = await withTimeout(
            provider.invoke(prompt, modelConfig, { signal: controller.signal }),
            this.timeoutMs,
            `${provider.name} call`,
            { abortController: controller }
          );
          const latencyMs = Math.max(0, Math.round(this.clock.now() - started));
          history.push({ attempt, latencyMs, tokensIn: completion.tokensIn, tokensOut: completion.tokensOut });
          success = { completion, latencyMs };
          state = this.advance(state, { type: 'success' });
        } catch (error) {
          const latencyMs = Math.max(0, Math.round(this.clock.now() - started));
          const providerError = classifyProviderError(error, provider.name);
          history.push({
            attempt,
            latencyMs,
            tokensIn: providerError.usage?.tokensIn ?? 0,
            tokensOut: providerError.usage?.tokensOut ?? 0,
            error: providerError.message,
            transient: providerError.transient,
          });
          state = this.advance(state, { type: 'failure', error: providerError });
        }
        continue;
      }

      if (state.phase === RetryPhase.WAITING) {
        this.logger.warn(
          `  🔄 ${label}: attempt ${state.attempt}/${this.maxAttempts} failed (${state.error.message}); retrying in ${state.delayMs}ms`
        );
        try {
          await this.sleep(state.delayMs, signal);
        } catch (error) {
          if (!signal?.aborted) throw error;
        }
        state = this.advance(state, signal?.aborted ? { type: 'cancel' } : { type: 'resume' });
      }
    }

    const attempts = history.length;
    const finalState: RetryState = state;
    switch (finalState.phase) {
      case RetryPhase.SUCCEEDED:
        if (!success) {
          throw new Error('Retry policy reached SUCCEEDED without a completion');
        }
        return { kind: 'success', ...success, attempts, history };
      case RetryPhase.FAILED:
        this.logger.debug(`  ✗ ${label}: giving up after ${attempts} attempt(s): ${finalState.error.message}`);
        return { kind: 'failure', error: finalState.error, attempts, history };
      default:
        return { kind: 'cancelled', attempts, history };
    }
  }
}
