/**
 * Shared test fixtures: provider stubs, clocks, sample suites and outcome builders.
 */

import type { Config } from '../parser/config-schema.ts';
import { DEFAULT_PROVIDERS } from '../parser/config-schema.ts';
import type { InvokeOptions, ProviderCall } from '../providers/provider.ts';
import type { Clock, Sleep } from '../runner/retry-policy.ts';
import type {
  AssertionSpec,
  CaseOutcome,
  ModelConfig,
  ProviderCompletion,
  ResolvedCase,
} from '../runner/types.ts';
import { CaseKind, CaseStatus } from '../types/status.ts';

export const MODEL_CONFIG: ModelConfig = { provider: 'stub', model: 'gpt-4o-mini', temperature: 0.7 };

export const SUITE_YAML = `version: "1"

defaults:
  model: "gpt-4o-mini"
  temperature: 0.7

tests:
  - id: greeting
    prompt: "Say hello to {{name}}"
    assertions:
      - type: contains
        value: "{{name}}"
    cases:
      - input:
          name: Alice
      - input:
          name: Bob
        assert:
          - type: max_length
            value: 40
`;

export const TEST_CONFIG: Config = {
  default_provider: 'openai',
  providers: { ...DEFAULT_PROVIDERS },
  model_mappings: {},
  concurrency: 5,
  timeout_ms: 30000,
  retry: { max_attempts: 4, base_delay_ms: 500, jitter: 0.2 },
  snapshot_dir: '.promptcheck/snapshots',
  pricing: {},
};

export type Responder = (prompt: string, call: number) => ProviderCompletion | Error | Promise<ProviderCompletion>;

/**
 * Provider stub driven by a responder function. Records every prompt it sees
 * and the highest number of calls that were in flight at once.
 */
export class StubProvider implements ProviderCall {
  readonly prompts: string[] = [];
  private active = 0;
  peak = 0;

  constructor(
    private readonly responder: Responder,
    readonly name = 'stub'
  ) {}

  get calls(): number {
    return this.prompts.length;
  }

  async invoke(prompt: string, _modelConfig: ModelConfig, _options?: InvokeOptions): Promise<ProviderCompletion> {
    const call = this.prompts.length;
    this.prompts.push(prompt);
    this.active += 1;
    this.peak = Math.max(this.peak, this.active);
    try {
      // Yield so concurrent callers overlap
      await Promise.resolve();
      const result = await this.responder(prompt, call);
      if (result instanceof Error) {
        throw result;
      }
      return result;
    } finally {
      this.active -= 1;
    }
  }
}

/**
 * Echoes the prompt back with fixed token counts.
 */
export function echoProvider(): StubProvider {
  return new StubProvider((prompt) => ({ text: prompt, tokensIn: 10, tokensOut: 5 }));
}

/**
 * Sleep that resolves at once and records the requested delays.
 */
export function recordingSleep(): { sleep: Sleep; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms, signal) => {
      delays.push(ms);
      if (signal?.aborted) {
        throw new Error('aborted');
      }
    },
  };
}

/**
 * Clock that advances by `step` ms on every read.
 */
export function steppingClock(step = 100): Clock {
  let now = 0;
  return {
    now: () => {
      const current = now;
      now += step;
      return current;
    },
  };
}

export function resolvedCase(
  testId: string,
  ordinal: number,
  prompt: string,
  assertions: AssertionSpec[] = []
): ResolvedCase {
  return {
    kind: CaseKind.RESOLVED,
    testId,
    ordinal,
    bindings: {},
    label: '',
    prompt,
    assertions,
    modelConfig: MODEL_CONFIG,
  };
}

export function caseOutcome(overrides: Partial<CaseOutcome> & Pick<CaseOutcome, 'ordinal'>): CaseOutcome {
  return {
    testId: 't',
    label: '',
    bindings: {},
    status: CaseStatus.PASSED,
    passed: true,
    assertions: [],
    attempts: 1,
    tokensIn: 0,
    tokensOut: 0,
    costUsd: 0,
    ...overrides,
  };
}
