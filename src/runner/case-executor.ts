import type { ProviderCall } from '../providers/provider.ts';
import type { PriceTable } from '../providers/pricing.ts';
import { CaseStatus } from '../types/status.ts';
import type { Redactor } from '../utils/redactor.ts';
import type { AssertionEvaluator } from './assertion-evaluator.ts';
import type { RetryPolicy } from './retry-policy.ts';
import type {
  AttemptRecord,
  CaseIdentity,
  CaseOutcome,
  ModelConfig,
  ProviderResponse,
  ResolvedCase,
  UnresolvedCase,
} from './types.ts';

export interface CaseExecutorDeps {
  resolveProvider: (modelConfig: ModelConfig) => ProviderCall;
  retryPolicy: RetryPolicy;
  evaluator: AssertionEvaluator;
  pricing: PriceTable;
  redactor?: Redactor;
}

function sumTokens(history: readonly AttemptRecord[]): { tokensIn: number; tokensOut: number } {
  return history.reduce(
    (total, record) => ({
      tokensIn: total.tokensIn + record.tokensIn,
      tokensOut: total.tokensOut + record.tokensOut,
    }),
    { tokensIn: 0, tokensOut: 0 }
  );
}

function baseOutcome(testCase: CaseIdentity) {
  return {
    testId: testCase.testId,
    ordinal: testCase.ordinal,
    label: testCase.label,
    bindings: testCase.bindings,
  };
}

export function erroredOutcome(testCase: CaseIdentity, error: Error): CaseOutcome {
  return {
    ...baseOutcome(testCase),
    status: CaseStatus.ERRORED,
    passed: false,
    error: `${error.name}: ${error.message}`,
    assertions: [],
    attempts: 0,
    tokensIn: 0,
    tokensOut: 0,
    costUsd: 0,
  };
}

export function skippedOutcome(testCase: ResolvedCase | UnresolvedCase, reason = 'run cancelled', attempts = 0): CaseOutcome {
  return {
    ...baseOutcome(testCase),
    status: CaseStatus.SKIPPED,
    passed: false,
    error: reason,
    assertions: [],
    attempts,
    tokensIn: 0,
    tokensOut: 0,
    costUsd: 0,
  };
}

/**
 * Runs one resolved case end to end: provider call under the retry policy,
 * then every assertion against the response.
 */
export class CaseExecutor {
  constructor(private readonly deps: CaseExecutorDeps) {}

  private redact(text: string): string {
    return this.deps.redactor ? this.deps.redactor.redact(text) : text;
  }

  async execute(testCase: ResolvedCase, signal?: AbortSignal): Promise<CaseOutcome> {
    const { modelConfig } = testCase;
    const provider = this.deps.resolveProvider(modelConfig);
    const result = await this.deps.retryPolicy.call(provider, testCase.prompt, modelConfig, {
      signal,
      label: `${testCase.testId} #${testCase.ordinal}`,
    });

    const base = { ...baseOutcome(testCase), prompt: testCase.prompt, model: modelConfig.model };

    if (result.kind === 'cancelled') {
      const failedTokens = sumTokens(result.history);
      return {
        ...skippedOutcome(testCase, `run cancelled after ${result.attempts} attempt(s)`, result.attempts),
        ...base,
        ...failedTokens,
        costUsd: this.deps.pricing.costFor(modelConfig.model, failedTokens.tokensIn, failedTokens.tokensOut),
      };
    }

    if (result.kind === 'failure') {
      // Failed attempts still consumed whatever tokens the provider reported
      const failedTokens = sumTokens(result.history);
      const detail = this.redact(result.error.message);
      return {
        ...base,
        status: CaseStatus.FAILED,
        passed: false,
        error: `${result.error.name}: ${detail}`,
        assertions: [
          {
            assertion: { kind: 'provider' },
            label: 'provider call',
            passed: false,
            detail: `failed after ${result.attempts} attempt(s): ${detail}`,
          },
        ],
        attempts: result.attempts,
        ...failedTokens,
        costUsd: this.deps.pricing.costFor(modelConfig.model, failedTokens.tokensIn, failedTokens.tokensOut),
      };
    }

    // Only the successful attempt's metrics are attributed to the case
    const { completion, latencyMs } = result;
    const response: ProviderResponse = {
      ...completion,
      latencyMs,
      costUsd: this.deps.pricing.costFor(modelConfig.model, completion.tokensIn, completion.tokensOut),
    };

    const assertions = await this.deps.evaluator.evaluateAll(testCase.assertions, response, {
      testId: testCase.testId,
      ordinal: testCase.ordinal,
    });
    const passed = assertions.every((assertion) => assertion.passed);

    return {
      ...base,
      status: passed ? CaseStatus.PASSED : CaseStatus.FAILED,
      passed,
      response,
      assertions,
      attempts: result.attempts,
      tokensIn: completion.tokensIn,
      tokensOut: completion.tokensOut,
      costUsd: response.costUsd,
    };
  }
}
