import type { CaseKind, CaseStatusType } from '../types/status.ts';
import type { TemplateError } from './errors.ts';

export type AssertionValue = string | number;

export interface AssertionSpec {
  readonly kind: string;
  readonly value?: AssertionValue;
}

export interface ModelConfig {
  /** Provider name; unset means "resolve from the model name or project config" */
  readonly provider?: string;
  readonly model: string;
  readonly temperature: number;
  readonly maxTokens?: number;
}

export interface InlineCase {
  readonly input: Readonly<Record<string, string>>;
  readonly assertions: readonly AssertionSpec[];
}

export interface DataSourceRef {
  /** Path as written in the suite file */
  readonly path: string;
  /** Absolute path, resolved against the suite file's directory */
  readonly resolvedPath: string;
}

export interface TestDefinition {
  readonly id: string;
  readonly prompt: string;
  readonly assertions: readonly AssertionSpec[];
  readonly cases: readonly InlineCase[];
  readonly dataSource?: DataSourceRef;
  readonly modelConfig: ModelConfig;
}

export interface Suite {
  readonly version: string;
  readonly filePath: string;
  readonly defaults: ModelConfig;
  readonly tests: readonly TestDefinition[];
}

/** What identifies a case in reports, whether or not it ever ran */
export interface CaseIdentity {
  readonly testId: string;
  readonly ordinal: number;
  readonly bindings: Readonly<Record<string, string>>;
  readonly label: string;
}

export interface ResolvedCase extends CaseIdentity {
  readonly kind: typeof CaseKind.RESOLVED;
  readonly prompt: string;
  readonly assertions: readonly AssertionSpec[];
  readonly modelConfig: ModelConfig;
}

export interface UnresolvedCase extends CaseIdentity {
  readonly kind: typeof CaseKind.UNRESOLVED;
  readonly error: TemplateError;
}

export type Case = ResolvedCase | UnresolvedCase;

export interface ProviderCompletion {
  text: string;
  tokensIn: number;
  tokensOut: number;
}

export interface ProviderResponse extends ProviderCompletion {
  latencyMs: number;
  costUsd: number;
}

export interface AttemptRecord {
  attempt: number;
  latencyMs: number;
  tokensIn: number;
  tokensOut: number;
  error?: string;
  transient?: boolean;
}

export interface AssertionResult {
  assertion: AssertionSpec;
  label: string;
  passed: boolean;
  detail: string;
}

export interface CaseOutcome {
  testId: string;
  ordinal: number;
  label: string;
  bindings: Readonly<Record<string, string>>;
  status: CaseStatusType;
  passed: boolean;
  prompt?: string;
  model?: string;
  response?: ProviderResponse;
  error?: string;
  assertions: AssertionResult[];
  attempts: number;
  tokensIn: number;
  tokensOut: number;
  costUsd: number;
}

export interface LatencyStats {
  count: number;
  min: number;
  max: number;
  mean: number;
  p50: number;
  p90: number;
  p95: number;
  p99: number;
}

export interface OutcomeCounts {
  total: number;
  passed: number;
  failed: number;
  errored: number;
  skipped: number;
}

export interface TestOutcome extends OutcomeCounts {
  testId: string;
  cases: CaseOutcome[];
  /** Set when the definition itself could not be expanded */
  error?: string;
  passRate: number;
  tokensIn: number;
  tokensOut: number;
  costUsd: number;
  latency: LatencyStats | null;
}

export interface RunTotals extends OutcomeCounts {
  tests: number;
  erroredTests: number;
  passRate: number;
  tokensIn: number;
  tokensOut: number;
  costUsd: number;
  latency: LatencyStats | null;
}

export interface RunSummary {
  tests: TestOutcome[];
  totals: RunTotals;
  durationMs: number;
  passed: boolean;
}
