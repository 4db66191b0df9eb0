export { runSuite, matchesFilter } from './runner/test-engine.ts';
export type { RunSuiteOptions, RetrySettings } from './runner/test-engine.ts';
export { CaseExpander, caseLabel, mergeAssertions } from './runner/case-expander.ts';
export { CaseScheduler } from './runner/case-scheduler.ts';
export { CaseExecutor } from './runner/case-executor.ts';
export { RetryPolicy, RetryPhase } from './runner/retry-policy.ts';
export type { RetryOutcome, RetryState, Sleep, Clock } from './runner/retry-policy.ts';
export { AssertionEvaluator, assertionLabel, describeSnapshotDiff } from './runner/assertion-evaluator.ts';
export { FileSnapshotStore, MemorySnapshotStore, snapshotFileName } from './runner/snapshot-store.ts';
export type { SnapshotKey, SnapshotStore } from './runner/snapshot-store.ts';
export { aggregate, summarize, exitCodeFor, percentile } from './runner/result-aggregator.ts';
export { renderTemplate, templateVariables } from './runner/template.ts';
export { parseCsvRows, loadCsvRows } from './runner/data-source.ts';
export { ConfigError, DataSourceError, SnapshotStoreError, SuiteLoadError, TemplateError } from './runner/errors.ts';
export {
  ProviderError,
  ProviderPermanentError,
  ProviderTransientError,
  classifyProviderError,
} from './runner/llm-errors.ts';
export { TimeoutError, withTimeout } from './runner/timeout.ts';
export type * from './runner/types.ts';
export type { ProviderCall, InvokeOptions } from './providers/provider.ts';
export { AiSdkProvider } from './providers/ai-sdk-provider.ts';
export { WebhookProvider } from './providers/webhook-provider.ts';
export { ProviderRegistry, createProvider } from './providers/provider-factory.ts';
export { PriceTable, DEFAULT_PRICING } from './providers/pricing.ts';
export { SuiteParser } from './parser/suite-parser.ts';
export { duplicateTestIdsAcrossSuites, validateSuite } from './parser/suite-validator.ts';
export type { ValidationIssue } from './parser/suite-validator.ts';
export { ConfigLoader } from './utils/config-loader.ts';
export type { Config } from './parser/config-schema.ts';
export { CaseStatus } from './types/status.ts';
export { ConsoleLogger, SilentLogger } from './utils/logger.ts';
export type { Logger } from './utils/logger.ts';
