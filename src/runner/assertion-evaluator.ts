import { type AssertionKind, normalizeAssertionKind } from '../parser/test-schema.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';
import { ConfigError, SnapshotStoreError } from './errors.ts';
import type { SnapshotKey, SnapshotStore } from './snapshot-store.ts';
import type { AssertionResult, AssertionSpec, ProviderResponse } from './types.ts';

export interface AssertionEvaluatorOptions {
  snapshotStore?: SnapshotStore;
  logger?: Logger;
}

function characterCount(text: string): number {
  // Code points, so an emoji counts once
  return Array.from(text).length;
}

function requireString(spec: AssertionSpec, kind: AssertionKind): string {
  if (spec.value === undefined || spec.value === '') {
    throw new ConfigError(`${kind} requires a value`);
  }
  return String(spec.value);
}

function requireBound(spec: AssertionSpec, kind: AssertionKind): number {
  const raw = spec.value;
  const bound = typeof raw === 'number' ? raw : typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : Number.NaN;
  if (!Number.isFinite(bound) || bound < 0) {
    throw new ConfigError(`${kind} value must be a non-negative number, got ${JSON.stringify(raw ?? null)}`);
  }
  return bound;
}

export function compilePattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new ConfigError(`invalid regex /${pattern}/: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export function assertionLabel(spec: AssertionSpec): string {
  const kind = normalizeAssertionKind(spec.kind);
  switch (kind) {
    case 'contains':
    case 'not-contains':
      return `${kind} ${JSON.stringify(String(spec.value ?? ''))}`;
    case 'latency-max':
      return `latency-max ${String(spec.value ?? '?')}ms`;
    case 'min-length':
    case 'max-length':
      return `${kind} ${String(spec.value ?? '?')}`;
    case 'regex':
      return `regex /${String(spec.value ?? '')}/`;
    case 'json-valid':
    case 'snapshot':
      return kind;
    default:
      return spec.kind;
  }
}

/**
 * Describe where two texts first differ, showing both values.
 */
export function describeSnapshotDiff(expected: string, actual: string): string {
  const expectedLines = expected.split('\n');
  const actualLines = actual.split('\n');
  const shared = Math.min(expectedLines.length, actualLines.length);

  let where = `line count differs: snapshot has ${expectedLines.length}, output has ${actualLines.length}`;
  for (let i = 0; i < shared; i++) {
    if (expectedLines[i] !== actualLines[i]) {
      where = `first difference at line ${i + 1}`;
      break;
    }
  }

  return `SnapshotMismatch: ${where}\n  expected: ${JSON.stringify(expected)}\n  actual:   ${JSON.stringify(actual)}`;
}

export class AssertionEvaluator {
  private readonly snapshotStore?: SnapshotStore;
  private readonly logger: Logger;

  constructor(options: AssertionEvaluatorOptions = {}) {
    this.snapshotStore = options.snapshotStore;
    this.logger = options.logger ?? new ConsoleLogger();
  }

  /**
   * Check one assertion against a response. Configuration mistakes (a regex that
   * does not compile, a non-numeric bound) come back as failed verdicts, never throws.
   */
  async evaluate(spec: AssertionSpec, response: ProviderResponse, key: SnapshotKey): Promise<AssertionResult> {
    const label = assertionLabel(spec);
    try {
      const { passed, detail } = await this.check(spec, response, key);
      return { assertion: spec, label, passed, detail };
    } catch (error) {
      if (error instanceof ConfigError || error instanceof SnapshotStoreError) {
        return { assertion: spec, label, passed: false, detail: `${error.name}: ${error.message}` };
      }
      throw error;
    }
  }

  /**
   * Every assertion is evaluated and reported, even after one fails.
   */
  async evaluateAll(
    specs: readonly AssertionSpec[],
    response: ProviderResponse,
    key: SnapshotKey
  ): Promise<AssertionResult[]> {
    const results: AssertionResult[] = [];
    for (const spec of specs) {
      results.push(await this.evaluate(spec, response, key));
    }
    return results;
  }

  private async check(
    spec: AssertionSpec,
    response: ProviderResponse,
    key: SnapshotKey
  ): Promise<{ passed: boolean; detail: string }> {
    const kind = normalizeAssertionKind(spec.kind);
    const text = response.text;

    switch (kind) {
      case 'contains': {
        const needle = requireString(spec, kind);
        const passed = text.includes(needle);
        return { passed, detail: passed ? 'found in output' : 'not found in output' };
      }
      case 'not-contains': {
        const needle = requireString(spec, kind);
        const passed = !text.includes(needle);
        return { passed, detail: passed ? 'absent from output' : 'unexpectedly found in output' };
      }
      case 'latency-max': {
        const max = requireBound(spec, kind);
        return { passed: response.latencyMs <= max, detail: `actual: ${response.latencyMs}ms` };
      }
      case 'min-length': {
        const min = requireBound(spec, kind);
        const length = characterCount(text);
        return { passed: length >= min, detail: `actual: ${length} chars` };
      }
      case 'max-length': {
        const max = requireBound(spec, kind);
        const length = characterCount(text);
        return { passed: length <= max, detail: `actual: ${length} chars` };
      }
      case 'regex': {
        const pattern = compilePattern(requireString(spec, kind));
        const passed = pattern.test(text);
        return { passed, detail: passed ? 'pattern matched' : 'pattern not matched' };
      }
      case 'json-valid': {
        try {
          JSON.parse(text.trim());
          return { passed: true, detail: 'output is valid JSON' };
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          return { passed: false, detail: `output is not valid JSON: ${reason}` };
        }
      }
      case 'snapshot':
        return this.checkSnapshot(text, key);
      default:
        throw new ConfigError(`unknown assertion type "${spec.kind}"`);
    }
  }

  private async checkSnapshot(text: string, key: SnapshotKey): Promise<{ passed: boolean; detail: string }> {
    const store = this.snapshotStore;
    if (!store) {
      throw new ConfigError('snapshot assertion needs a snapshot store');
    }

    if (store.updateMode) {
      await store.put(key, text);
      this.logger.info(`  📸 Snapshot updated: ${key.testId} #${key.ordinal}`);
      return { passed: true, detail: 'updated' };
    }

    const result = await store.create(key, text);
    if (result.created) {
      this.logger.info(`  📸 Snapshot created: ${key.testId} #${key.ordinal}`);
      return { passed: true, detail: 'created (first run)' };
    }

    if (result.existing === text) {
      return { passed: true, detail: 'matches snapshot' };
    }
    return { passed: false, detail: describeSnapshotDiff(result.existing, text) };
  }
}
