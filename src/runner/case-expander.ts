import { normalizeAssertionKind } from '../parser/test-schema.ts';
import { CaseKind } from '../types/status.ts';
import { ConfigError, TemplateError } from './errors.ts';
import { type Row, loadCsvRows } from './data-source.ts';
import { renderAssertion, renderTemplate } from './template.ts';
import type { AssertionSpec, Case, TestDefinition } from './types.ts';

// These kinds make sense at most once per case, so an override replaces the default
const SINGLE_VALUED_KINDS = new Set(['latency-max', 'min-length', 'max-length', 'json-valid', 'snapshot']);

function assertionIdentity(assertion: AssertionSpec): string {
  const kind = normalizeAssertionKind(assertion.kind) ?? assertion.kind;
  if (SINGLE_VALUED_KINDS.has(kind)) {
    return kind;
  }
  return `${kind}\u0000${String(assertion.value ?? '')}`;
}

/**
 * Merge test-level defaults with case-level assertions.
 * A case assertion with the same identity replaces the default in place;
 * the others are appended in declaration order.
 */
export function mergeAssertions(
  defaults: readonly AssertionSpec[],
  overrides: readonly AssertionSpec[]
): AssertionSpec[] {
  const byIdentity = new Map<string, AssertionSpec>();
  for (const override of overrides) {
    byIdentity.set(assertionIdentity(override), override);
  }

  const merged: AssertionSpec[] = [];
  const used = new Set<string>();
  for (const assertion of defaults) {
    const identity = assertionIdentity(assertion);
    if (used.has(identity)) continue;
    used.add(identity);
    merged.push(byIdentity.get(identity) ?? assertion);
  }
  for (const override of overrides) {
    const identity = assertionIdentity(override);
    if (used.has(identity)) continue;
    used.add(identity);
    merged.push(byIdentity.get(identity) ?? override);
  }
  return merged;
}

export function caseLabel(bindings: Readonly<Record<string, string>>): string {
  return Object.entries(bindings)
    .map(([key, value]) => `${key}=${value}`)
    .join(', ');
}

export interface CaseExpanderOptions {
  /** Row loader for bulk data sources (default: CSV from disk) */
  loadRows?: (path: string) => Promise<Row[]>;
}

interface CaseSource {
  bindings: Readonly<Record<string, string>>;
  assertions: readonly AssertionSpec[];
}

export class CaseExpander {
  private readonly loadRows: (path: string) => Promise<Row[]>;

  constructor(options: CaseExpanderOptions = {}) {
    this.loadRows = options.loadRows ?? loadCsvRows;
  }

  /**
   * Turn one test definition into its ordered cases.
   * Throws DataSourceError when the bulk source cannot be used; a case whose
   * templates reference a missing variable comes back unresolved instead.
   */
  async expand(test: TestDefinition): Promise<Case[]> {
    const sources = await this.collectSources(test);
    return sources.map((source, ordinal) => this.resolve(test, source, ordinal));
  }

  private async collectSources(test: TestDefinition): Promise<CaseSource[]> {
    if (test.dataSource && test.cases.length > 0) {
      throw new ConfigError('inline cases and cases_file cannot be combined', `tests.${test.id}`);
    }

    if (test.dataSource) {
      const rows = await this.loadRows(test.dataSource.resolvedPath);
      return rows.map((row) => ({ bindings: row, assertions: [] }));
    }

    return test.cases.map((inline) => ({ bindings: inline.input, assertions: inline.assertions }));
  }

  private resolve(test: TestDefinition, source: CaseSource, ordinal: number): Case {
    const base = {
      testId: test.id,
      ordinal,
      bindings: source.bindings,
      label: caseLabel(source.bindings),
    };

    try {
      const prompt = renderTemplate(test.prompt, source.bindings);
      const assertions = mergeAssertions(test.assertions, source.assertions).map((assertion) =>
        renderAssertion(assertion, source.bindings)
      );
      return { ...base, kind: CaseKind.RESOLVED, prompt, assertions, modelConfig: test.modelConfig };
    } catch (error) {
      if (error instanceof TemplateError) {
        return { ...base, kind: CaseKind.UNRESOLVED, error };
      }
      throw error;
    }
  }
}
