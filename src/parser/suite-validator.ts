import { existsSync } from 'node:fs';
import { compilePattern } from '../runner/assertion-evaluator.ts';
import { mergeAssertions } from '../runner/case-expander.ts';
import { ConfigError } from '../runner/errors.ts';
import { isTemplated, templateVariables } from '../runner/template.ts';
import type { AssertionSpec, ModelConfig, Suite, TestDefinition } from '../runner/types.ts';
import { ASSERTION_KINDS, normalizeAssertionKind } from './test-schema.ts';

export interface ValidationIssue {
  /** Dotted location inside the suite, e.g. `tests.greeting.cases[1]` */
  path: string;
  message: string;
}

export interface ValidateOptions {
  /** Provider names the project config knows about */
  knownProviders: readonly string[];
  /** Check that `cases_file` paths exist (default: true) */
  checkFiles?: boolean;
}

const BOUNDED_KINDS = new Set(['latency-max', 'min-length', 'max-length']);
const VALUE_KINDS = new Set(['contains', 'not-contains', 'regex']);

export function levenshtein(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }
  return previous[b.length];
}

/**
 * Closest known assertion kind within an edit distance of 3.
 */
export function suggestAssertionKind(kind: string): string | undefined {
  const normalized = kind.trim().toLowerCase().replace(/_/g, '-');
  let best: { kind: string; distance: number } | undefined;
  for (const known of ASSERTION_KINDS) {
    const distance = levenshtein(normalized, known);
    if (distance <= 3 && (!best || distance < best.distance)) {
      best = { kind: known, distance };
    }
  }
  return best?.kind;
}

function checkModelConfig(
  config: ModelConfig,
  path: string,
  options: ValidateOptions,
  issues: ValidationIssue[],
  inherited?: ModelConfig
): void {
  // Values a test inherits from the defaults are reported once, under `defaults`
  const provider = config.provider === inherited?.provider ? undefined : config.provider;
  if (provider !== undefined && !options.knownProviders.includes(provider)) {
    issues.push({
      path: `${path}.provider`,
      message: `unknown provider "${provider}" (known: ${options.knownProviders.join(', ')})`,
    });
  }
  const ownTemperature = inherited === undefined || config.temperature !== inherited.temperature;
  if (ownTemperature && (config.temperature < 0 || config.temperature > 2)) {
    issues.push({ path: `${path}.temperature`, message: `temperature must be between 0 and 2, got ${config.temperature}` });
  }
}

function checkAssertion(assertion: AssertionSpec, path: string, issues: ValidationIssue[]): void {
  const kind = normalizeAssertionKind(assertion.kind);
  if (!kind) {
    const suggestion = suggestAssertionKind(assertion.kind);
    issues.push({
      path,
      message: `unknown assertion type "${assertion.kind}"${suggestion ? ` (did you mean "${suggestion}"?)` : ''}`,
    });
    return;
  }

  // Values filled in per case are checked once they are rendered
  if (isTemplated(assertion.value)) return;

  if (VALUE_KINDS.has(kind) && (assertion.value === undefined || assertion.value === '')) {
    issues.push({ path, message: `${kind} requires a value` });
    return;
  }

  if (BOUNDED_KINDS.has(kind)) {
    const bound = typeof assertion.value === 'number' ? assertion.value : Number(assertion.value ?? Number.NaN);
    if (assertion.value === '' || !Number.isFinite(bound) || bound < 0) {
      issues.push({ path, message: `${kind} value must be a non-negative number, got ${JSON.stringify(assertion.value ?? null)}` });
    }
    return;
  }

  if (kind === 'regex') {
    try {
      compilePattern(String(assertion.value));
    } catch (error) {
      if (!(error instanceof ConfigError)) throw error;
      issues.push({ path, message: error.message });
    }
  }
}

function checkTest(
  test: TestDefinition,
  path: string,
  defaults: ModelConfig,
  options: ValidateOptions,
  issues: ValidationIssue[]
): void {
  if (test.prompt.trim() === '') {
    issues.push({ path: `${path}.prompt`, message: 'prompt is empty' });
  }

  checkModelConfig(test.modelConfig, path, options, issues, defaults);

  test.assertions.forEach((assertion, i) => checkAssertion(assertion, `${path}.assertions[${i}]`, issues));

  if (test.dataSource && test.cases.length > 0) {
    issues.push({ path, message: 'inline cases and cases_file cannot be combined' });
  }

  if (test.dataSource) {
    if ((options.checkFiles ?? true) && !existsSync(test.dataSource.resolvedPath)) {
      issues.push({ path: `${path}.cases_file`, message: `cases file not found: ${test.dataSource.path}` });
    }
    if (test.assertions.length === 0) {
      issues.push({ path, message: 'test has no assertions' });
    }
    return;
  }

  if (test.cases.length === 0) {
    issues.push({ path, message: 'test has no cases (add cases or cases_file)' });
    return;
  }

  const promptVariables = templateVariables(test.prompt);
  test.cases.forEach((inline, i) => {
    const casePath = `${path}.cases[${i}]`;
    inline.assertions.forEach((assertion, j) => checkAssertion(assertion, `${casePath}.assert[${j}]`, issues));

    const effective = mergeAssertions(test.assertions, inline.assertions);
    if (effective.length === 0) {
      issues.push({ path: casePath, message: 'case has no assertions' });
    }

    const referenced = new Set(promptVariables);
    for (const assertion of effective) {
      if (typeof assertion.value === 'string') {
        for (const name of templateVariables(assertion.value)) referenced.add(name);
      }
    }
    const missing = [...referenced].filter((name) => !Object.hasOwn(inline.input, name));
    if (missing.length > 0) {
      issues.push({ path: casePath, message: `unresolved template variable(s): ${missing.join(', ')}` });
    }
  });
}

/**
 * Static checks over a loaded suite. Returns every issue found; an empty list means valid.
 */
export function validateSuite(suite: Suite, options: ValidateOptions): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  checkModelConfig(suite.defaults, 'defaults', options, issues);

  if (suite.tests.length === 0) {
    issues.push({ path: 'tests', message: 'suite has no tests' });
    return issues;
  }

  const seen = new Set<string>();
  for (const test of suite.tests) {
    const path = `tests.${test.id}`;
    if (seen.has(test.id)) {
      issues.push({ path, message: `duplicate test id "${test.id}"` });
    }
    seen.add(test.id);
    checkTest(test, path, suite.defaults, options, issues);
  }

  return issues;
}

/**
 * Test ids declared in more than one suite file. Snapshots are keyed by test id,
 * so two such tests would compare against the same stored output.
 */
export function duplicateTestIdsAcrossSuites(suites: ReadonlyArray<{ file: string; suite: Suite }>): ValidationIssue[] {
  const owners = new Map<string, string[]>();
  for (const { file, suite } of suites) {
    for (const test of suite.tests) {
      const files = owners.get(test.id) ?? [];
      if (!files.includes(file)) files.push(file);
      owners.set(test.id, files);
    }
  }

  const issues: ValidationIssue[] = [];
  for (const [id, files] of owners) {
    if (files.length > 1) {
      issues.push({
        path: `tests.${id}`,
        message: `test id "${id}" is declared in ${files.join(', ')}; their snapshots would collide`,
      });
    }
  }
  return issues;
}
