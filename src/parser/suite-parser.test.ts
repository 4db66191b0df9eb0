import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { SUITE_YAML } from '../__fixtures__/index.ts';
import { SuiteLoadError } from '../runner/errors.ts';
import { SuiteParser } from './suite-parser.ts';

describe('SuiteParser', () => {
  it('parses the sample suite', () => {
    const suite = SuiteParser.parse(SUITE_YAML, '/suites/tests.yaml');

    expect(suite.version).toBe('1');
    expect(suite.defaults).toEqual({ provider: undefined, model: 'gpt-4o-mini', temperature: 0.7, maxTokens: undefined });
    expect(suite.tests).toHaveLength(1);

    const [test] = suite.tests;
    expect(test.id).toBe('greeting');
    expect(test.assertions).toEqual([{ kind: 'contains', value: '{{name}}' }]);
    expect(test.cases).toEqual([
      { input: { name: 'Alice' }, assertions: [] },
      { input: { name: 'Bob' }, assertions: [{ kind: 'max-length', value: 40 }] },
    ]);
    expect(test.dataSource).toBeUndefined();
  });

  it('lets a test override the defaults', () => {
    const suite = SuiteParser.parse(
      `defaults:
  provider: openai
  max_tokens: 100
tests:
  - id: 42
    prompt: "p"
    model: claude-3-5-haiku-latest
    provider: anthropic
    temperature: 0
    cases:
      - input: { n: 3, flag: true }
`,
      '/suites/tests.yaml'
    );

    const [test] = suite.tests;
    expect(test.id).toBe('42');
    expect(test.modelConfig).toEqual({
      provider: 'anthropic',
      model: 'claude-3-5-haiku-latest',
      temperature: 0,
      maxTokens: 100,
    });
    expect(test.cases[0].input).toEqual({ n: '3', flag: 'true' });
  });

  it('resolves cases_file against the suite directory', () => {
    const suite = SuiteParser.parse(
      `tests:
  - id: bulk
    prompt: "{{q}}"
    cases_file: data/people.csv
    assertions:
      - type: json_valid
`,
      '/suites/nested/tests.yaml'
    );

    expect(suite.tests[0].dataSource).toEqual({ path: 'data/people.csv', resolvedPath: '/suites/nested/data/people.csv' });
    expect(suite.tests[0].assertions).toEqual([{ kind: 'json-valid' }]);
  });

  it('keeps an unknown assertion type as written for the validator', () => {
    const suite = SuiteParser.parse(
      `tests:
  - id: t
    prompt: p
    assertions:
      - type: contians
        value: x
`,
      '/suites/tests.yaml'
    );
    expect(suite.tests[0].assertions).toEqual([{ kind: 'contians', value: 'x' }]);
  });

  it('reports schema issues with their path', () => {
    let caught: unknown;
    try {
      SuiteParser.parse('tests:\n  - id: a\n', '/suites/tests.yaml');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(SuiteLoadError);
    if (!(caught instanceof SuiteLoadError)) return;
    expect(caught.issues).toEqual(['tests.0.prompt: Required']);
    expect(caught.source).toBeUndefined();
  });

  it('keeps the source when the YAML does not parse', () => {
    const content = 'tests: [\n';
    let caught: unknown;
    try {
      SuiteParser.parse(content, '/suites/tests.yaml');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(SuiteLoadError);
    if (!(caught instanceof SuiteLoadError)) return;
    expect(caught.source).toBe(content);
    expect(caught.issues).toHaveLength(1);
  });

  describe('loadSuite', () => {
    let dir: string | undefined;

    afterEach(() => {
      if (dir) rmSync(dir, { recursive: true, force: true });
      dir = undefined;
    });

    it('reads a suite from disk', () => {
      dir = mkdtempSync(join(tmpdir(), 'promptcheck-suite-'));
      const file = join(dir, 'tests.yaml');
      writeFileSync(file, SUITE_YAML);

      const suite = SuiteParser.loadSuite(file);
      expect(suite.filePath).toBe(file);
      expect(suite.tests[0].id).toBe('greeting');
    });

    it('throws SuiteLoadError for a missing file', () => {
      expect(() => SuiteParser.loadSuite('/definitely/not/here.yaml')).toThrow(SuiteLoadError);
    });
  });
});
