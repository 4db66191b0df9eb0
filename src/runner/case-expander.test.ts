import { describe, expect, it } from 'vitest';
import { MODEL_CONFIG } from '../__fixtures__/index.ts';
import { CaseKind } from '../types/status.ts';
import { CaseExpander, caseLabel, mergeAssertions } from './case-expander.ts';
import { ConfigError, DataSourceError } from './errors.ts';
import type { TestDefinition } from './types.ts';

function definition(overrides: Partial<TestDefinition> = {}): TestDefinition {
  return {
    id: 'greet',
    prompt: 'Hi {{name}}',
    assertions: [{ kind: 'contains', value: '{{name}}' }],
    cases: [],
    modelConfig: MODEL_CONFIG,
    ...overrides,
  };
}

describe('mergeAssertions', () => {
  it('replaces a single-valued default in place and appends the rest', () => {
    const merged = mergeAssertions(
      [
        { kind: 'max-length', value: 100 },
        { kind: 'contains', value: 'a' },
      ],
      [
        { kind: 'contains', value: 'b' },
        { kind: 'max-length', value: 10 },
      ]
    );
    expect(merged).toEqual([
      { kind: 'max-length', value: 10 },
      { kind: 'contains', value: 'a' },
      { kind: 'contains', value: 'b' },
    ]);
  });

  it('treats underscored kinds as the same assertion', () => {
    expect(mergeAssertions([{ kind: 'latency-max', value: 5000 }], [{ kind: 'latency_max', value: 100 }])).toEqual([
      { kind: 'latency_max', value: 100 },
    ]);
  });
});

describe('caseLabel', () => {
  it('joins bindings in declaration order', () => {
    expect(caseLabel({ name: 'Alice', lang: 'en' })).toBe('name=Alice, lang=en');
  });
});

describe('CaseExpander', () => {
  it('expands inline cases in declaration order with rendered prompts and assertions', async () => {
    const expander = new CaseExpander();
    const cases = await expander.expand(
      definition({
        cases: [
          { input: { name: 'Alice' }, assertions: [] },
          { input: { name: 'Bob' }, assertions: [{ kind: 'min-length', value: 3 }] },
        ],
      })
    );

    expect(cases.map((c) => c.ordinal)).toEqual([0, 1]);
    const [first, second] = cases;
    expect(first.kind).toBe(CaseKind.RESOLVED);
    if (first.kind === CaseKind.RESOLVED && second.kind === CaseKind.RESOLVED) {
      expect(first.prompt).toBe('Hi Alice');
      expect(first.assertions).toEqual([{ kind: 'contains', value: 'Alice' }]);
      expect(second.prompt).toBe('Hi Bob');
      expect(second.assertions).toEqual([
        { kind: 'contains', value: 'Bob' },
        { kind: 'min-length', value: 3 },
      ]);
      expect(second.label).toBe('name=Bob');
    }
  });

  it('turns each data source row into a case, in row order', async () => {
    const expander = new CaseExpander({
      loadRows: async () => [{ name: 'Carol' }, { name: 'Dan' }, { name: 'Eve' }],
    });
    const cases = await expander.expand(
      definition({ dataSource: { path: 'people.csv', resolvedPath: '/tmp/people.csv' } })
    );

    expect(cases).toHaveLength(3);
    expect(cases.map((c) => (c.kind === CaseKind.RESOLVED ? c.prompt : ''))).toEqual(['Hi Carol', 'Hi Dan', 'Hi Eve']);
    expect(cases.map((c) => c.ordinal)).toEqual([0, 1, 2]);
  });

  it('marks only the case with a missing variable as unresolved', async () => {
    const expander = new CaseExpander();
    const cases = await expander.expand(
      definition({
        cases: [
          { input: { name: 'Alice' }, assertions: [] },
          { input: { other: 'x' }, assertions: [] },
        ],
      })
    );

    expect(cases[0].kind).toBe(CaseKind.RESOLVED);
    const broken = cases[1];
    expect(broken.kind).toBe(CaseKind.UNRESOLVED);
    if (broken.kind === CaseKind.UNRESOLVED) {
      expect(broken.error.variable).toBe('name');
    }
  });

  it('keeps bindings of one case out of another', async () => {
    const expander = new CaseExpander();
    const cases = await expander.expand(
      definition({
        prompt: 'Hi {{name}} {{suffix}}',
        cases: [
          { input: { name: 'Alice', suffix: '!' }, assertions: [] },
          { input: { name: 'Bob' }, assertions: [] },
        ],
      })
    );
    expect(cases[0].kind).toBe(CaseKind.RESOLVED);
    expect(cases[1].kind).toBe(CaseKind.UNRESOLVED);
  });

  it('propagates a data source failure for the whole test', async () => {
    const expander = new CaseExpander({
      loadRows: async (path) => {
        throw new DataSourceError(path, 'ENOENT');
      },
    });
    await expect(
      expander.expand(definition({ dataSource: { path: 'gone.csv', resolvedPath: '/tmp/gone.csv' } }))
    ).rejects.toThrow(DataSourceError);
  });

  it('rejects inline cases combined with a cases file', async () => {
    const expander = new CaseExpander({ loadRows: async () => [] });
    await expect(
      expander.expand(
        definition({
          cases: [{ input: { name: 'Alice' }, assertions: [] }],
          dataSource: { path: 'people.csv', resolvedPath: '/tmp/people.csv' },
        })
      )
    ).rejects.toThrow(ConfigError);
  });
});
