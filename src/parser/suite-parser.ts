import { readFileSync } from 'node:fs';
import { dirname, isAbsolute, resolve } from 'node:path';
import { load as loadYaml } from 'js-yaml';
import type { ZodIssue } from 'zod';
import { SuiteLoadError } from '../runner/errors.ts';
import type { AssertionSpec, ModelConfig, Suite, TestDefinition } from '../runner/types.ts';
import {
  type RawAssertion,
  type RawSuite,
  type RawTestDefinition,
  SuiteSchema,
  normalizeAssertionKind,
} from './test-schema.ts';

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

function toAssertion(raw: RawAssertion): AssertionSpec {
  const kind = normalizeAssertionKind(raw.type) ?? raw.type;
  return raw.value === undefined ? { kind } : { kind, value: raw.value };
}

function toModelConfig(test: RawTestDefinition, defaults: ModelConfig): ModelConfig {
  return {
    provider: test.provider ?? defaults.provider,
    model: test.model ?? defaults.model,
    temperature: test.temperature ?? defaults.temperature,
    maxTokens: test.max_tokens ?? defaults.maxTokens,
  };
}

export class SuiteParser {
  /**
   * Read and parse a suite file from disk
   */
  static loadSuite(filePath: string): Suite {
    const absolute = resolve(filePath);
    let content: string;
    try {
      content = readFileSync(absolute, 'utf8');
    } catch (error) {
      throw new SuiteLoadError(filePath, [
        `Failed to read suite file: ${error instanceof Error ? error.message : String(error)}`,
      ]);
    }
    return SuiteParser.parse(content, absolute);
  }

  static parse(content: string, filePath: string): Suite {
    let document: unknown;
    try {
      document = loadYaml(content, { filename: filePath });
    } catch (error) {
      throw new SuiteLoadError(filePath, [error instanceof Error ? error.message : String(error)], content);
    }

    const result = SuiteSchema.safeParse(document ?? {});
    if (!result.success) {
      throw new SuiteLoadError(filePath, result.error.issues.map(formatIssue));
    }

    return SuiteParser.fromRaw(result.data, filePath);
  }

  static fromRaw(raw: RawSuite, filePath: string): Suite {
    const baseDir = dirname(resolve(filePath));
    const defaults: ModelConfig = {
      provider: raw.defaults.provider,
      model: raw.defaults.model,
      temperature: raw.defaults.temperature,
      maxTokens: raw.defaults.max_tokens,
    };

    const tests: TestDefinition[] = raw.tests.map((test) => ({
      id: test.id,
      prompt: test.prompt,
      assertions: test.assertions.map(toAssertion),
      cases: test.cases.map((testCase) => ({
        input: testCase.input,
        assertions: testCase.assert.map(toAssertion),
      })),
      dataSource: test.cases_file
        ? {
            path: test.cases_file,
            resolvedPath: isAbsolute(test.cases_file) ? test.cases_file : resolve(baseDir, test.cases_file),
          }
        : undefined,
      modelConfig: toModelConfig(test, defaults),
    }));

    return { version: raw.version, filePath, defaults, tests };
  }
}
