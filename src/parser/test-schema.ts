import { z } from 'zod';

export const ASSERTION_KINDS = [
  'contains',
  'not-contains',
  'latency-max',
  'min-length',
  'max-length',
  'regex',
  'json-valid',
  'snapshot',
] as const;

export type AssertionKind = (typeof ASSERTION_KINDS)[number];

/**
 * Accepts `latency_max` as well as `latency-max`.
 */
export function normalizeAssertionKind(kind: string): AssertionKind | undefined {
  const normalized = kind.trim().toLowerCase().replace(/_/g, '-');
  return ASSERTION_KINDS.find((known) => known === normalized);
}

const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

export const AssertionSchema = z.object({
  type: z.string().min(1, 'assertion type is required'),
  value: z
    .union([z.string(), z.number()])
    .nullish()
    .transform((value) => value ?? undefined),
});

export const TestCaseSchema = z.object({
  input: z.record(z.string(), ScalarSchema.transform(String)).default({}),
  assert: z.array(AssertionSchema).default([]),
});

export const TestDefinitionSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  prompt: z.string(),
  provider: z.string().optional(),
  model: z.string().optional(),
  temperature: z.number().optional(),
  max_tokens: z.number().int().positive().optional(),
  cases: z.array(TestCaseSchema).default([]),
  cases_file: z.string().optional(),
  assertions: z.array(AssertionSchema).default([]),
});

export const SuiteDefaultsSchema = z
  .object({
    provider: z.string().optional(),
    model: z.string().default('gpt-4o-mini'),
    temperature: z.number().default(0.7),
    max_tokens: z.number().int().positive().optional(),
  })
  .default({});

export const SuiteSchema = z.object({
  version: z.union([z.string(), z.number()]).transform(String).default('1'),
  defaults: SuiteDefaultsSchema,
  tests: z.array(TestDefinitionSchema).default([]),
});

export type RawAssertion = z.infer<typeof AssertionSchema>;
export type RawTestDefinition = z.infer<typeof TestDefinitionSchema>;
export type RawSuite = z.infer<typeof SuiteSchema>;
