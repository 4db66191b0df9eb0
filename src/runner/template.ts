import { TemplateError } from './errors.ts';
import type { AssertionSpec } from './types.ts';

const PLACEHOLDER = /\{\{\s*([A-Za-z0-9_.-]+)\s*\}\}/g;

/**
 * Substitute `{{var}}` placeholders from the given bindings.
 * A placeholder without a binding throws; it never renders as an empty string.
 */
export function renderTemplate(template: string, bindings: Readonly<Record<string, string>>): string {
  return template.replace(PLACEHOLDER, (_match, name: string) => {
    if (!Object.hasOwn(bindings, name)) {
      throw new TemplateError(name, template);
    }
    return bindings[name];
  });
}

export function isTemplated(value: unknown): boolean {
  return typeof value === 'string' && value.search(PLACEHOLDER) !== -1;
}

/**
 * Variables referenced by a template, in order of first appearance.
 */
export function templateVariables(template: string): string[] {
  const seen = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER)) {
    seen.add(match[1]);
  }
  return Array.from(seen);
}

/**
 * Only string values can carry placeholders; numbers pass through untouched.
 */
export function renderAssertion(
  assertion: AssertionSpec,
  bindings: Readonly<Record<string, string>>
): AssertionSpec {
  if (typeof assertion.value !== 'string') {
    return assertion;
  }
  return { ...assertion, value: renderTemplate(assertion.value, bindings) };
}
