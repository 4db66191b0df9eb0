/**
 * Masks provider credentials in text before it is logged or stored in an outcome.
 */

const MASK = '***REDACTED***';

// Key fragments whose values are always masked, however short
const SENSITIVE_KEY_PARTS = ['api_key', 'apikey', 'token', 'secret', 'password', 'auth', 'credential'];

export class Redactor {
  private readonly patterns: RegExp[] = [];

  constructor(secrets: Readonly<Record<string, string | undefined>>) {
    const values = new Set<string>();

    for (const [key, value] of Object.entries(secrets)) {
      if (!value) continue;
      const lowerKey = key.toLowerCase();
      const sensitive = SENSITIVE_KEY_PARTS.some((part) => lowerKey.includes(part));
      if (sensitive || value.length >= 3) {
        values.add(value);
      }
    }

    // Longest first, so a secret that contains another is masked whole
    const ordered = [...values].sort((a, b) => b.length - a.length);
    for (const secret of ordered) {
      const escaped = secret.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
      // Short secrets only match on word boundaries ('key' must not hit 'keyboard')
      if (secret.length < 5) {
        const start = /^\w/.test(secret) ? '\\b' : '';
        const end = /\w$/.test(secret) ? '\\b' : '';
        this.patterns.push(new RegExp(`${start}${escaped}${end}`, 'g'));
      } else {
        this.patterns.push(new RegExp(escaped, 'g'));
      }
    }
  }

  /**
   * Build a redactor over the environment variables that hold provider credentials.
   */
  static fromEnvironment(
    variableNames: Iterable<string>,
    env: Readonly<Record<string, string | undefined>> = process.env
  ): Redactor {
    const secrets: Record<string, string | undefined> = {};
    for (const name of variableNames) {
      secrets[name] = env[name];
    }
    return new Redactor(secrets);
  }

  get size(): number {
    return this.patterns.length;
  }

  redact(text: string): string {
    if (text.length < 3) {
      return text;
    }
    let redacted = text;
    for (const pattern of this.patterns) {
      redacted = redacted.replace(pattern, MASK);
    }
    return redacted;
  }

  /**
   * Redact every string inside a JSON-like value.
   */
  redactValue(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.redact(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.redactValue(item));
    }
    if (value !== null && typeof value === 'object') {
      const redacted: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        redacted[key] = this.redactValue(item);
      }
      return redacted;
    }
    return value;
  }
}
