import { describe, expect, it } from 'vitest';
import { TEST_CONFIG } from '../__fixtures__/index.ts';
import { ConfigError } from '../runner/errors.ts';
import { AiSdkProvider } from './ai-sdk-provider.ts';
import { ProviderRegistry, createProvider, secretVariables } from './provider-factory.ts';
import { WebhookProvider } from './webhook-provider.ts';

describe('createProvider', () => {
  it('requires an API key for SDK providers', () => {
    expect(() => createProvider('openai', TEST_CONFIG.providers.openai, {})).toThrow(
      'providers.openai: missing API key: set OPENAI_API_KEY'
    );
    const provider = createProvider('openai', TEST_CONFIG.providers.openai, { OPENAI_API_KEY: 'test-secret' });
    expect(provider).toBeInstanceOf(AiSdkProvider);
    expect(provider.name).toBe('openai');
  });

  it('reads the webhook endpoint from the environment', () => {
    expect(() => createProvider('webhook', TEST_CONFIG.providers.webhook, {})).toThrow(
      'providers.webhook: webhook endpoint not configured: set WEBHOOK_URL or url'
    );
    const provider = createProvider('webhook', TEST_CONFIG.providers.webhook, { WEBHOOK_URL: 'http://localhost:9999' });
    expect(provider).toBeInstanceOf(WebhookProvider);
  });
});

describe('ProviderRegistry', () => {
  const env = { OPENAI_API_KEY: 'test-secret', ANTHROPIC_API_KEY: 'test-secret' };

  it('resolves providers by name, prefix or default and builds each once', () => {
    const registry = new ProviderRegistry(TEST_CONFIG, env);

    expect(registry.providerNameFor({ model: 'gpt-4o', temperature: 0 })).toBe('openai');
    expect(registry.providerNameFor({ model: 'anthropic:claude-3-5-haiku-latest', temperature: 0 })).toBe('anthropic');
    expect(registry.providerNameFor({ provider: 'webhook', model: 'x', temperature: 0 })).toBe('webhook');

    const first = registry.resolve({ model: 'gpt-4o', temperature: 0 });
    expect(registry.resolve({ model: 'gpt-4o-mini', temperature: 1 })).toBe(first);
  });

  it('rejects an unknown provider', () => {
    const registry = new ProviderRegistry(TEST_CONFIG, env);
    expect(() => registry.resolve({ provider: 'nope', model: 'x', temperature: 0 })).toThrow(ConfigError);
    expect(() => registry.resolve({ provider: 'nope', model: 'x', temperature: 0 })).toThrow(
      'providers: unknown provider "nope"'
    );
  });
});

describe('secretVariables', () => {
  it('lists every variable that holds a credential or endpoint', () => {
    expect(secretVariables(TEST_CONFIG)).toEqual(['OPENAI_API_KEY', 'ANTHROPIC_API_KEY', 'WEBHOOK_URL']);
  });
});
