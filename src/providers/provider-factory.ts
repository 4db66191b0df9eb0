import type { Config, ProviderConfig } from '../parser/config-schema.ts';
import { ConfigError } from '../runner/errors.ts';
import type { ModelConfig } from '../runner/types.ts';
import { providerForModel } from '../utils/config-loader.ts';
import { AiSdkProvider, anthropicModels, openAiModels } from './ai-sdk-provider.ts';
import type { ProviderCall } from './provider.ts';
import { WebhookProvider } from './webhook-provider.ts';

export type Env = Readonly<Record<string, string | undefined>>;

/**
 * Build the provider call for one configured provider.
 * Missing credentials or endpoints are configuration errors.
 */
export function createProvider(name: string, config: ProviderConfig, env: Env = process.env): ProviderCall {
  switch (config.type) {
    case 'openai':
    case 'anthropic': {
      const keyVariable = config.api_key_env ?? (config.type === 'openai' ? 'OPENAI_API_KEY' : 'ANTHROPIC_API_KEY');
      const apiKey = env[keyVariable];
      if (!apiKey) {
        throw new ConfigError(`missing API key: set ${keyVariable}`, `providers.${name}`);
      }
      const credentials = {
        apiKey,
        ...(config.base_url ? { baseURL: config.base_url } : {}),
        headers: config.headers,
      };
      const models = config.type === 'openai' ? openAiModels(credentials) : anthropicModels(credentials);
      return new AiSdkProvider(name, models);
    }
    case 'webhook': {
      const url = config.url || (config.url_env ? env[config.url_env] : undefined);
      if (!url) {
        const hint = config.url_env ? `set ${config.url_env} or url` : 'set url';
        throw new ConfigError(`webhook endpoint not configured: ${hint}`, `providers.${name}`);
      }
      return new WebhookProvider({ url, headers: config.headers }, name);
    }
  }
}

/**
 * Environment variables that hold provider secrets, for redaction.
 */
export function secretVariables(config: Config): string[] {
  const names = new Set<string>();
  for (const provider of Object.values(config.providers)) {
    if (provider.api_key_env) names.add(provider.api_key_env);
    if (provider.url_env) names.add(provider.url_env);
  }
  return [...names];
}

/**
 * Resolves a case's model config to a provider call, building each provider once.
 */
export class ProviderRegistry {
  private readonly cache = new Map<string, ProviderCall>();

  constructor(
    private readonly config: Config,
    private readonly env: Env = process.env
  ) {}

  providerNameFor(modelConfig: ModelConfig): string {
    if (modelConfig.provider) {
      return modelConfig.provider;
    }
    return providerForModel(this.config, modelConfig.model);
  }

  resolve(modelConfig: ModelConfig): ProviderCall {
    const name = this.providerNameFor(modelConfig);
    const cached = this.cache.get(name);
    if (cached) return cached;

    const providerConfig = this.config.providers[name];
    if (!providerConfig) {
      throw new ConfigError(`unknown provider "${name}"`, 'providers');
    }
    const provider = createProvider(name, providerConfig, this.env);
    this.cache.set(name, provider);
    return provider;
  }
}
