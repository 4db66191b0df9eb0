import { z } from 'zod';

export const PROVIDER_TYPES = ['openai', 'anthropic', 'webhook'] as const;
export type ProviderType = (typeof PROVIDER_TYPES)[number];

export const ProviderConfigSchema = z.object({
  type: z.enum(PROVIDER_TYPES),
  /** Environment variable holding the API key */
  api_key_env: z.string().optional(),
  base_url: z.string().optional(),
  /** Webhook endpoint */
  url: z.string().optional(),
  /** Environment variable holding the webhook endpoint, used when `url` is unset */
  url_env: z.string().optional(),
  headers: z.record(z.string()).default({}),
});

export const ModelPriceSchema = z.object({
  input: z.number().nonnegative(),
  output: z.number().nonnegative(),
});

export const RetryConfigSchema = z.object({
  max_attempts: z.number().int().positive().default(4),
  base_delay_ms: z.number().nonnegative().default(500),
  jitter: z.number().min(0).max(1).default(0.2),
});

export const DEFAULT_PROVIDERS = {
  openai: { type: 'openai', api_key_env: 'OPENAI_API_KEY', headers: {} },
  anthropic: { type: 'anthropic', api_key_env: 'ANTHROPIC_API_KEY', headers: {} },
  webhook: { type: 'webhook', url_env: 'WEBHOOK_URL', headers: {} },
} satisfies Record<string, z.infer<typeof ProviderConfigSchema>>;

export const ConfigSchema = z.object({
  default_provider: z.string().default('openai'),
  providers: z.record(ProviderConfigSchema).default(DEFAULT_PROVIDERS),
  /** Glob pattern on the model name → provider name */
  model_mappings: z.record(z.string()).default({}),
  concurrency: z.number().int().positive().default(5),
  timeout_ms: z.number().int().nonnegative().default(30000),
  retry: RetryConfigSchema.default({}),
  snapshot_dir: z.string().default('.promptcheck/snapshots'),
  /** USD per million tokens, merged over the built-in table */
  pricing: z.record(ModelPriceSchema).default({}),
});

export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
