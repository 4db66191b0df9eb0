import type { ModelConfig, ProviderCompletion } from '../runner/types.ts';

export interface InvokeOptions {
  /** Aborted when the per-call timeout fires */
  signal?: AbortSignal;
}

/**
 * The one capability the engine needs from a provider: send a rendered prompt,
 * get text and token counts back, or throw. Adapters (SDK, webhook) are interchangeable.
 */
export interface ProviderCall {
  readonly name: string;
  invoke(prompt: string, modelConfig: ModelConfig, options?: InvokeOptions): Promise<ProviderCompletion>;
}

/**
 * Strip an explicit `provider:` prefix from a model id.
 */
export function bareModelId(model: string): string {
  const separator = model.indexOf(':');
  return separator === -1 ? model : model.slice(separator + 1);
}
