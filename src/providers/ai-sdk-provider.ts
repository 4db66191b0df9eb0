import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';
import { type LanguageModel, generateText } from 'ai';
import type { ModelConfig, ProviderCompletion } from '../runner/types.ts';
import { type InvokeOptions, type ProviderCall, bareModelId } from './provider.ts';

export type LanguageModelFactory = (modelId: string) => LanguageModel;

export interface SdkCredentials {
  apiKey: string;
  baseURL?: string;
  headers?: Record<string, string>;
}

export function openAiModels(credentials: SdkCredentials): LanguageModelFactory {
  const provider = createOpenAI(credentials);
  return (modelId) => provider.chat(modelId);
}

export function anthropicModels(credentials: SdkCredentials): LanguageModelFactory {
  const provider = createAnthropic(credentials);
  return (modelId) => provider(modelId);
}

/**
 * Provider call through the `ai` SDK's `generateText`.
 * SDK retries are disabled; the engine's retry policy decides what to repeat.
 */
export class AiSdkProvider implements ProviderCall {
  constructor(
    readonly name: string,
    private readonly models: LanguageModelFactory
  ) {}

  async invoke(prompt: string, modelConfig: ModelConfig, options: InvokeOptions = {}): Promise<ProviderCompletion> {
    const result = await generateText({
      model: this.models(bareModelId(modelConfig.model)),
      prompt,
      temperature: modelConfig.temperature,
      ...(modelConfig.maxTokens !== undefined ? { maxOutputTokens: modelConfig.maxTokens } : {}),
      maxRetries: 0,
      abortSignal: options.signal,
    });

    return {
      text: result.text,
      tokensIn: result.usage.inputTokens ?? 0,
      tokensOut: result.usage.outputTokens ?? 0,
    };
  }
}
