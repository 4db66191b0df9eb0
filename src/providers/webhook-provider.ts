import { z } from 'zod';
import { ProviderError, ProviderPermanentError } from '../runner/llm-errors.ts';
import type { ModelConfig, ProviderCompletion } from '../runner/types.ts';
import { type InvokeOptions, type ProviderCall, bareModelId } from './provider.ts';

const UsageSchema = z
  .object({
    prompt_tokens: z.number().nonnegative().optional(),
    completion_tokens: z.number().nonnegative().optional(),
    total_tokens: z.number().nonnegative().optional(),
  })
  .optional();

// Either `{ text, usage }` or an OpenAI-style chat completion body
const WebhookResponseSchema = z.union([
  z.object({ text: z.string(), usage: UsageSchema }),
  z.object({
    choices: z
      .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
      .min(1),
    usage: UsageSchema,
  }),
]);

export type WebhookResponse = z.infer<typeof WebhookResponseSchema>;

export interface WebhookProviderOptions {
  url: string;
  headers?: Record<string, string>;
}

function responseText(body: WebhookResponse): string {
  if ('text' in body) {
    return body.text;
  }
  return body.choices[0]?.message.content ?? '';
}

/**
 * POSTs `{ prompt, model, temperature }` as JSON to a user endpoint.
 */
export class WebhookProvider implements ProviderCall {
  readonly name: string;
  private readonly url: string;
  private readonly headers: Record<string, string>;

  constructor(options: WebhookProviderOptions, name = 'webhook') {
    this.name = name;
    this.url = options.url;
    this.headers = options.headers ?? {};
  }

  async invoke(prompt: string, modelConfig: ModelConfig, options: InvokeOptions = {}): Promise<ProviderCompletion> {
    const response = await fetch(this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...this.headers },
      body: JSON.stringify({
        prompt,
        model: bareModelId(modelConfig.model),
        temperature: modelConfig.temperature,
        ...(modelConfig.maxTokens !== undefined ? { max_tokens: modelConfig.maxTokens } : {}),
      }),
      signal: options.signal,
    });

    if (!response.ok) {
      throw await ProviderError.fromResponse(this.name, response);
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ProviderPermanentError(this.name, `response body is not JSON: ${reason}`, response.status);
    }

    const parsed = WebhookResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProviderPermanentError(
        this.name,
        'response must contain "text" or "choices[0].message.content"',
        response.status
      );
    }

    const usage = parsed.data.usage;
    return {
      text: responseText(parsed.data),
      tokensIn: usage?.prompt_tokens ?? 0,
      tokensOut: usage?.completion_tokens ?? 0,
    };
  }
}
