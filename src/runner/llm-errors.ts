/**
 * Provider error taxonomy
 *
 * Every failure that comes out of a provider call is turned into either a
 * transient error (safe to retry) or a permanent one (retrying cannot help).
 */
import { APICallError } from 'ai';
import { TimeoutError } from './timeout.ts';

export interface ProviderUsage {
  tokensIn: number;
  tokensOut: number;
}

export abstract class ProviderError extends Error {
  abstract readonly transient: boolean;

  constructor(
    public readonly provider: string,
    message: string,
    public readonly statusCode?: number,
    public readonly usage?: ProviderUsage
  ) {
    super(statusCode === undefined ? `[${provider}] ${message}` : `[${provider}] API error (${statusCode}): ${message}`);
  }

  /**
   * Create error from HTTP response
   */
  static async fromResponse(
    provider: string,
    response: Response,
    customMessage?: string
  ): Promise<ProviderError> {
    let message = customMessage || response.statusText;
    try {
      const text = await response.text();
      if (text) {
        message = `${message} - ${text.slice(0, 500)}`;
      }
    } catch {
      // Body already consumed or stream broken; status text is enough
    }

    return isTransientStatus(response.status)
      ? new ProviderTransientError(provider, message, response.status)
      : new ProviderPermanentError(provider, message, response.status);
  }
}

export class ProviderTransientError extends ProviderError {
  readonly transient = true;

  constructor(provider: string, message: string, statusCode?: number, usage?: ProviderUsage) {
    super(provider, message, statusCode, usage);
    this.name = 'ProviderTransientError';
  }
}

export class ProviderPermanentError extends ProviderError {
  readonly transient = false;

  constructor(provider: string, message: string, statusCode?: number, usage?: ProviderUsage) {
    super(provider, message, statusCode, usage);
    this.name = 'ProviderPermanentError';
  }
}

// 408 request timeout, 409 conflict, 429 rate limit and 5xx
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 409 || status === 429 || status >= 500;
}

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
]);

function networkCode(error: Error): string | undefined {
  const candidates: unknown[] = [error, error.cause];
  for (const candidate of candidates) {
    if (candidate !== null && typeof candidate === 'object' && 'code' in candidate) {
      const { code } = candidate;
      if (typeof code === 'string') return code;
    }
  }
  return undefined;
}

/**
 * Map anything thrown by a provider call onto the transient/permanent taxonomy.
 */
export function classifyProviderError(error: unknown, provider: string): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }

  if (error instanceof TimeoutError) {
    return new ProviderTransientError(provider, error.message);
  }

  if (APICallError.isInstance(error)) {
    const status = error.statusCode;
    const transient = status === undefined ? error.isRetryable : isTransientStatus(status) || error.isRetryable;
    return transient
      ? new ProviderTransientError(provider, error.message, status)
      : new ProviderPermanentError(provider, error.message, status);
  }

  if (error instanceof Error) {
    const code = networkCode(error);
    if (code && TRANSIENT_NETWORK_CODES.has(code)) {
      return new ProviderTransientError(provider, `${error.message} (${code})`);
    }
    // undici reports connection failures as TypeError('fetch failed')
    if (error.name === 'TypeError' && error.message === 'fetch failed') {
      return new ProviderTransientError(provider, error.message);
    }
    return new ProviderPermanentError(provider, error.message);
  }

  return new ProviderPermanentError(provider, String(error));
}
