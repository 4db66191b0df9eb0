import { bareModelId } from './provider.ts';

export interface ModelPrice {
  /** USD per million input tokens */
  input: number;
  /** USD per million output tokens */
  output: number;
}

export const DEFAULT_PRICING: Readonly<Record<string, ModelPrice>> = {
  'gpt-4o': { input: 2.5, output: 10 },
  'gpt-4o-mini': { input: 0.15, output: 0.6 },
  'gpt-4-turbo': { input: 10, output: 30 },
  'gpt-4': { input: 30, output: 60 },
  'gpt-3.5-turbo': { input: 0.5, output: 1.5 },
  o1: { input: 15, output: 60 },
  'o1-mini': { input: 3, output: 12 },
  'o3-mini': { input: 1.1, output: 4.4 },
  'claude-3-5-sonnet-latest': { input: 3, output: 15 },
  'claude-3-5-haiku-latest': { input: 0.8, output: 4 },
  'claude-3-opus-latest': { input: 15, output: 75 },
};

export class PriceTable {
  private readonly prices: Map<string, ModelPrice>;

  constructor(overrides: Readonly<Record<string, ModelPrice>> = {}) {
    this.prices = new Map(Object.entries({ ...DEFAULT_PRICING, ...overrides }));
  }

  priceFor(model: string): ModelPrice | undefined {
    return this.prices.get(model) ?? this.prices.get(bareModelId(model));
  }

  /**
   * Estimated cost in USD; unknown models cost nothing.
   */
  costFor(model: string, tokensIn: number, tokensOut: number): number {
    const price = this.priceFor(model);
    if (!price) return 0;
    return (tokensIn / 1_000_000) * price.input + (tokensOut / 1_000_000) * price.output;
  }
}
