/**
 * Cost Calculator
 *
 * Per-model token pricing (USD per million tokens), cache savings and tier
 * classification. A model without a pricing entry is reported as unpriced,
 * never as free; a rate of 0 is a real price.
 *
 * @packageDocumentation
 */

import type { ModelPricing, TierDefinition } from '../config.js';

export interface PricingRates {
  /** Pricing key the model resolved to */
  key: string;
  inputPerMillion: number;
  outputPerMillion: number;
}

export type PriceResult =
  | { priced: true; costUsd: number; rates: PricingRates }
  | { priced: false; reason: 'unknown_model' };

export interface CacheSavings {
  actualUsd: 0;
  wouldBeUsd: number;
  savingsUsd: number;
}

export const OTHER_TIER = 'other';

const TOKENS_PER_MILLION = 1_000_000;

export class CostCalculator {
  private readonly pricing: Readonly<Record<string, ModelPricing>>;
  private readonly tiers: readonly TierDefinition[];
  /** Pricing keys, longest first, for prefix resolution */
  private readonly keysByLength: string[];

  constructor(pricing: Readonly<Record<string, ModelPricing>>, tiers: readonly TierDefinition[] = []) {
    this.pricing = pricing;
    this.tiers = tiers;
    this.keysByLength = Object.keys(pricing).sort((a, b) => b.length - a.length);
  }

  /**
   * Resolve a model id to its pricing key: exact id, then the id without a
   * `provider/` or `provider:` prefix, then the longest key the id starts
   * with (so `claude-opus-4-20250514` resolves to `claude-opus-4`).
   */
  resolve(model: string): string | undefined {
    const id = model.trim();
    if (Object.hasOwn(this.pricing, id)) return id;

    const bare = stripProviderPrefix(id);
    if (bare !== id && Object.hasOwn(this.pricing, bare)) return bare;

    for (const key of this.keysByLength) {
      if (id.startsWith(key) || bare.startsWith(key)) return key;
    }
    return undefined;
  }

  price(model: string, inputTokens: number, outputTokens: number): PriceResult {
    const key = this.resolve(model);
    const entry = key !== undefined ? this.pricing[key] : undefined;
    if (key === undefined || !entry) {
      return { priced: false, reason: 'unknown_model' };
    }

    const costUsd =
      (inputTokens / TOKENS_PER_MILLION) * entry.input +
      (outputTokens / TOKENS_PER_MILLION) * entry.output;

    return {
      priced: true,
      costUsd,
      rates: { key, inputPerMillion: entry.input, outputPerMillion: entry.output },
    };
  }

  /**
   * What a cache hit saved: the full live price of the answering model.
   * Null when that model has no pricing.
   */
  cacheSavings(model: string, inputTokens: number, outputTokens: number): CacheSavings | null {
    const result = this.price(model, inputTokens, outputTokens);
    if (!result.priced) return null;
    return { actualUsd: 0, wouldBeUsd: result.costUsd, savingsUsd: result.costUsd };
  }

  tierFor(model: string): string {
    const key = this.resolve(model);
    const explicit = key !== undefined ? this.pricing[key]?.tier : undefined;
    if (explicit) return explicit;

    const lower = model.toLowerCase();
    for (const tier of this.tiers) {
      if (tier.patterns.some((p) => lower.includes(p.toLowerCase()))) {
        return tier.name;
      }
    }
    return OTHER_TIER;
  }
}

function stripProviderPrefix(model: string): string {
  const match = /^[a-z0-9_-]+[/:](.+)$/i.exec(model);
  return match?.[1] ?? model;
}

/**
 * Display helper: `$0.2250`, `$52.50`, or `n/a` for unpriced values.
 */
export function formatUsd(amount: number | null): string {
  if (amount === null) return 'n/a';
  return Math.abs(amount) >= 1 ? `$${amount.toFixed(2)}` : `$${amount.toFixed(4)}`;
}
