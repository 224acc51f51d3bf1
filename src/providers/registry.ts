/**
 * Provider registry: configured providers and their adapters.
 *
 * @packageDocumentation
 */

import { resolveApiKey, type ProviderConfig } from '../config.js';
import { AnthropicAdapter } from './anthropic.js';
import { OpenAIAdapter } from './openai.js';
import type { ProviderAdapter, ProviderKind } from './types.js';

export type AdapterFactory = Record<ProviderKind, ProviderAdapter>;

export class ProviderRegistry {
  private readonly providers = new Map<string, ProviderConfig>();
  private readonly adapters: AdapterFactory;

  constructor(providers: readonly ProviderConfig[], adapters?: Partial<AdapterFactory>) {
    for (const provider of providers) {
      this.providers.set(provider.id, provider);
    }
    this.adapters = {
      anthropic: adapters?.anthropic ?? new AnthropicAdapter(),
      openai: adapters?.openai ?? new OpenAIAdapter(),
    };
  }

  get(id: string): ProviderConfig | undefined {
    return this.providers.get(id);
  }

  /** Known and enabled. */
  isAvailable(id: string): boolean {
    return this.providers.get(id)?.enabled === true;
  }

  adapterFor(id: string): ProviderAdapter | undefined {
    const provider = this.providers.get(id);
    return provider ? this.adapters[provider.kind] : undefined;
  }

  apiKeyFor(id: string): string | undefined {
    const provider = this.providers.get(id);
    return provider ? resolveApiKey(provider) : undefined;
  }

  list(): ProviderConfig[] {
    return [...this.providers.values()];
  }
}
