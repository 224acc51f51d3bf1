/**
 * Provider adapter contracts.
 *
 * @packageDocumentation
 */

import type { ProviderConfig } from '../config.js';
import type { ChatMessage, CompletionResult, SamplingParams, TokenUsage } from '../types.js';

export type ProviderKind = ProviderConfig['kind'];

/**
 * One attempt against one provider.
 */
export interface ProviderCall {
  provider: ProviderConfig;
  /** Upstream model id (after any routing rewrite) */
  model: string;
  messages: readonly ChatMessage[];
  sampling: SamplingParams;
  apiKey?: string;
}

/**
 * Provider-neutral stream events. Adapters translate their wire format
 * into these; the gateway renders them for the client.
 */
export type StreamEvent =
  | { type: 'text'; text: string }
  | { type: 'finish'; finishReason: string }
  | { type: 'usage'; usage: Partial<TokenUsage> };

/**
 * An upstream stream whose response headers arrived with a success
 * status. Iterating `events` may still throw a ProviderError.
 */
export interface ProviderStream {
  providerId: string;
  model: string;
  events: AsyncIterable<StreamEvent>;
}

export interface ProviderAdapter {
  readonly kind: ProviderKind;
  complete(call: ProviderCall): Promise<CompletionResult>;
  openStream(call: ProviderCall): Promise<ProviderStream>;
}
