/**
 * Provider module exports.
 *
 * @packageDocumentation
 */

export { AnthropicAdapter, ANTHROPIC_VERSION, buildAnthropicBody, mapStopReason } from './anthropic.js';
export { OpenAIAdapter, buildOpenAIBody } from './openai.js';
export { classifyStatus } from './classify.js';
export { executeWithFallback } from './fallback.js';
export type { FallbackOptions, FallbackResult } from './fallback.js';
export { ProviderHealth } from './health.js';
export type { CircuitState, CircuitOptions, ProviderHealthSnapshot, StateChange } from './health.js';
export { ProviderRegistry } from './registry.js';
export type { ProviderAdapter, ProviderCall, ProviderKind, ProviderStream, StreamEvent } from './types.js';
