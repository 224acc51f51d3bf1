/**
 * cachegate
 *
 * Caching, routing and cost-accounting gateway in front of chat-completion
 * LLM providers.
 *
 * @example
 * ```typescript
 * import { createGatewayApp, loadConfig } from 'cachegate';
 *
 * const app = createGatewayApp(loadConfig());
 * await app.start();
 * ```
 *
 * @packageDocumentation
 */

// App
export { createGatewayApp } from './app.js';
export type { GatewayApp, GatewayAppOptions } from './app.js';
export { createGatewayServer, readRequestBody } from './server.js';
export type { GatewayServerDeps } from './server.js';
export { handleHealthRequest, probeHealth, VERSION } from './health.js';

// Config
export {
  ConfigSchema,
  DEFAULT_CONFIG,
  loadConfig,
  parseConfig,
  getConfigPath,
  resolveApiKey,
  parseFallbackRef,
  freezeConfig,
} from './config.js';
export type { ConfigInput, GatewayConfig, ProviderConfig, RoutingRule, ModelPricing, TierDefinition } from './config.js';

// Errors + logging
export {
  GatewayError,
  RequestValidationError,
  ConfigError,
  ProviderError,
  ChainExhaustedError,
  NoRouteError,
  toErrorBody,
} from './errors.js';
export type { ProviderErrorKind, ProviderAttempt } from './errors.js';
export { createLogger, defaultLogger, silentLogger } from './logger.js';
export type { Logger } from './logger.js';

// Core
export * from './cache/index.js';
export * from './routing/index.js';
export * from './providers/index.js';
export * from './pricing/index.js';
export * from './metrics/index.js';
export * from './storage/index.js';
export { Gateway, completionBody } from './gateway/ingress.js';
export type { ChatCompletionBody, EventSink, GatewayDeps, GatewayResponse } from './gateway/ingress.js';
export { createHttpSink, renderChunk, StreamAccumulator, estimateTokens, DONE_LINE } from './gateway/streaming.js';
export type { StreamSink } from './gateway/streaming.js';

// Types
export { ChatRequestSchema, ChatMessageSchema, ContentBlockSchema } from './types.js';
export type {
  ChatRequest,
  ChatMessage,
  ContentBlock,
  RequestContext,
  NormalizedRequest,
  NormalizedMessage,
  SamplingParams,
  TokenUsage,
  CompletionResult,
  CachedResponse,
  CallEvent,
  AuditRecord,
  TierMetrics,
  AggregatedWindow,
} from './types.js';
