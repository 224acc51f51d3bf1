/**
 * cachegate Core Types
 *
 * Request, response and call-event shapes shared by the cache, router,
 * metrics and persistence layers.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

// ============================================================================
// Inbound Request
// ============================================================================

/**
 * A structured content block (text, image reference, tool result...).
 * Only `text` blocks contribute to provider prompts; all blocks contribute
 * to the cache key.
 */
export const ContentBlockSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
  })
  .passthrough();

export type ContentBlock = z.infer<typeof ContentBlockSchema>;

export const ChatMessageSchema = z.object({
  role: z.string().min(1),
  content: z.union([z.string(), z.array(ContentBlockSchema)]),
});

export type ChatMessage = z.infer<typeof ChatMessageSchema>;

/**
 * Client metadata. Never part of the cache key.
 */
export const RequestMetadataSchema = z
  .object({
    agent_type: z.string().optional(),
    source: z.string().optional(),
    request_id: z.string().optional(),
  })
  .passthrough();

/**
 * Inbound chat-completion request, mirroring the common commercial API.
 */
export const ChatRequestSchema = z
  .object({
    model: z.string().min(1),
    messages: z.array(ChatMessageSchema).min(1),
    temperature: z.number().min(0).max(2).optional(),
    max_tokens: z.number().int().positive().optional(),
    top_p: z.number().min(0).max(1).optional(),
    stop: z.union([z.string(), z.array(z.string())]).optional(),
    stream: z.boolean().optional(),
    metadata: RequestMetadataSchema.optional(),
  })
  .passthrough();

export type ChatRequest = z.infer<typeof ChatRequestSchema>;

/**
 * Per-request facts that influence routing and attribution but never the
 * cache key.
 */
export interface RequestContext {
  /** Explicit agent type (header or metadata); detected from the system prompt otherwise */
  agentType?: string;
  /** Free-form source identifier (file, tool, client name) */
  source?: string;
  /** Client-supplied request id */
  requestId?: string;
}

// ============================================================================
// Normalized Request / Cache
// ============================================================================

export interface SamplingParams {
  temperature: number;
  maxTokens: number;
  topP?: number;
  stop?: string[];
}

export interface NormalizedMessage {
  role: string;
  content: string | Array<Record<string, unknown>>;
}

/**
 * Canonical form of a request. Two requests with the same NormalizedRequest
 * are the same logical request.
 */
export interface NormalizedRequest {
  model: string;
  messages: NormalizedMessage[];
  sampling: SamplingParams;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

/**
 * A provider answer in provider-neutral form. This is what gets cached.
 */
export interface CompletionResult {
  content: string;
  /** Model id reported by the provider that answered */
  model: string;
  providerId: string;
  finishReason: string;
  usage: TokenUsage;
}

export type CachedResponse = Readonly<CompletionResult>;

// ============================================================================
// Call Events
// ============================================================================

/**
 * One finished request. Immutable once created.
 */
export interface CallEvent {
  id: string;
  /** Completion time, ms since epoch */
  timestamp: number;
  requestedModel: string;
  /** Model that actually answered (or was last attempted on failure) */
  model: string;
  providerId: string;
  tier: string;
  inputTokens: number;
  outputTokens: number;
  /** Actual cost in USD; null when the model has no pricing */
  costUsd: number | null;
  /** What the call costs (or would have cost) live; null when unpriced */
  wouldBeCostUsd: number | null;
  savingsUsd: number;
  latencyMs: number;
  cacheHit: boolean;
  success: boolean;
  streamed: boolean;
  errorCode?: string;
  source?: string;
  agentType?: string;
}

/**
 * Durable counterpart of a CallEvent.
 */
export interface AuditRecord extends CallEvent {
  writtenAt: number;
}

// ============================================================================
// Aggregates
// ============================================================================

export interface TierMetrics {
  tier: string;
  calls: number;
  cacheHits: number;
  errors: number;
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
  wouldBeCostUsd: number;
  savingsUsd: number;
  unpricedCalls: number;
}

export interface AggregatedWindow {
  windowSeconds: number;
  totalCalls: number;
  cacheHits: number;
  cacheHitRate: number;
  errors: number;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  costUsd: number;
  savingsUsd: number;
  avgLatencyMs: number;
  p50LatencyMs: number;
  p95LatencyMs: number;
  p99LatencyMs: number;
  callsPerMinute: number;
  tokensPerMinute: number;
  costPerMinute: number;
}
