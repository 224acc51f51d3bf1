/**
 * Gateway Ingress
 *
 * The request pipeline: validate, look up the cache, route through the
 * fallback chain on a miss, price the call, and record exactly one
 * CallEvent per request (hit, miss or failure) in memory and in the audit
 * queue.
 *
 * @packageDocumentation
 */

import { nanoid } from 'nanoid';
import type { GatewayConfig } from '../config.js';
import type { PromptCache } from '../cache/response-cache.js';
import { requestCacheKey, normalizeRequest, type CacheKey } from '../cache/key.js';
import { ChainExhaustedError, GatewayError, ProviderError, RequestValidationError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { MetricsAggregator } from '../metrics/aggregator.js';
import type { CostCalculator } from '../pricing/cost.js';
import { executeWithFallback, type FallbackOptions } from '../providers/fallback.js';
import type { ProviderHealth } from '../providers/health.js';
import type { ProviderRegistry } from '../providers/registry.js';
import type { ProviderAdapter, ProviderCall, ProviderStream } from '../providers/types.js';
import { detectAgentType, messageText } from '../routing/agent-detection.js';
import type { ProviderTarget, Router } from '../routing/router.js';
import {
  ChatRequestSchema,
  type CachedResponse,
  type CallEvent,
  type ChatRequest,
  type CompletionResult,
  type RequestContext,
  type SamplingParams,
  type TokenUsage,
} from '../types.js';
import { DONE_LINE, StreamAccumulator, renderChunk, renderStreamError, type StreamSink } from './streaming.js';

/**
 * Anything that accepts events for durable storage.
 */
export interface EventSink {
  enqueue(event: CallEvent): Promise<void>;
}

export interface GatewayDeps {
  config: Readonly<GatewayConfig>;
  /** Null when caching is disabled */
  cache: PromptCache | null;
  router: Router;
  registry: ProviderRegistry;
  costs: CostCalculator;
  metrics: MetricsAggregator;
  events: EventSink;
  health?: ProviderHealth;
  logger?: Logger;
}

export interface ChatCompletionBody {
  id: string;
  object: 'chat.completion';
  created: number;
  model: string;
  content: string;
  choices: Array<{
    index: number;
    message: { role: 'assistant'; content: string };
    finish_reason: string;
  }>;
  usage: {
    input_tokens: number;
    output_tokens: number;
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
  cache_hit: boolean;
}

export interface GatewayResponse {
  body: ChatCompletionBody;
  event: CallEvent;
}

interface PreparedRequest {
  request: ChatRequest;
  key: CacheKey | null;
  sampling: SamplingParams;
  agentType: string | undefined;
  source: string | undefined;
  startedAt: number;
  streamed: boolean;
}

export class Gateway {
  private readonly deps: GatewayDeps;
  private readonly log: Logger;
  private readonly inflight = new Set<Promise<unknown>>();

  constructor(deps: GatewayDeps) {
    this.deps = deps;
    this.log = deps.logger ?? createLogger('gateway');
  }

  /**
   * Buffered completion. Throws a GatewayError on failure, after the
   * failure has been recorded.
   */
  complete(body: unknown, ctx: RequestContext = {}): Promise<GatewayResponse> {
    return this.track(this.runComplete(body, ctx));
  }

  /**
   * Streaming completion. Nothing is written to the sink until a provider
   * stream is open, so chain failures surface as a thrown GatewayError.
   * Once open, a client disconnect does not stop the upstream read.
   */
  stream(body: unknown, ctx: RequestContext, sink: StreamSink): Promise<CallEvent> {
    return this.track(this.runStream(body, ctx, sink));
  }

  /**
   * Resolves once every call in progress has settled and recorded its
   * event.
   */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight]);
    }
  }

  private async track<T>(work: Promise<T>): Promise<T> {
    this.inflight.add(work);
    try {
      return await work;
    } finally {
      this.inflight.delete(work);
    }
  }

  private async runComplete(body: unknown, ctx: RequestContext): Promise<GatewayResponse> {
    const prep = this.prepare(body, ctx, false);

    const cached = this.lookup(prep.key);
    if (cached) {
      const event = this.hitEvent(prep, cached);
      await this.record(event);
      return { body: completionBody(event.id, cached, true), event };
    }

    let answered: { result: CompletionResult; target: ProviderTarget };
    try {
      const chain = this.deps.router.route({ model: prep.request.model, agentType: prep.agentType });
      const { value, target } = await executeWithFallback(
        chain,
        (t) => this.adapter(t).complete(this.call(t, prep)),
        this.fallbackOptions(),
      );
      answered = { result: value, target };
    } catch (err) {
      await this.record(this.failureEvent(prep, err));
      throw err;
    }

    this.store(prep.key, answered.result);
    const event = this.liveEvent(prep, answered.result);
    await this.record(event);
    return { body: completionBody(event.id, answered.result, false), event };
  }

  private async runStream(body: unknown, ctx: RequestContext, sink: StreamSink): Promise<CallEvent> {
    const prep = this.prepare(body, ctx, true);
    const created = Math.floor(Date.now() / 1000);

    const cached = this.lookup(prep.key);
    if (cached) {
      const event = this.hitEvent(prep, cached);
      const id = `chatcmpl-${event.id}`;
      sink.open();
      sink.write(renderChunk({ id, model: cached.model, created, delta: { role: 'assistant', content: '' } }));
      if (cached.content.length > 0) {
        sink.write(renderChunk({ id, model: cached.model, created, delta: { content: cached.content } }));
      }
      sink.write(renderChunk({ id, model: cached.model, created, delta: {}, finishReason: cached.finishReason, usage: cached.usage }));
      sink.write(DONE_LINE);
      sink.end();
      await this.record(event);
      return event;
    }

    let opened: ProviderStream;
    try {
      const chain = this.deps.router.route({ model: prep.request.model, agentType: prep.agentType });
      const { value } = await executeWithFallback(
        chain,
        (t) => this.adapter(t).openStream(this.call(t, prep)),
        this.fallbackOptions(),
      );
      opened = value;
    } catch (err) {
      await this.record(this.failureEvent(prep, err));
      throw err;
    }

    const eventId = nanoid();
    const id = `chatcmpl-${eventId}`;
    const acc = new StreamAccumulator();
    sink.open();
    sink.write(renderChunk({ id, model: opened.model, created, delta: { role: 'assistant', content: '' } }));

    let streamError: ProviderError | null = null;
    try {
      for await (const ev of opened.events) {
        acc.apply(ev);
        if (ev.type === 'text') {
          sink.write(renderChunk({ id, model: opened.model, created, delta: { content: ev.text } }));
        }
      }
    } catch (err) {
      streamError =
        err instanceof ProviderError
          ? err
          : new ProviderError(`stream from ${opened.providerId} failed: ${errorMessage(err)}`, {
              providerId: opened.providerId,
              model: opened.model,
              kind: 'connection',
            });
    }

    if (streamError) {
      this.log.warn(`Stream from ${opened.providerId}/${opened.model} broke off: ${streamError.message}`);
      sink.write(renderStreamError(streamError.code, streamError.message));
      sink.write(DONE_LINE);
      sink.end();
      const event = { ...this.failureEvent(prep, streamError, acc.reportedUsage()), id: eventId };
      await this.record(event);
      return event;
    }

    const result = acc.result(opened.providerId, opened.model, promptText(prep.request));
    if (sink.closed) {
      this.log.debug(`Client left before ${opened.providerId} finished; response still recorded`);
    }
    sink.write(renderChunk({ id, model: opened.model, created, delta: {}, finishReason: result.finishReason, usage: result.usage }));
    sink.write(DONE_LINE);
    sink.end();

    if (this.deps.config.cache.cacheStreamed) {
      this.store(prep.key, result);
    }
    const event = { ...this.liveEvent(prep, result), id: eventId };
    await this.record(event);
    return event;
  }

  // ==========================================================================
  // Pipeline steps
  // ==========================================================================

  private prepare(body: unknown, ctx: RequestContext, streamed: boolean): PreparedRequest {
    const parsed = ChatRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw new RequestValidationError(
        parsed.error.issues.map((i) => `${i.path.join('.') || '(body)'}: ${i.message}`),
      );
    }
    const request = parsed.data;

    let key: CacheKey | null = null;
    if (this.deps.cache) {
      try {
        key = requestCacheKey(request);
      } catch (err) {
        this.log.warn(`Cache key failed, bypassing cache: ${errorMessage(err)}`);
      }
    }

    return {
      request,
      key,
      sampling: normalizeRequest(request).sampling,
      agentType: ctx.agentType ?? request.metadata?.agent_type ?? detectAgentType(request.messages),
      source: ctx.source ?? request.metadata?.source,
      startedAt: Date.now(),
      streamed,
    };
  }

  private lookup(key: CacheKey | null): CachedResponse | undefined {
    if (key === null || !this.deps.cache) return undefined;
    try {
      return this.deps.cache.lookup(key);
    } catch (err) {
      this.log.warn(`Cache lookup failed, treating as miss: ${errorMessage(err)}`);
      return undefined;
    }
  }

  private store(key: CacheKey | null, result: CompletionResult): void {
    if (key === null || !this.deps.cache) return;
    try {
      this.deps.cache.store(key, result, result.usage);
    } catch (err) {
      this.log.warn(`Cache store failed: ${errorMessage(err)}`);
    }
  }

  private adapter(target: ProviderTarget): ProviderAdapter {
    const adapter = this.deps.registry.adapterFor(target.providerId);
    if (!adapter) {
      throw new GatewayError(`Unknown provider "${target.providerId}"`, 500, 'internal_error');
    }
    return adapter;
  }

  private call(target: ProviderTarget, prep: PreparedRequest): ProviderCall {
    const provider = this.deps.registry.get(target.providerId);
    if (!provider) {
      throw new GatewayError(`Unknown provider "${target.providerId}"`, 500, 'internal_error');
    }
    return {
      provider,
      model: target.model,
      messages: prep.request.messages,
      sampling: prep.sampling,
      apiKey: this.deps.registry.apiKeyFor(target.providerId),
    };
  }

  private fallbackOptions(): FallbackOptions {
    const { registry, health, config } = this.deps;
    return {
      maxAttempts: config.routing.maxAttempts,
      retriesFor: (id) => registry.get(id)?.maxRetries ?? 0,
      health,
      logger: this.log,
    };
  }

  /**
   * Hand the event to the in-memory aggregator and the audit queue. The
   * request never fails because persistence did.
   */
  private async record(event: CallEvent): Promise<void> {
    this.deps.metrics.record(event);
    try {
      await this.deps.events.enqueue(event);
    } catch (err) {
      this.log.error(`Failed to queue call event ${event.id}: ${errorMessage(err)}`);
    }
  }

  // ==========================================================================
  // Events
  // ==========================================================================

  private baseEvent(
    prep: PreparedRequest,
  ): Pick<CallEvent, 'id' | 'timestamp' | 'requestedModel' | 'latencyMs' | 'streamed' | 'source' | 'agentType'> {
    const now = Date.now();
    return {
      id: nanoid(),
      timestamp: now,
      requestedModel: prep.request.model,
      latencyMs: now - prep.startedAt,
      streamed: prep.streamed,
      source: prep.source,
      agentType: prep.agentType,
    };
  }

  private hitEvent(prep: PreparedRequest, cached: CachedResponse): CallEvent {
    const { inputTokens, outputTokens } = cached.usage;
    const savings = this.deps.costs.cacheSavings(cached.model, inputTokens, outputTokens);
    return {
      ...this.baseEvent(prep),
      model: cached.model,
      providerId: cached.providerId,
      tier: this.deps.costs.tierFor(cached.model),
      inputTokens,
      outputTokens,
      costUsd: 0,
      wouldBeCostUsd: savings ? savings.wouldBeUsd : null,
      savingsUsd: savings ? savings.savingsUsd : 0,
      cacheHit: true,
      success: true,
    };
  }

  private liveEvent(prep: PreparedRequest, result: CompletionResult): CallEvent {
    const { inputTokens, outputTokens } = result.usage;
    const price = this.deps.costs.price(result.model, inputTokens, outputTokens);
    if (!price.priced) {
      this.log.debug(`No pricing for model ${result.model}; cost recorded as unavailable`);
    }
    const cost = price.priced ? price.costUsd : null;
    return {
      ...this.baseEvent(prep),
      model: result.model,
      providerId: result.providerId,
      tier: this.deps.costs.tierFor(result.model),
      inputTokens,
      outputTokens,
      costUsd: cost,
      wouldBeCostUsd: cost,
      savingsUsd: 0,
      cacheHit: false,
      success: true,
    };
  }

  /**
   * A failed call. Usage the provider already reported (a stream that broke
   * off after `message_start`) is billed upstream, so it is kept and priced.
   */
  private failureEvent(prep: PreparedRequest, err: unknown, usage: TokenUsage | null = null): CallEvent {
    let providerId = 'none';
    let model = prep.request.model;
    if (err instanceof ProviderError) {
      providerId = err.providerId;
      model = err.model;
    } else if (err instanceof ChainExhaustedError) {
      const last = err.attempts[err.attempts.length - 1];
      if (last) {
        providerId = last.providerId;
        model = last.model;
      }
    }

    let cost: number | null = 0;
    if (usage) {
      const price = this.deps.costs.price(model, usage.inputTokens, usage.outputTokens);
      cost = price.priced ? price.costUsd : null;
    }

    return {
      ...this.baseEvent(prep),
      model,
      providerId,
      tier: this.deps.costs.tierFor(model),
      inputTokens: usage?.inputTokens ?? 0,
      outputTokens: usage?.outputTokens ?? 0,
      costUsd: cost,
      wouldBeCostUsd: cost,
      savingsUsd: 0,
      cacheHit: false,
      success: false,
      errorCode: err instanceof GatewayError ? err.code : 'internal_error',
    };
  }
}

export function completionBody(eventId: string, result: CachedResponse, cacheHit: boolean): ChatCompletionBody {
  const { inputTokens, outputTokens } = result.usage;
  return {
    id: `chatcmpl-${eventId}`,
    object: 'chat.completion',
    created: Math.floor(Date.now() / 1000),
    model: result.model,
    content: result.content,
    choices: [
      {
        index: 0,
        message: { role: 'assistant', content: result.content },
        finish_reason: result.finishReason,
      },
    ],
    usage: {
      input_tokens: inputTokens,
      output_tokens: outputTokens,
      prompt_tokens: inputTokens,
      completion_tokens: outputTokens,
      total_tokens: inputTokens + outputTokens,
    },
    cache_hit: cacheHit,
  };
}

function promptText(request: ChatRequest): string {
  return request.messages.map((m) => messageText(m)).join('\n');
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
