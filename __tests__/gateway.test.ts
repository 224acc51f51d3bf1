import { describe, it, expect, afterEach } from 'vitest';
import { ResponseCache, type CacheStats, type PromptCache } from '../src/cache/response-cache.js';
import type { GatewayConfig } from '../src/config.js';
import { ChainExhaustedError, ProviderError, RequestValidationError } from '../src/errors.js';
import { Gateway, type EventSink, type GatewayResponse } from '../src/gateway/ingress.js';
import { silentLogger } from '../src/logger.js';
import { MetricsAggregator } from '../src/metrics/aggregator.js';
import { CostCalculator } from '../src/pricing/cost.js';
import { ProviderHealth } from '../src/providers/health.js';
import { ProviderRegistry, type AdapterFactory } from '../src/providers/registry.js';
import type { StreamEvent } from '../src/providers/types.js';
import { Router } from '../src/routing/router.js';
import type { CallEvent } from '../src/types.js';
import { FakeAdapter, MemorySink, chatRequest, providerError, reply, startMockServer, testConfig, type MockServer } from './helpers.js';

class ArrayEventSink implements EventSink {
  readonly events: CallEvent[] = [];
  async enqueue(event: CallEvent): Promise<void> {
    this.events.push(event);
  }
}

interface Harness {
  gateway: Gateway;
  adapter: FakeAdapter;
  cache: PromptCache | null;
  metrics: MetricsAggregator;
  sink: ArrayEventSink;
  health: ProviderHealth;
}

interface HarnessOptions {
  config?: Readonly<GatewayConfig>;
  cache?: PromptCache | null;
  events?: EventSink;
  /** Defaults to the fake adapter for both kinds; `{}` uses the real ones */
  adapters?: Partial<AdapterFactory>;
}

function harness(opts: HarnessOptions = {}): Harness {
  const config = opts.config ?? testConfig();
  const adapter = new FakeAdapter();
  const registry = new ProviderRegistry(config.providers, opts.adapters ?? { anthropic: adapter, openai: adapter });
  const costs = new CostCalculator(config.pricing, config.tiers);
  const health = new ProviderHealth(config.circuitBreaker);
  const router = new Router(config.routing, { registry, costs, health });
  const cache = opts.cache !== undefined ? opts.cache : new ResponseCache();
  const metrics = new MetricsAggregator();
  const sink = new ArrayEventSink();
  const gateway = new Gateway({
    config,
    cache,
    router,
    registry,
    costs,
    metrics,
    events: opts.events ?? sink,
    health,
    logger: silentLogger,
  });
  return { gateway, adapter, cache, metrics, sink, health };
}

const withFallback = testConfig({
  routing: {
    rules: [{ match: 'model', pattern: '^claude-', provider: 'anthropic', fallbacks: ['openai:gpt-4o', 'ollama:ollama/mistral'] }],
    defaultProvider: 'anthropic',
  },
});

async function* textOnly(): AsyncGenerator<StreamEvent> {
  yield { type: 'text', text: 'abcdefgh' };
}

describe('Gateway.complete', () => {
  it('serves 99 of 100 identical requests from cache', async () => {
    const h = harness();

    const responses: GatewayResponse[] = [];
    for (let i = 0; i < 100; i++) {
      responses.push(await h.gateway.complete(chatRequest('Summarize the design doc')));
    }

    expect(h.adapter.calls).toHaveLength(1);
    expect(responses[0]?.body.cache_hit).toBe(false);
    expect(responses[99]?.body.cache_hit).toBe(true);
    expect(responses[99]?.body.content).toBe('Hello from the fake provider');

    const totals = h.metrics.getTotals();
    expect(totals.totalCalls).toBe(100);
    expect(totals.cacheHits).toBe(99);
    expect(totals.hitRate).toBe(99);
    expect(totals.costUsd).toBeCloseTo(0.0525, 10);
    expect(totals.savingsUsd).toBeCloseTo(99 * 0.0525, 10);
    expect(h.sink.events).toHaveLength(100);
  });

  it('renders a chat completion body', async () => {
    const h = harness();
    const { body, event } = await h.gateway.complete(chatRequest('hi'));

    expect(body).toMatchObject({
      id: `chatcmpl-${event.id}`,
      object: 'chat.completion',
      model: 'claude-opus-4',
      content: 'Hello from the fake provider',
      choices: [{ index: 0, message: { role: 'assistant', content: 'Hello from the fake provider' }, finish_reason: 'stop' }],
      usage: { input_tokens: 1000, output_tokens: 500, prompt_tokens: 1000, completion_tokens: 500, total_tokens: 1500 },
      cache_hit: false,
    });
  });

  it('records a priced live call and a free cache hit', async () => {
    const h = harness();
    const miss = await h.gateway.complete(chatRequest('hi'));
    const hit = await h.gateway.complete(chatRequest('hi'));

    expect(miss.event).toMatchObject({
      requestedModel: 'claude-opus-4',
      model: 'claude-opus-4',
      providerId: 'anthropic',
      tier: 'premium',
      inputTokens: 1000,
      outputTokens: 500,
      savingsUsd: 0,
      cacheHit: false,
      success: true,
      streamed: false,
    });
    expect(miss.event.costUsd).toBeCloseTo(0.0525, 10);
    expect(miss.event.wouldBeCostUsd).toBeCloseTo(0.0525, 10);

    expect(hit.event).toMatchObject({ costUsd: 0, cacheHit: true, providerId: 'anthropic', tier: 'premium' });
    expect(hit.event.wouldBeCostUsd).toBeCloseTo(0.0525, 10);
    expect(hit.event.savingsUsd).toBeCloseTo(0.0525, 10);
  });

  it('passes normalized sampling parameters to the provider', async () => {
    const h = harness();
    await h.gateway.complete(chatRequest('hi', { temperature: 0.3, stop: 'END' }));
    expect(h.adapter.calls[0]?.sampling).toEqual({ temperature: 0.3, maxTokens: 4096, stop: ['END'] });
  });

  it('attributes a fallback answer to the provider that served it', async () => {
    const h = harness({ config: withFallback });
    h.adapter.onComplete('anthropic', (call) => {
      throw providerError(call, 'timeout');
    });

    const { event } = await h.gateway.complete(chatRequest('hi'));

    expect(h.adapter.calls.map((c) => `${c.provider.id}/${c.model}`)).toEqual(['anthropic/claude-opus-4', 'openai/gpt-4o']);
    expect(event).toMatchObject({ requestedModel: 'claude-opus-4', model: 'gpt-4o', providerId: 'openai', tier: 'mid' });
    expect(event.costUsd).toBeCloseTo(0.0075, 10);
    expect(h.metrics.getTotals().modelOverrides).toBe(1);
    expect(h.health.snapshot()[0]).toMatchObject({ providerId: 'anthropic', consecutiveFailures: 1 });
  });

  it('records a terminal provider error and rethrows it', async () => {
    const h = harness({ config: withFallback });
    h.adapter.onComplete('anthropic', (call) => {
      throw providerError(call, 'auth', 401);
    });

    await expect(h.gateway.complete(chatRequest('hi'))).rejects.toBeInstanceOf(ProviderError);
    expect(h.adapter.calls).toHaveLength(1);
    expect(h.sink.events).toHaveLength(1);
    expect(h.sink.events[0]).toMatchObject({
      success: false,
      errorCode: 'auth',
      providerId: 'anthropic',
      model: 'claude-opus-4',
      inputTokens: 0,
      outputTokens: 0,
      costUsd: 0,
      cacheHit: false,
    });
    expect(h.metrics.getTotals().errors).toBe(1);
  });

  it('records an exhausted chain against the last provider tried', async () => {
    const h = harness({ config: withFallback });
    for (const id of ['anthropic', 'openai', 'ollama']) {
      h.adapter.onComplete(id, (call) => {
        throw providerError(call, 'server_error', 500);
      });
    }

    await expect(h.gateway.complete(chatRequest('hi'))).rejects.toBeInstanceOf(ChainExhaustedError);
    expect(h.adapter.calls).toHaveLength(3);
    expect(h.sink.events[0]).toMatchObject({
      success: false,
      errorCode: 'chain_exhausted',
      providerId: 'ollama',
      model: 'ollama/mistral',
      tier: 'local',
    });
  });

  it('rejects invalid requests without recording an event', async () => {
    const h = harness();
    const err = await h.gateway.complete({ model: 'claude-opus-4' }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RequestValidationError);
    if (!(err instanceof RequestValidationError)) return;
    expect(err.issues).toEqual(['messages: Required']);
    expect(h.sink.events).toEqual([]);
    expect(h.metrics.getTotals().totalCalls).toBe(0);
  });

  it('treats a failing cache as a miss', async () => {
    const broken: PromptCache = {
      lookup: () => {
        throw new Error('cache unavailable');
      },
      store: () => {
        throw new Error('cache unavailable');
      },
      stats: (): CacheStats => ({ entries: 0, hits: 0, misses: 0, hitRate: 0, evictions: 0, expirations: 0 }),
      clear: () => undefined,
    };
    const h = harness({ cache: broken });

    const first = await h.gateway.complete(chatRequest('hi'));
    const second = await h.gateway.complete(chatRequest('hi'));

    expect(first.body.cache_hit).toBe(false);
    expect(second.body.cache_hit).toBe(false);
    expect(h.adapter.calls).toHaveLength(2);
  });

  it('calls the provider every time with caching disabled', async () => {
    const h = harness({ config: testConfig({ cache: { enabled: false } }), cache: null });
    await h.gateway.complete(chatRequest('hi'));
    await h.gateway.complete(chatRequest('hi'));
    expect(h.adapter.calls).toHaveLength(2);
  });

  it('still answers when the audit queue rejects', async () => {
    const h = harness({
      events: {
        enqueue: async () => {
          throw new Error('BatchWriter is stopped');
        },
      },
    });
    const { body } = await h.gateway.complete(chatRequest('hi'));
    expect(body.content).toBe('Hello from the fake provider');
    expect(h.metrics.getTotals().totalCalls).toBe(1);
  });

  it('records unpriced models with a null cost', async () => {
    const h = harness();
    const miss = await h.gateway.complete(chatRequest('hi', { model: 'mystery-model' }));
    const hit = await h.gateway.complete(chatRequest('hi', { model: 'mystery-model' }));

    expect(miss.event).toMatchObject({ costUsd: null, wouldBeCostUsd: null, savingsUsd: 0, tier: 'other' });
    expect(hit.event).toMatchObject({ costUsd: 0, wouldBeCostUsd: null, savingsUsd: 0, cacheHit: true });
    expect(h.metrics.getTotals().unpricedCalls).toBe(1);
  });

  it('routes by agent type from the context, metadata or system prompt', async () => {
    const config = testConfig({
      routing: {
        rules: [
          { match: 'agent', agentType: 'explorer', provider: 'openai', model: 'gpt-4o-mini' },
          { match: 'agent', agentType: 'devops-engineer', provider: 'ollama', model: 'ollama/mistral' },
        ],
        defaultProvider: 'anthropic',
      },
    });
    const h = harness({ config, cache: null });

    const fromContext = await h.gateway.complete(chatRequest('a'), { agentType: 'explorer', source: 'cli' });
    const fromMetadata = await h.gateway.complete(chatRequest('b', { metadata: { agent_type: 'explorer' } }));
    const detected = await h.gateway.complete(
      chatRequest('c', { messages: [{ role: 'system', content: 'You manage Docker images' }, { role: 'user', content: 'c' }] }),
    );

    expect(fromContext.event).toMatchObject({ providerId: 'openai', model: 'gpt-4o-mini', agentType: 'explorer', source: 'cli' });
    expect(fromMetadata.event).toMatchObject({ providerId: 'openai', agentType: 'explorer' });
    expect(detected.event).toMatchObject({ providerId: 'ollama', model: 'ollama/mistral', agentType: 'devops-engineer' });
  });

  it('uses the model the provider reports for pricing', async () => {
    const h = harness();
    h.adapter.onComplete('anthropic', (call) => ({
      ...reply(call, 'ok', { inputTokens: 1_000_000, outputTokens: 0 }),
      model: 'claude-sonnet-4-20250514',
    }));

    const { event } = await h.gateway.complete(chatRequest('hi'));
    expect(event.model).toBe('claude-sonnet-4-20250514');
    expect(event.tier).toBe('mid');
    expect(event.costUsd).toBeCloseTo(3, 10);
  });
});

describe('Gateway.stream', () => {
  it('streams a live answer and caches it', async () => {
    const h = harness();
    const out = new MemorySink();

    const event = await h.gateway.stream(chatRequest('hi', { stream: true }), {}, out);

    expect(out.opened).toBe(true);
    expect(out.ended).toBe(true);
    const payloads = out.payloads();
    expect(payloads).toHaveLength(5);
    expect(payloads[0]).toMatchObject({
      id: `chatcmpl-${event.id}`,
      object: 'chat.completion.chunk',
      model: 'claude-opus-4',
      choices: [{ index: 0, delta: { role: 'assistant', content: '' }, finish_reason: null }],
    });
    expect(payloads[1]).toMatchObject({ choices: [{ delta: { content: 'Hel' } }] });
    expect(payloads[2]).toMatchObject({ choices: [{ delta: { content: 'lo' } }] });
    expect(payloads[3]).toMatchObject({
      choices: [{ delta: {}, finish_reason: 'stop' }],
      usage: { prompt_tokens: 1000, completion_tokens: 500, total_tokens: 1500 },
    });
    expect(payloads[4]).toBe('[DONE]');

    expect(event).toMatchObject({ streamed: true, success: true, cacheHit: false, inputTokens: 1000, outputTokens: 500 });
    expect(event.costUsd).toBeCloseTo(0.0525, 10);
    expect(h.cache?.lookup(chatRequest('hi'))?.content).toBe('Hello');
  });

  it('replays a cached answer as a stream', async () => {
    const h = harness();
    await h.gateway.complete(chatRequest('hi'));
    const out = new MemorySink();

    const event = await h.gateway.stream(chatRequest('hi', { stream: true }), {}, out);

    expect(h.adapter.streamCalls).toHaveLength(0);
    expect(event).toMatchObject({ cacheHit: true, streamed: true, costUsd: 0 });
    const payloads = out.payloads();
    expect(payloads).toHaveLength(4);
    expect(payloads[1]).toMatchObject({ choices: [{ delta: { content: 'Hello from the fake provider' } }] });
    expect(payloads[3]).toBe('[DONE]');
  });

  it('keeps reading upstream after the client disconnects', async () => {
    const h = harness();
    const out = new MemorySink(2);

    const event = await h.gateway.stream(chatRequest('hi', { stream: true }), {}, out);

    expect(out.writes).toHaveLength(2);
    expect(event).toMatchObject({ success: true, outputTokens: 500 });
    expect(h.cache?.lookup(chatRequest('hi'))?.content).toBe('Hello');
    expect(h.sink.events).toHaveLength(1);
  });

  it('ends the stream with an error chunk when the provider breaks off', async () => {
    const h = harness();
    h.adapter.onStream('anthropic', async function* (call): AsyncGenerator<StreamEvent> {
      yield { type: 'text', text: 'Hel' };
      throw providerError(call, 'server_error');
    });
    const out = new MemorySink();

    const event = await h.gateway.stream(chatRequest('hi', { stream: true }), {}, out);

    const payloads = out.payloads();
    expect(payloads).toHaveLength(4);
    expect(payloads[0]).toMatchObject({ id: `chatcmpl-${event.id}` });
    expect(payloads[2]).toEqual({ error: { type: 'server_error', message: 'anthropic failed with server_error' } });
    expect(payloads[3]).toBe('[DONE]');
    expect(event).toMatchObject({ success: false, errorCode: 'server_error', streamed: true });
    expect(h.cache?.stats().entries).toBe(0);
    expect(h.sink.events).toHaveLength(1);
  });

  it('keeps and prices the usage reported before the stream broke off', async () => {
    const h = harness();
    h.adapter.onStream('anthropic', async function* (call): AsyncGenerator<StreamEvent> {
      yield { type: 'usage', usage: { inputTokens: 1000 } };
      yield { type: 'text', text: 'Hel' };
      throw providerError(call, 'server_error');
    });

    const event = await h.gateway.stream(chatRequest('hi', { stream: true }), {}, new MemorySink());

    expect(event).toMatchObject({ success: false, errorCode: 'server_error', inputTokens: 1000, outputTokens: 0 });
    expect(event.costUsd).toBeCloseTo(0.015, 10);
    expect(h.metrics.getTotals().costUsd).toBeCloseTo(0.015, 10);
  });

  it('throws before writing anything when no stream can be opened', async () => {
    const h = harness();
    h.adapter.failOpen('anthropic', 'server_error');
    const out = new MemorySink();

    await expect(h.gateway.stream(chatRequest('hi', { stream: true }), {}, out)).rejects.toBeInstanceOf(ChainExhaustedError);
    expect(out.opened).toBe(false);
    expect(out.writes).toEqual([]);
    expect(h.sink.events[0]).toMatchObject({ success: false, streamed: true, errorCode: 'chain_exhausted' });
  });

  it('estimates usage the provider did not report', async () => {
    const h = harness();
    h.adapter.onStream('anthropic', textOnly);

    const event = await h.gateway.stream(chatRequest('Hello there!', { stream: true }), {}, new MemorySink());

    expect(event).toMatchObject({ inputTokens: 3, outputTokens: 2 });
  });

  it('does not cache streamed answers when disabled', async () => {
    const h = harness({ config: testConfig({ cache: { cacheStreamed: false } }) });
    await h.gateway.stream(chatRequest('hi', { stream: true }), {}, new MemorySink());
    expect(h.cache?.stats().entries).toBe(0);
  });
});

describe('Gateway.stream over HTTP providers', () => {
  let upstream: MockServer | undefined;

  afterEach(async () => {
    await upstream?.close();
    upstream = undefined;
  });

  it('records a stream that stalls upstream as a timeout', async () => {
    upstream = await startMockServer((_req, res) => {
      res.writeHead(200, { 'Content-Type': 'text/event-stream' });
      res.write('data: {"choices":[],"usage":{"prompt_tokens":1000}}\n\n');
      res.write('data: {"choices":[{"delta":{"content":"Hel"}}]}\n\n');
    });
    const h = harness({
      adapters: {},
      config: testConfig({
        providers: [{ id: 'openai', kind: 'openai', baseUrl: `${upstream.url}/v1`, timeoutMs: 100 }],
        routing: { defaultProvider: 'openai' },
      }),
    });
    const out = new MemorySink();

    const event = await h.gateway.stream(chatRequest('hi', { model: 'gpt-4o', stream: true }), {}, out);

    const payloads = out.payloads();
    expect(payloads).toHaveLength(4);
    expect(payloads[1]).toMatchObject({ choices: [{ delta: { content: 'Hel' } }] });
    expect(payloads[2]).toEqual({ error: { type: 'timeout', message: 'openai stream stalled for 100ms' } });
    expect(payloads[3]).toBe('[DONE]');
    expect(out.ended).toBe(true);

    expect(event).toMatchObject({
      success: false,
      errorCode: 'timeout',
      streamed: true,
      providerId: 'openai',
      model: 'gpt-4o',
      tier: 'mid',
      inputTokens: 1000,
      outputTokens: 0,
    });
    expect(event.costUsd).toBeCloseTo(0.0025, 10);
    expect(h.sink.events).toEqual([event]);
    expect(h.metrics.getTotals().totalCalls).toBe(1);
  });
});
