/**
 * Shared fixtures for the test suite.
 */

import * as http from 'node:http';
import { parseConfig, DEFAULT_CONFIG, type ConfigInput, type GatewayConfig } from '../src/config.js';
import { ProviderError, type ProviderErrorKind } from '../src/errors.js';
import type { StreamSink } from '../src/gateway/streaming.js';
import type { ProviderAdapter, ProviderCall, ProviderStream, StreamEvent } from '../src/providers/types.js';
import type { CallEvent, ChatRequest, CompletionResult } from '../src/types.js';

let eventSeq = 0;

export function makeEvent(overrides: Partial<CallEvent> = {}): CallEvent {
  eventSeq++;
  return {
    id: `evt-${eventSeq}`,
    timestamp: 1_700_000_000_000,
    requestedModel: 'claude-sonnet-4',
    model: 'claude-sonnet-4',
    providerId: 'anthropic',
    tier: 'mid',
    inputTokens: 100,
    outputTokens: 50,
    costUsd: 0.00105,
    wouldBeCostUsd: 0.00105,
    savingsUsd: 0,
    latencyMs: 20,
    cacheHit: false,
    success: true,
    streamed: false,
    ...overrides,
  };
}

export function chatRequest(content: string, overrides: Partial<ChatRequest> = {}): ChatRequest {
  return {
    model: 'claude-opus-4',
    messages: [{ role: 'user', content }],
    ...overrides,
  };
}

export function testConfig(overrides: Partial<ConfigInput> = {}): Readonly<GatewayConfig> {
  return parseConfig({
    ...DEFAULT_CONFIG,
    storage: { dbPath: ':memory:' },
    ...overrides,
  });
}

export function providerError(call: ProviderCall, kind: ProviderErrorKind, status?: number): ProviderError {
  return new ProviderError(`${call.provider.id} failed with ${kind}`, {
    providerId: call.provider.id,
    model: call.model,
    kind,
    status,
  });
}

type CompleteHandler = (call: ProviderCall) => CompletionResult | Promise<CompletionResult>;
type StreamHandler = (call: ProviderCall) => AsyncIterable<StreamEvent>;

/**
 * In-process provider adapter. Behaviour is scripted per provider id;
 * unscripted providers answer with a fixed reply.
 */
export class FakeAdapter implements ProviderAdapter {
  readonly kind: 'anthropic' | 'openai';
  readonly calls: ProviderCall[] = [];
  readonly streamCalls: ProviderCall[] = [];
  private readonly completeHandlers = new Map<string, CompleteHandler>();
  private readonly streamHandlers = new Map<string, StreamHandler>();
  private readonly openFailures = new Map<string, ProviderErrorKind>();

  constructor(kind: 'anthropic' | 'openai' = 'anthropic') {
    this.kind = kind;
  }

  onComplete(providerId: string, handler: CompleteHandler): this {
    this.completeHandlers.set(providerId, handler);
    return this;
  }

  onStream(providerId: string, handler: StreamHandler): this {
    this.streamHandlers.set(providerId, handler);
    return this;
  }

  failOpen(providerId: string, kind: ProviderErrorKind): this {
    this.openFailures.set(providerId, kind);
    return this;
  }

  async complete(call: ProviderCall): Promise<CompletionResult> {
    this.calls.push(call);
    const handler = this.completeHandlers.get(call.provider.id);
    if (handler) return handler(call);
    return reply(call, 'Hello from the fake provider', { inputTokens: 1000, outputTokens: 500 });
  }

  async openStream(call: ProviderCall): Promise<ProviderStream> {
    this.streamCalls.push(call);
    const failure = this.openFailures.get(call.provider.id);
    if (failure) throw providerError(call, failure);

    const handler = this.streamHandlers.get(call.provider.id) ?? defaultStream;
    return { providerId: call.provider.id, model: call.model, events: handler(call) };
  }
}

async function* defaultStream(): AsyncGenerator<StreamEvent> {
  yield { type: 'usage', usage: { inputTokens: 1000 } };
  yield { type: 'text', text: 'Hel' };
  yield { type: 'text', text: 'lo' };
  yield { type: 'usage', usage: { outputTokens: 500 } };
  yield { type: 'finish', finishReason: 'stop' };
}

export function reply(
  call: ProviderCall,
  content: string,
  usage: { inputTokens: number; outputTokens: number },
): CompletionResult {
  return { content, model: call.model, providerId: call.provider.id, finishReason: 'stop', usage };
}

/**
 * Collects everything written to it. `closeAfter` simulates a client that
 * disconnects after that many writes.
 */
export class MemorySink implements StreamSink {
  readonly writes: string[] = [];
  opened = false;
  ended = false;
  private readonly closeAfter: number;

  constructor(closeAfter = Number.POSITIVE_INFINITY) {
    this.closeAfter = closeAfter;
  }

  get closed(): boolean {
    return this.ended || this.writes.length >= this.closeAfter;
  }

  open(): void {
    this.opened = true;
  }

  write(data: string): void {
    if (!this.closed) this.writes.push(data);
  }

  end(): void {
    this.ended = true;
  }

  /** Parsed `data:` payloads, `[DONE]` kept as a string. */
  payloads(): unknown[] {
    return this.writes.map((w) => {
      const data = w.replace(/^data: /, '').trim();
      return data === '[DONE]' ? data : JSON.parse(data);
    });
  }
}

export interface MockServer {
  url: string;
  close(): Promise<void>;
}

/**
 * Local HTTP server standing in for an upstream provider.
 */
export async function startMockServer(handler: http.RequestListener): Promise<MockServer> {
  const server = http.createServer(handler);
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('mock server has no TCP address');
  return {
    url: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve) => {
        server.closeAllConnections();
        server.close(() => resolve());
      }),
  };
}

export async function readBody(req: http.IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}
