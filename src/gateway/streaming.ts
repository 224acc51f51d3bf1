/**
 * Streaming helpers: chat-completion chunk rendering, the client sink, and
 * an accumulator that rebuilds the full response from stream events.
 *
 * @packageDocumentation
 */

import type * as http from 'node:http';
import type { StreamEvent } from '../providers/types.js';
import type { CompletionResult, TokenUsage } from '../types.js';

export const DONE_LINE = 'data: [DONE]\n\n';

/**
 * Where streamed chunks go. `closed` turns true once the client is gone;
 * writes after that are ignored.
 */
export interface StreamSink {
  readonly closed: boolean;
  open(): void;
  write(data: string): void;
  end(): void;
}

export interface ChunkUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface ChunkOptions {
  id: string;
  model: string;
  created: number;
  delta: { role?: 'assistant'; content?: string };
  finishReason?: string | null;
  usage?: TokenUsage;
}

export function renderChunk(opts: ChunkOptions): string {
  const chunk: Record<string, unknown> = {
    id: opts.id,
    object: 'chat.completion.chunk',
    created: opts.created,
    model: opts.model,
    choices: [{ index: 0, delta: opts.delta, finish_reason: opts.finishReason ?? null }],
  };
  if (opts.usage) {
    const usage: ChunkUsage = {
      prompt_tokens: opts.usage.inputTokens,
      completion_tokens: opts.usage.outputTokens,
      total_tokens: opts.usage.inputTokens + opts.usage.outputTokens,
    };
    chunk['usage'] = usage;
  }
  return `data: ${JSON.stringify(chunk)}\n\n`;
}

export function renderStreamError(type: string, message: string): string {
  return `data: ${JSON.stringify({ error: { type, message } })}\n\n`;
}

/**
 * Rough token count for text a provider did not report usage for.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export class StreamAccumulator {
  private parts: string[] = [];
  private finishReason: string | undefined;
  private inputTokens: number | undefined;
  private outputTokens: number | undefined;

  apply(event: StreamEvent): void {
    switch (event.type) {
      case 'text':
        this.parts.push(event.text);
        break;
      case 'finish':
        this.finishReason = event.finishReason;
        break;
      case 'usage':
        if (event.usage.inputTokens !== undefined) this.inputTokens = event.usage.inputTokens;
        if (event.usage.outputTokens !== undefined) this.outputTokens = event.usage.outputTokens;
        break;
    }
  }

  /**
   * Usage the provider itself reported so far, without estimates. Null
   * when it reported none.
   */
  reportedUsage(): TokenUsage | null {
    if (this.inputTokens === undefined && this.outputTokens === undefined) return null;
    return { inputTokens: this.inputTokens ?? 0, outputTokens: this.outputTokens ?? 0 };
  }

  get text(): string {
    return this.parts.join('');
  }

  /**
   * The full response. Token counts the provider never reported are
   * estimated from the text.
   */
  result(providerId: string, model: string, promptText: string): CompletionResult {
    const content = this.text;
    return {
      content,
      model,
      providerId,
      finishReason: this.finishReason ?? 'stop',
      usage: {
        inputTokens: this.inputTokens ?? estimateTokens(promptText),
        outputTokens: this.outputTokens ?? estimateTokens(content),
      },
    };
  }
}

/**
 * SSE sink over an HTTP response. Tracks client disconnects.
 */
export function createHttpSink(res: http.ServerResponse, headers: Record<string, string> = {}): StreamSink {
  let disconnected = false;
  res.on('close', () => {
    disconnected = true;
  });

  return {
    get closed(): boolean {
      return disconnected || res.writableEnded || res.destroyed;
    },
    open(): void {
      res.writeHead(200, {
        ...headers,
        'Content-Type': 'text/event-stream',
        'Cache-Control': 'no-cache',
        Connection: 'keep-alive',
      });
    },
    write(data: string): void {
      if (!this.closed) res.write(data);
    },
    end(): void {
      if (!res.writableEnded) res.end();
    },
  };
}
