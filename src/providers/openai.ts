/**
 * OpenAI-compatible chat completions adapter.
 *
 * Serves OpenAI itself and every backend that speaks the same wire format
 * (Ollama, vLLM, LocalAI). Message content is forwarded unchanged.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import type { CompletionResult } from '../types.js';
import { malformed } from './classify.js';
import { parseEventData, postJson, readJson, readSseEvents, trimSlash, type OpenResponse } from './transport.js';
import type { ProviderAdapter, ProviderCall, ProviderStream, StreamEvent } from './types.js';

const UsageSchema = z.object({
  prompt_tokens: z.number().int().nonnegative().optional(),
  completion_tokens: z.number().int().nonnegative().optional(),
});

const CompletionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).passthrough(),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .min(1),
  usage: UsageSchema.nullable().optional(),
});

const ChunkSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        delta: z.object({ content: z.string().nullable().optional() }).passthrough().optional(),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .default([]),
  usage: UsageSchema.nullable().optional(),
});

export function buildOpenAIBody(call: ProviderCall, stream: boolean): Record<string, unknown> {
  const body: Record<string, unknown> = {
    model: call.model,
    messages: call.messages.map((m) => ({ role: m.role.trim().toLowerCase(), content: m.content })),
    temperature: call.sampling.temperature,
    max_tokens: call.sampling.maxTokens,
    stream,
  };
  if (call.sampling.topP !== undefined) body['top_p'] = call.sampling.topP;
  if (call.sampling.stop !== undefined) body['stop'] = call.sampling.stop;
  if (stream) body['stream_options'] = { include_usage: true };
  return body;
}

function buildHeaders(call: ProviderCall): Record<string, string> {
  return call.apiKey ? { Authorization: `Bearer ${call.apiKey}` } : {};
}

export class OpenAIAdapter implements ProviderAdapter {
  readonly kind = 'openai' as const;

  async complete(call: ProviderCall): Promise<CompletionResult> {
    const url = `${trimSlash(call.provider.baseUrl)}/chat/completions`;
    const open = await postJson(call, url, buildHeaders(call), buildOpenAIBody(call, false));
    const parsed = CompletionResponseSchema.safeParse(await readJson(call, open));
    if (!parsed.success) {
      throw malformed(call, parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
    }

    const data = parsed.data;
    const choice = data.choices[0];
    return {
      content: choice?.message.content ?? '',
      model: data.model ?? call.model,
      providerId: call.provider.id,
      finishReason: choice?.finish_reason ?? 'stop',
      usage: {
        inputTokens: data.usage?.prompt_tokens ?? 0,
        outputTokens: data.usage?.completion_tokens ?? 0,
      },
    };
  }

  async openStream(call: ProviderCall): Promise<ProviderStream> {
    const url = `${trimSlash(call.provider.baseUrl)}/chat/completions`;
    const open = await postJson(call, url, buildHeaders(call), buildOpenAIBody(call, true));
    open.release();

    return {
      providerId: call.provider.id,
      model: call.model,
      events: convertOpenAIStream(call, open),
    };
  }
}

async function* convertOpenAIStream(call: ProviderCall, open: OpenResponse): AsyncGenerator<StreamEvent, void, unknown> {
  for await (const sse of readSseEvents(call, open.response.body, open.abort)) {
    if (sse.data.trim() === '[DONE]') return;

    const parsed = ChunkSchema.safeParse(parseEventData(call, sse.data));
    if (!parsed.success) {
      throw malformed(call, 'unexpected chunk shape');
    }

    for (const choice of parsed.data.choices) {
      const text = choice.delta?.content;
      if (text) yield { type: 'text', text };
      if (choice.finish_reason) yield { type: 'finish', finishReason: choice.finish_reason };
    }

    const usage = parsed.data.usage;
    if (usage) {
      const partial: { inputTokens?: number; outputTokens?: number } = {};
      if (usage.prompt_tokens !== undefined) partial.inputTokens = usage.prompt_tokens;
      if (usage.completion_tokens !== undefined) partial.outputTokens = usage.completion_tokens;
      yield { type: 'usage', usage: partial };
    }
  }
}
