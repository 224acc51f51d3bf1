/**
 * Anthropic Messages API adapter.
 *
 * System messages are lifted into the top-level `system` field; the
 * response and stream events are mapped onto the provider-neutral shapes.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { ProviderError } from '../errors.js';
import { messageText } from '../routing/agent-detection.js';
import type { CompletionResult } from '../types.js';
import { malformed } from './classify.js';
import { parseEventData, postJson, readJson, readSseEvents, trimSlash, type OpenResponse } from './transport.js';
import type { ProviderAdapter, ProviderCall, ProviderStream, StreamEvent } from './types.js';

export const ANTHROPIC_VERSION = '2023-06-01';

const UsageSchema = z.object({
  input_tokens: z.number().int().nonnegative().optional(),
  output_tokens: z.number().int().nonnegative().optional(),
});

const MessageResponseSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  content: z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()),
  stop_reason: z.string().nullable().optional(),
  usage: UsageSchema.optional(),
});

const StreamPayloadSchema = z
  .object({
    type: z.string(),
    message: z.object({ model: z.string().optional(), usage: UsageSchema.optional() }).passthrough().optional(),
    delta: z
      .object({ type: z.string().optional(), text: z.string().optional(), stop_reason: z.string().nullable().optional() })
      .passthrough()
      .optional(),
    usage: UsageSchema.optional(),
    error: z.object({ type: z.string().optional(), message: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

interface AnthropicMessage {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * Map Anthropic stop reasons onto chat-completion finish reasons.
 */
export function mapStopReason(reason: string | null | undefined): string {
  switch (reason) {
    case 'end_turn':
    case 'stop_sequence':
    case null:
    case undefined:
      return 'stop';
    case 'max_tokens':
      return 'length';
    case 'tool_use':
      return 'tool_calls';
    default:
      return reason;
  }
}

export function buildAnthropicBody(call: ProviderCall, stream: boolean): Record<string, unknown> {
  const system: string[] = [];
  const messages: AnthropicMessage[] = [];

  for (const message of call.messages) {
    const role = message.role.trim().toLowerCase();
    const text = messageText(message);
    if (role === 'system') {
      system.push(text);
    } else {
      messages.push({ role: role === 'assistant' ? 'assistant' : 'user', content: text });
    }
  }

  const body: Record<string, unknown> = {
    model: call.model,
    max_tokens: call.sampling.maxTokens,
    temperature: call.sampling.temperature,
    messages,
    stream,
  };
  if (system.length > 0) body['system'] = system.join('\n\n');
  if (call.sampling.topP !== undefined) body['top_p'] = call.sampling.topP;
  if (call.sampling.stop !== undefined) body['stop_sequences'] = call.sampling.stop;
  return body;
}

function buildHeaders(call: ProviderCall): Record<string, string> {
  const headers: Record<string, string> = { 'anthropic-version': ANTHROPIC_VERSION };
  if (call.apiKey) headers['x-api-key'] = call.apiKey;
  return headers;
}

export class AnthropicAdapter implements ProviderAdapter {
  readonly kind = 'anthropic' as const;

  async complete(call: ProviderCall): Promise<CompletionResult> {
    const open = await postJson(call, `${trimSlash(call.provider.baseUrl)}/messages`, buildHeaders(call), buildAnthropicBody(call, false));
    const parsed = MessageResponseSchema.safeParse(await readJson(call, open));
    if (!parsed.success) {
      throw malformed(call, parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
    }

    const data = parsed.data;
    return {
      content: data.content
        .filter((block) => block.type === 'text')
        .map((block) => block.text ?? '')
        .join(''),
      model: data.model ?? call.model,
      providerId: call.provider.id,
      finishReason: mapStopReason(data.stop_reason),
      usage: {
        inputTokens: data.usage?.input_tokens ?? 0,
        outputTokens: data.usage?.output_tokens ?? 0,
      },
    };
  }

  async openStream(call: ProviderCall): Promise<ProviderStream> {
    const open = await postJson(call, `${trimSlash(call.provider.baseUrl)}/messages`, buildHeaders(call), buildAnthropicBody(call, true));
    open.release();

    return {
      providerId: call.provider.id,
      model: call.model,
      events: convertAnthropicStream(call, open),
    };
  }
}

/**
 * Translate Anthropic SSE events into stream events.
 */
async function* convertAnthropicStream(call: ProviderCall, open: OpenResponse): AsyncGenerator<StreamEvent, void, unknown> {
  for await (const sse of readSseEvents(call, open.response.body, open.abort)) {
    const parsed = StreamPayloadSchema.safeParse(parseEventData(call, sse.data));
    if (!parsed.success) {
      throw malformed(call, `unexpected ${sse.event ?? 'stream'} event`);
    }
    const payload = parsed.data;

    switch (payload.type) {
      case 'message_start': {
        const input = payload.message?.usage?.input_tokens;
        if (input !== undefined) yield { type: 'usage', usage: { inputTokens: input } };
        break;
      }
      case 'content_block_delta':
        if (payload.delta?.type === 'text_delta' && payload.delta.text) {
          yield { type: 'text', text: payload.delta.text };
        }
        break;
      case 'message_delta': {
        const output = payload.usage?.output_tokens;
        if (output !== undefined) yield { type: 'usage', usage: { outputTokens: output } };
        if (payload.delta?.stop_reason !== undefined) {
          yield { type: 'finish', finishReason: mapStopReason(payload.delta.stop_reason) };
        }
        break;
      }
      case 'message_stop':
        return;
      case 'error':
        throw new ProviderError(`${call.provider.id} stream error: ${payload.error?.message ?? 'unknown'}`, {
          providerId: call.provider.id,
          model: call.model,
          kind: 'server_error',
          detail: payload.error ?? null,
        });
      default:
        break;
    }
  }
}
