import { describe, it, expect } from 'vitest';
import {
  cacheKey,
  canonicalJson,
  normalizeRequest,
  requestCacheKey,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
} from '../src/cache/key.js';
import type { ChatRequest } from '../src/types.js';
import { chatRequest } from './helpers.js';

describe('normalizeRequest', () => {
  it('applies sampling defaults', () => {
    const normalized = normalizeRequest(chatRequest('hi'));
    expect(normalized.sampling).toEqual({ temperature: DEFAULT_TEMPERATURE, maxTokens: DEFAULT_MAX_TOKENS });
  });

  it('lower-cases and trims roles, trims the model', () => {
    const normalized = normalizeRequest({
      model: ' claude-opus-4 ',
      messages: [{ role: ' User ', content: 'hi' }],
    });
    expect(normalized.model).toBe('claude-opus-4');
    expect(normalized.messages).toEqual([{ role: 'user', content: 'hi' }]);
  });

  it('turns a single stop string into a list', () => {
    const normalized = normalizeRequest(chatRequest('hi', { stop: 'END' }));
    expect(normalized.sampling.stop).toEqual(['END']);
  });

  it('keeps top_p when given', () => {
    const normalized = normalizeRequest(chatRequest('hi', { top_p: 0.5 }));
    expect(normalized.sampling.topP).toBe(0.5);
  });
});

describe('canonicalJson', () => {
  it('sorts keys at every depth', () => {
    expect(canonicalJson({ b: 1, a: { d: 2, c: 3 } })).toBe('{"a":{"c":3,"d":2},"b":1}');
  });

  it('writes -0 as 0', () => {
    expect(canonicalJson({ x: -0 })).toBe('{"x":0}');
  });

  it('drops undefined fields', () => {
    expect(canonicalJson({ a: 1, b: undefined })).toBe('{"a":1}');
  });
});

describe('requestCacheKey', () => {
  it('is a 64-char lowercase hex digest', () => {
    expect(requestCacheKey(chatRequest('hi'))).toMatch(/^[0-9a-f]{64}$/);
  });

  it('is stable for identical requests', () => {
    expect(requestCacheKey(chatRequest('Summarize the file'))).toBe(requestCacheKey(chatRequest('Summarize the file')));
  });

  it('treats an explicit default like an absent value', () => {
    const implicit = chatRequest('hi');
    const explicit = chatRequest('hi', { temperature: 1, max_tokens: 4096 });
    expect(requestCacheKey(explicit)).toBe(requestCacheKey(implicit));
  });

  it('ignores metadata and the stream flag', () => {
    const plain = chatRequest('hi');
    const decorated: ChatRequest = {
      ...plain,
      stream: true,
      metadata: { agent_type: 'explorer', source: 'cli', request_id: 'r-1' },
    };
    expect(requestCacheKey(decorated)).toBe(requestCacheKey(plain));
  });

  it('ignores key order inside content blocks', () => {
    const a = chatRequest('x', { messages: [{ role: 'user', content: [{ type: 'text', text: 'hi' }] }] });
    const b = chatRequest('x', { messages: [{ role: 'user', content: [{ text: 'hi', type: 'text' }] }] });
    expect(requestCacheKey(a)).toBe(requestCacheKey(b));
  });

  it('treats -0 and 0 temperatures alike', () => {
    expect(requestCacheKey(chatRequest('hi', { temperature: -0 }))).toBe(requestCacheKey(chatRequest('hi', { temperature: 0 })));
  });

  it('changes with the prompt, model or sampling parameters', () => {
    const base = requestCacheKey(chatRequest('hi'));
    expect(requestCacheKey(chatRequest('hi!'))).not.toBe(base);
    expect(requestCacheKey(chatRequest('hi', { model: 'claude-sonnet-4' }))).not.toBe(base);
    expect(requestCacheKey(chatRequest('hi', { temperature: 0.2 }))).not.toBe(base);
    expect(requestCacheKey(chatRequest('hi', { max_tokens: 100 }))).not.toBe(base);
    expect(requestCacheKey(chatRequest('hi', { stop: ['END'] }))).not.toBe(base);
  });

  it('changes with the role', () => {
    const asUser = chatRequest('hi');
    const asSystem = chatRequest('hi', { messages: [{ role: 'system', content: 'hi' }] });
    expect(requestCacheKey(asSystem)).not.toBe(requestCacheKey(asUser));
  });

  it('matches cacheKey over the normalized form', () => {
    const req = chatRequest('hi');
    expect(requestCacheKey(req)).toBe(cacheKey(normalizeRequest(req)));
  });
});
