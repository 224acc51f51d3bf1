/**
 * Cache key generation.
 *
 * A request is reduced to its NormalizedRequest (model, messages, sampling
 * parameters with defaults applied), serialised to canonical JSON (sorted
 * keys, shortest number form) and hashed with SHA-256. Metadata, the
 * `stream` flag and unknown fields never reach the key.
 *
 * @packageDocumentation
 */

import { createHash } from 'node:crypto';
import type { ChatRequest, NormalizedMessage, NormalizedRequest } from '../types.js';

export const DEFAULT_TEMPERATURE = 1;
export const DEFAULT_MAX_TOKENS = 4096;

/** 64-char lowercase hex digest */
export type CacheKey = string;

export function normalizeRequest(request: ChatRequest): NormalizedRequest {
  const messages: NormalizedMessage[] = request.messages.map((m) => ({
    role: m.role.trim().toLowerCase(),
    content: typeof m.content === 'string'
      ? m.content
      : m.content.map((block) => canonicalObject(block)),
  }));

  const normalized: NormalizedRequest = {
    model: request.model.trim(),
    messages,
    sampling: {
      temperature: request.temperature ?? DEFAULT_TEMPERATURE,
      maxTokens: request.max_tokens ?? DEFAULT_MAX_TOKENS,
    },
  };

  if (request.top_p !== undefined) {
    normalized.sampling.topP = request.top_p;
  }
  if (request.stop !== undefined) {
    normalized.sampling.stop = typeof request.stop === 'string' ? [request.stop] : [...request.stop];
  }

  return normalized;
}

export function cacheKey(normalized: NormalizedRequest): CacheKey {
  return createHash('sha256').update(canonicalJson(normalized), 'utf-8').digest('hex');
}

export function requestCacheKey(request: ChatRequest): CacheKey {
  return cacheKey(normalizeRequest(request));
}

/**
 * JSON with object keys sorted at every depth and `-0` written as `0`.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

function canonicalize(value: unknown): unknown {
  if (typeof value === 'number') {
    return Object.is(value, -0) ? 0 : value;
  }
  if (Array.isArray(value)) {
    return value.map((v) => canonicalize(v));
  }
  if (value !== null && typeof value === 'object') {
    return canonicalObject(value);
  }
  return value;
}

function canonicalObject(value: object): Record<string, unknown> {
  const entries = Object.entries(value)
    .filter(([, child]) => child !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const out: Record<string, unknown> = {};
  for (const [key, child] of entries) {
    out[key] = canonicalize(child);
  }
  return out;
}
