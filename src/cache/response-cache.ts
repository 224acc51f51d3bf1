/**
 * In-memory response cache.
 *
 * Bounded LRU keyed by the SHA-256 request fingerprint, with optional TTL.
 * Entries are frozen on insert and only ever replaced, so a reader can
 * never observe a half-written response.
 *
 * @packageDocumentation
 */

import type { CachedResponse, ChatRequest, CompletionResult, TokenUsage } from '../types.js';
import { requestCacheKey, type CacheKey } from './key.js';

export interface CacheEntry {
  readonly key: CacheKey;
  readonly response: CachedResponse;
  readonly insertedAt: number;
  /** 0 when the entry never expires */
  readonly expiresAt: number;
}

export interface CacheStats {
  entries: number;
  hits: number;
  misses: number;
  /** Percentage, 0 when there were no lookups */
  hitRate: number;
  evictions: number;
  expirations: number;
}

export interface ResponseCacheOptions {
  /** Max entries before LRU eviction (default: 10000) */
  maxEntries?: number;
  /** Seconds until an entry expires, 0 disables expiry (default: 3600) */
  ttlSeconds?: number;
}

/**
 * What the gateway needs from a cache. Implementations may fail; the
 * gateway treats a throwing lookup as a miss.
 */
export interface PromptCache {
  lookup(request: ChatRequest | CacheKey): CachedResponse | undefined;
  store(request: ChatRequest | CacheKey, response: Omit<CompletionResult, 'usage'>, usage: TokenUsage): void;
  stats(): CacheStats;
  clear(): void;
}

export class ResponseCache implements PromptCache {
  private readonly entries = new Map<CacheKey, CacheEntry>();
  private readonly hitCounts = new Map<CacheKey, number>();
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;

  constructor(opts: ResponseCacheOptions = {}) {
    this.maxEntries = opts.maxEntries ?? 10_000;
    this.ttlMs = (opts.ttlSeconds ?? 3600) * 1000;
  }

  /**
   * Side-effect free with respect to the stored entry: only recency and
   * the hit counters change.
   */
  lookup(request: ChatRequest | CacheKey): CachedResponse | undefined {
    const key = toKey(request);
    const entry = this.entries.get(key);

    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (entry.expiresAt !== 0 && Date.now() >= entry.expiresAt) {
      this.entries.delete(key);
      this.hitCounts.delete(key);
      this.expirations++;
      this.misses++;
      return undefined;
    }

    // Refresh recency: Map iteration order is insertion order
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hitCounts.set(key, (this.hitCounts.get(key) ?? 0) + 1);
    this.hits++;
    return entry.response;
  }

  store(request: ChatRequest | CacheKey, response: Omit<CompletionResult, 'usage'>, usage: TokenUsage): void {
    const key = toKey(request);
    const now = Date.now();
    const entry: CacheEntry = Object.freeze({
      key,
      response: Object.freeze({
        content: response.content,
        model: response.model,
        providerId: response.providerId,
        finishReason: response.finishReason,
        usage: Object.freeze({ inputTokens: usage.inputTokens, outputTokens: usage.outputTokens }),
      }),
      insertedAt: now,
      expiresAt: this.ttlMs > 0 ? now + this.ttlMs : 0,
    });

    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hitCounts.set(key, 0);

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.hitCounts.delete(oldest.value);
      this.evictions++;
    }
  }

  /** Entry metadata without touching recency or counters. */
  peek(request: ChatRequest | CacheKey): { entry: CacheEntry; hits: number } | undefined {
    const key = toKey(request);
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    return { entry, hits: this.hitCounts.get(key) ?? 0 };
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      entries: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups > 0 ? (this.hits / lookups) * 100 : 0,
      evictions: this.evictions,
      expirations: this.expirations,
    };
  }

  /** Drop all entries. Counters are kept for reporting. */
  clear(): void {
    this.entries.clear();
    this.hitCounts.clear();
  }
}

function toKey(request: ChatRequest | CacheKey): CacheKey {
  return typeof request === 'string' ? request : requestCacheKey(request);
}
