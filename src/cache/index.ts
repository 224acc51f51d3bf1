/**
 * Cache module exports.
 *
 * @packageDocumentation
 */

export { normalizeRequest, cacheKey, requestCacheKey, canonicalJson, DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE } from './key.js';
export type { CacheKey } from './key.js';
export { ResponseCache } from './response-cache.js';
export type { PromptCache, CacheEntry, CacheStats, ResponseCacheOptions } from './response-cache.js';
