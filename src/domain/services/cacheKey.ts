import type { CacheKey } from "../models/sentiment.ts";

/**
 * Derives the cache key for a piece of input text.
 *
 * Only surrounding whitespace and letter case are folded: "Hi there" and
 * "hi   there" stay distinct keys.
 */
export function normalizeCacheKey(text: string): CacheKey {
  return text.trim().toLowerCase() as CacheKey;
}
