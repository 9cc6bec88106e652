/**
 * Sort order for shaped results
 */
export type SortOrder = "asc" | "desc";

/**
 * Cache key derived from raw input text.
 * Only produced by `normalizeCacheKey`.
 */
export type CacheKey = string & { readonly __brand: "CacheKey" };

/**
 * A single scored text span returned by the sentiment provider
 */
export interface Sentence {
  readonly text: string;
  readonly score: number;
  readonly magnitude?: number;
}

/**
 * Raw provider result. Sentence order carries no meaning.
 */
export interface SentimentResult {
  readonly sentences: ReadonlyArray<Sentence>;
  readonly language?: string;
}

/**
 * Externally visible response: one `{ text: score }` mapping per retained sentence
 */
export type SentimentResponse = ReadonlyArray<Readonly<Record<string, number>>>;

/**
 * Remote provider error types
 */
export type ProviderError =
  | { type: "network"; message: string }
  | { type: "timeout"; message: string }
  | { type: "rateLimit"; message: string; retryAfterMs: number }
  | { type: "authorization"; message: string }
  | { type: "invalidInput"; message: string; issues: string[] }
  | { type: "invalidResponse"; message: string };

/**
 * Request-fatal pipeline errors
 */
export type SentimentError =
  | { type: "cancelled"; message: string }
  | { type: "provider"; message: string; cause: ProviderError };
