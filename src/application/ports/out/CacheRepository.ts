import type { Result } from "neverthrow";
import type { CacheKey, SentimentResult } from "../../../domain/models/sentiment.ts";

/**
 * Output port for the result cache.
 * Every failure is recoverable: callers treat an error as a miss or a skipped write.
 */
export interface CacheRepository {
  get(key: CacheKey): Promise<Result<SentimentResult | undefined, CacheError>>;

  set(key: CacheKey, value: SentimentResult): Promise<Result<void, CacheError>>;
}

/**
 * Cache error type
 */
export type CacheError = {
  type: "storage" | "encode" | "decode";
  message: string;
};
