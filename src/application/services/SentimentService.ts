import { err, ok, type Result } from "neverthrow";
import type {
  CacheKey,
  SentimentError,
  SentimentResponse,
  SentimentResult,
  SortOrder,
} from "../../domain/models/sentiment.ts";
import { normalizeCacheKey } from "../../domain/services/cacheKey.ts";
import { shapeResult } from "../../domain/services/resultShaper.ts";
import { debug, error, warn } from "../../config/logger.ts";
import type { SentimentUseCase } from "../ports/in/SentimentUseCase.ts";
import type { CacheRepository } from "../ports/out/CacheRepository.ts";
import type { SentimentProviderPort } from "../ports/out/SentimentProviderPort.ts";

export interface SentimentServiceOptions {
  readonly requestTimeoutMs: number;
}

const CANCELLED: SentimentError = { type: "cancelled", message: "Request cancelled" };

/**
 * Implementation of the SentimentUseCase port.
 *
 * Looks the normalized input up in the cache, falls back to the provider on a
 * miss, stores the fresh result best-effort, then shapes it for the caller.
 * Cache failures of any kind only cost an extra provider call; provider
 * failures and cancellation fail the request.
 */
export class SentimentService implements SentimentUseCase {
  constructor(
    private readonly provider: SentimentProviderPort,
    private readonly cache: CacheRepository,
    private readonly options: SentimentServiceOptions,
  ) {}

  async handle(
    signal: AbortSignal,
    content: string,
    order: SortOrder,
    limit: number,
  ): Promise<Result<SentimentResponse, SentimentError>> {
    if (signal.aborted) {
      warn("Context cancelled", { input: content });
      return err(CANCELLED);
    }

    const key = normalizeCacheKey(content);
    const cached = await this.lookup(key);
    const result: Result<SentimentResult, SentimentError> = cached
      ? ok(cached)
      : await this.fetchAndStore(signal, content, key);

    return result.andThen((value): Result<SentimentResponse, SentimentError> => {
      if (signal.aborted) {
        error("Context cancelled after analysis", { input: content });
        return err(CANCELLED);
      }
      return ok(shapeResult(value.sentences, order, limit));
    });
  }

  private async lookup(key: CacheKey): Promise<SentimentResult | undefined> {
    const result = await this.cache.get(key);

    return result.match(
      (value) => value,
      (cacheError) => {
        debug("Cache lookup failed, treating as miss", {
          key,
          type: cacheError.type,
          error: cacheError.message,
        });
        return undefined;
      },
    );
  }

  private async fetchAndStore(
    signal: AbortSignal,
    content: string,
    key: CacheKey,
  ): Promise<Result<SentimentResult, SentimentError>> {
    const callSignal = AbortSignal.any([
      signal,
      AbortSignal.timeout(this.options.requestTimeoutMs),
    ]);
    const result = await this.provider.analyze(content, callSignal);

    if (result.isErr()) {
      if (signal.aborted) {
        warn("Context cancelled during remote call", { input: content });
        return err(CANCELLED);
      }

      error("Remote API call failure", {
        provider: this.provider.name,
        type: result.error.type,
        error: result.error.message,
        input: content,
      });
      return err({
        type: "provider",
        message: "Sentiment provider call failed",
        cause: result.error,
      });
    }

    const stored = await this.cache.set(key, result.value);
    if (stored.isErr()) {
      debug("Cache write skipped", {
        key,
        type: stored.error.type,
        error: stored.error.message,
      });
    }

    return ok(result.value);
  }
}
