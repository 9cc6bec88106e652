import { err, ok, type Result } from "neverthrow";
import type { CacheRepository } from "../application/ports/out/CacheRepository.ts";
import type { SentimentProviderPort } from "../application/ports/out/SentimentProviderPort.ts";
import { BoundedTtlCache } from "../adapters/cache/boundedTtlCache.ts";
import { CacheAdapterRepository } from "../adapters/out/cache/CacheAdapterRepository.ts";
import { GoogleLanguageAdapter } from "../adapters/out/sentiment/GoogleLanguageAdapter.ts";
import type { AppConfig } from "./env.ts";
import { info } from "./logger.ts";

/**
 * Type definition representing the adapter container.
 * One cache and one provider client are shared by every request.
 */
export interface AdapterContainer {
  cache: BoundedTtlCache;
  cacheRepository: CacheRepository;
  provider: SentimentProviderPort;
}

export type AdapterInitError = {
  type: "no_provider" | "cache";
  message: string;
};

/**
 * Initializes the shared cache and the sentiment provider.
 * A provider can be passed in to replace the Google client.
 */
export function initializeAdapters(
  config: AppConfig,
  provider?: SentimentProviderPort,
): Result<AdapterContainer, AdapterInitError> {
  const cacheResult = BoundedTtlCache.create({
    ttlMs: config.cacheEntryTtlMs,
    maxSizeMb: config.cacheMaxSizeMb,
  });
  if (cacheResult.isErr()) {
    return err({
      type: "cache",
      message: `Failed to create cache: ${cacheResult.error.message}`,
    });
  }
  const cache = cacheResult.value;
  info("Initialized result cache", {
    maxSizeMb: config.cacheMaxSizeMb,
    ttlMs: config.cacheEntryTtlMs,
  });

  if (!provider && !config.googleApiKey) {
    return err({
      type: "no_provider",
      message: "Environment variable GOOGLE_API_KEY is not set",
    });
  }
  const sentimentProvider = provider ?? new GoogleLanguageAdapter(config.googleApiKey);
  info(`Registered sentiment provider ${sentimentProvider.name}`);

  return ok({
    cache,
    cacheRepository: new CacheAdapterRepository(cache),
    provider: sentimentProvider,
  });
}
