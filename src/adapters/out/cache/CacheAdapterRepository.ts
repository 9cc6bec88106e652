import { err, ok, type Result } from "neverthrow";
import type {
  CacheError as RepoCacheError,
  CacheRepository,
} from "../../../application/ports/out/CacheRepository.ts";
import type { CacheKey, SentimentResult } from "../../../domain/models/sentiment.ts";
import type { CacheAdapter, CacheError as AdapterCacheError } from "../../cache/cacheAdapter.ts";
import { decodeResult, encodeResult } from "../../cache/resultCodec.ts";

/**
 * Adapter that converts a byte-level CacheAdapter to CacheRepository.
 * Results cross this boundary only in encoded form.
 */
export class CacheAdapterRepository implements CacheRepository {
  constructor(private readonly adapter: CacheAdapter) {}

  async get(key: CacheKey): Promise<Result<SentimentResult | undefined, RepoCacheError>> {
    const result = await this.adapter.get(key);

    return result
      .mapErr(this.convertError)
      .andThen((bytes): Result<SentimentResult | undefined, RepoCacheError> => {
        if (bytes === undefined) {
          return ok(undefined);
        }
        const decoded = decodeResult(bytes);
        return decoded.isOk() ? ok(decoded.value) : err(decoded.error);
      });
  }

  async set(key: CacheKey, value: SentimentResult): Promise<Result<void, RepoCacheError>> {
    const encoded = encodeResult(value);
    if (encoded.isErr()) {
      return err(encoded.error);
    }

    const result = await this.adapter.set(key, encoded.value);
    return result.mapErr(this.convertError);
  }

  private convertError(error: AdapterCacheError): RepoCacheError {
    return {
      type: error.type,
      message: error.message,
    };
  }
}
