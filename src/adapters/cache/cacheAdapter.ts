import type { Result } from "neverthrow";

export type CacheError = { type: "storage"; message: string };

/**
 * Interface for cache adapters that store and retrieve opaque byte payloads
 */
export interface CacheAdapter {
  get(key: string): Promise<Result<Uint8Array | undefined, CacheError>>;
  set(key: string, value: Uint8Array): Promise<Result<void, CacheError>>;
}
