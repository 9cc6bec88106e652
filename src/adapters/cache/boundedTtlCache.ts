import { err, fromThrowable, ok, type Result } from "neverthrow";
import type { CacheAdapter, CacheError } from "./cacheAdapter.ts";

export type CacheConfigError = { type: "config"; message: string };

export interface BoundedTtlCacheOptions {
  /** Lifetime of every entry, fixed for the whole cache */
  readonly ttlMs: number;
  /** Memory ceiling in megabytes. 0 disables the ceiling. */
  readonly maxSizeMb: number;
  /** Minimum time between sweeps of expired entries on write. Defaults to `ttlMs`. */
  readonly sweepIntervalMs?: number;
  readonly now?: () => number;
}

export interface CacheStats {
  readonly entries: number;
  readonly bytes: number;
  readonly maxBytes: number;
  readonly hits: number;
  readonly misses: number;
  readonly evictions: number;
}

interface CacheEntry {
  readonly payload: Uint8Array;
  readonly insertedAt: number;
  readonly size: number;
}

const BYTES_PER_MB = 1024 * 1024;

// Map slot, entry object and timestamps
export const ENTRY_OVERHEAD_BYTES = 64;

export function entrySize(key: string, payload: Uint8Array): number {
  return key.length * 2 + payload.byteLength + ENTRY_OVERHEAD_BYTES;
}

/**
 * In-memory byte cache with a uniform TTL and a memory ceiling.
 *
 * Entries live in a Map kept in recency order: a hit moves the entry to the
 * back, and `set` evicts from the front until the new entry fits. Expired
 * entries are dropped when read, swept on the first write after each sweep
 * interval, and dropped before any live entry is evicted.
 * Payloads are copied in and out so no caller shares memory with an entry.
 */
export class BoundedTtlCache implements CacheAdapter {
  private readonly store = new Map<string, CacheEntry>();
  private usedBytes = 0;
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private lastSweep: number;

  private constructor(
    private readonly ttlMs: number,
    private readonly maxBytes: number,
    private readonly sweepIntervalMs: number,
    private readonly now: () => number,
  ) {
    this.lastSweep = now();
  }

  static create(options: BoundedTtlCacheOptions): Result<BoundedTtlCache, CacheConfigError> {
    if (!Number.isFinite(options.ttlMs) || options.ttlMs <= 0) {
      return err({ type: "config", message: `Cache TTL must be positive, got ${options.ttlMs}` });
    }
    if (!Number.isInteger(options.maxSizeMb) || options.maxSizeMb < 0) {
      return err({
        type: "config",
        message: `Cache size must be a non-negative integer, got ${options.maxSizeMb}`,
      });
    }
    const sweepIntervalMs = options.sweepIntervalMs ?? options.ttlMs;
    if (!Number.isFinite(sweepIntervalMs) || sweepIntervalMs <= 0) {
      return err({
        type: "config",
        message: `Cache sweep interval must be positive, got ${sweepIntervalMs}`,
      });
    }

    return ok(
      new BoundedTtlCache(
        options.ttlMs,
        options.maxSizeMb * BYTES_PER_MB,
        sweepIntervalMs,
        options.now ?? Date.now,
      ),
    );
  }

  get(key: string): Promise<Result<Uint8Array | undefined, CacheError>> {
    return Promise.resolve(ok(this.read(key)));
  }

  set(key: string, value: Uint8Array): Promise<Result<void, CacheError>> {
    const stored = fromThrowable(
      () => this.write(key, value),
      (e): CacheError => ({
        type: "storage",
        message: e instanceof Error ? e.message : String(e),
      }),
    )();
    return Promise.resolve(stored.andThen((result) => result));
  }

  read(key: string): Uint8Array | undefined {
    const entry = this.store.get(key);

    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.isExpired(entry)) {
      this.remove(key, entry);
      this.misses++;
      return undefined;
    }

    this.store.delete(key);
    this.store.set(key, entry);
    this.hits++;

    return entry.payload.slice();
  }

  write(key: string, value: Uint8Array): Result<void, CacheError> {
    const size = entrySize(key, value);
    if (this.maxBytes > 0 && size > this.maxBytes) {
      return err({
        type: "storage",
        message: `Entry of ${size} bytes exceeds cache capacity of ${this.maxBytes} bytes`,
      });
    }

    const existing = this.store.get(key);
    if (existing) {
      this.remove(key, existing);
    }

    const now = this.now();
    if (now - this.lastSweep >= this.sweepIntervalMs) {
      this.prune();
    }

    if (this.maxBytes > 0) {
      this.evictUntilFits(size);
    }

    this.store.set(key, {
      payload: value.slice(),
      insertedAt: now,
      size,
    });
    this.usedBytes += size;

    return ok(undefined);
  }

  delete(key: string): boolean {
    const entry = this.store.get(key);
    if (!entry) return false;
    this.remove(key, entry);
    return true;
  }

  clear(): void {
    this.store.clear();
    this.usedBytes = 0;
  }

  /**
   * Drops every expired entry and returns how many were removed.
   */
  prune(): number {
    this.lastSweep = this.now();
    let removed = 0;
    for (const [key, entry] of this.store) {
      if (this.isExpired(entry)) {
        this.remove(key, entry);
        removed++;
      }
    }
    return removed;
  }

  stats(): CacheStats {
    return {
      entries: this.store.size,
      bytes: this.usedBytes,
      maxBytes: this.maxBytes,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.now() - entry.insertedAt >= this.ttlMs;
  }

  private remove(key: string, entry: CacheEntry): void {
    this.store.delete(key);
    this.usedBytes -= entry.size;
  }

  private evictUntilFits(size: number): void {
    if (this.usedBytes + size > this.maxBytes) {
      this.prune();
    }
    for (const [key, entry] of this.store) {
      if (this.usedBytes + size <= this.maxBytes) return;
      this.remove(key, entry);
      this.evictions++;
    }
  }
}
