import { systemClock, type Clock } from "../util/clock.js";

type CacheEntry<T> = {
  value: T;
  expiresAt: number;
};

/**
 * Time-bucketed cache. Keys carry `floor(now / ttl)` so they roll over at each
 * bucket boundary; entries expire at the end of the bucket they were written
 * in and are dropped lazily on read and on every write.
 */
export class TtlCache<T> {
  private cache = new Map<string, CacheEntry<T>>();

  constructor(
    private readonly ttlMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  bucket(): number {
    return Math.floor(this.clock.now() / this.ttlMs);
  }

  /** `part:part:bucket` for the current bucket */
  key(...parts: string[]): string {
    return [...parts, String(this.bucket())].join(":");
  }

  get(key: string): T | null {
    const entry = this.cache.get(key);
    if (!entry) return null;
    if (this.clock.now() >= entry.expiresAt) {
      this.cache.delete(key);
      return null;
    }
    return entry.value;
  }

  set(key: string, value: T): void {
    this.evictExpired();
    this.cache.set(key, {
      value,
      expiresAt: (this.bucket() + 1) * this.ttlMs,
    });
  }

  size(): number {
    this.evictExpired();
    return this.cache.size;
  }

  private evictExpired(): void {
    const now = this.clock.now();
    for (const [key, entry] of this.cache) {
      if (now >= entry.expiresAt) this.cache.delete(key);
    }
  }
}
