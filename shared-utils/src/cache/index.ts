/**
 * In-memory cache with per-entry TTL.
 *
 * Entries expire lazily: `get`, `has` and `size` drop whatever is past its
 * deadline.
 */

type CacheEntry<V> = {
  value: V;
  expiresAt: number; // epoch ms
};

export class MemoryCache<V = unknown> {
  private store = new Map<string, CacheEntry<V>>();
  private inflight = new Map<string, Promise<V>>();

  async get(key: string): Promise<V | null> {
    const entry = this.live(key);
    return entry ? entry.value : null;
  }

  async set(key: string, val: V, ttlSec: number): Promise<void> {
    const expiresAt = Date.now() + ttlSec * 1000;
    this.store.set(key, { value: val, expiresAt });
  }

  async delete(key: string): Promise<void> {
    this.store.delete(key);
  }

  /**
   * Return the cached value for `key`, or run `load` and cache its result.
   * Concurrent callers for the same key share one load.
   */
  async wrap(key: string, ttlSec: number, load: () => Promise<V>): Promise<V> {
    const entry = this.live(key);
    if (entry) return entry.value;

    const pending = this.inflight.get(key);
    if (pending) return pending;

    const loading = load();
    this.inflight.set(key, loading);
    try {
      const value = await loading;
      await this.set(key, value, ttlSec);
      return value;
    } finally {
      this.inflight.delete(key);
    }
  }

  clear(): void {
    this.store.clear();
  }

  size(): number {
    const now = Date.now();
    for (const [key, entry] of this.store.entries()) {
      if (now > entry.expiresAt) {
        this.store.delete(key);
      }
    }
    return this.store.size;
  }

  has(key: string): boolean {
    return this.live(key) !== undefined;
  }

  private live(key: string): CacheEntry<V> | undefined {
    const entry = this.store.get(key);
    if (!entry) return undefined;
    if (Date.now() > entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }
    return entry;
  }
}
