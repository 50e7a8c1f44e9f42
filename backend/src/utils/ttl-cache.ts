/**
 * Small LRU + TTL key-value store.
 *
 * Entries expire `ttlMs` after they were last written. When `maxEntries` is
 * reached, expired entries are dropped first, then the least recently used. Map insertion order is the
 * recency order: reads and writes move a key to the end.
 */

export interface TtlCacheOptions {
  ttlMs: number;
  maxEntries?: number;
  /** Clock in epoch milliseconds. Default: Date.now */
  now?: () => number;
}

interface Slot<V> {
  value: V;
  expiresAt: number;
}

export class TtlCache<K, V> {
  private readonly store = new Map<K, Slot<V>>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: TtlCacheOptions) {
    if (options.ttlMs <= 0) {
      throw new Error(`TtlCache ttlMs must be positive, got ${options.ttlMs}`);
    }
    this.ttlMs = options.ttlMs;
    this.maxEntries = options.maxEntries ?? 10_000;
    this.now = options.now ?? Date.now;
  }

  get(key: K): V | undefined {
    const slot = this.store.get(key);
    if (!slot) return undefined;

    if (slot.expiresAt <= this.now()) {
      this.store.delete(key);
      return undefined;
    }

    this.store.delete(key);
    this.store.set(key, slot);
    return slot.value;
  }

  has(key: K): boolean {
    return this.get(key) !== undefined;
  }

  set(key: K, value: V): void {
    const isNew = !this.store.delete(key);
    if (isNew && this.store.size >= this.maxEntries) {
      this.prune();
    }
    this.store.set(key, { value, expiresAt: this.now() + this.ttlMs });

    while (this.store.size > this.maxEntries) {
      const oldest = this.store.keys().next();
      if (oldest.done) break;
      this.store.delete(oldest.value);
    }
  }

  delete(key: K): boolean {
    return this.store.delete(key);
  }

  /**
   * Drop every expired entry. Returns how many were removed.
   */
  prune(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, slot] of this.store) {
      if (slot.expiresAt <= now) {
        this.store.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.store.size;
  }
}
