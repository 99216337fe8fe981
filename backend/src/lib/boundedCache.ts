export interface BoundedCacheOptions {
  maxEntries: number;
  /** entries older than this are dropped on read; 0 keeps them until evicted */
  ttlMs?: number;
  now?: () => number;
}

/**
 * In-memory map with a size cap and optional expiry. Reads refresh recency,
 * and the least recently used entry goes first when the cap is reached.
 */
export class BoundedCache<V> {
  private readonly store = new Map<string, { value: V; expiresAt: number }>();
  private readonly now: () => number;

  constructor(private readonly opts: BoundedCacheOptions) {
    if (!Number.isInteger(opts.maxEntries) || opts.maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${opts.maxEntries}`);
    }
    this.now = opts.now ?? Date.now;
  }

  get size(): number {
    return this.store.size;
  }

  has(key: string): boolean {
    return this.lookup(key) !== undefined;
  }

  get(key: string): V | undefined {
    return this.lookup(key)?.value;
  }

  set(key: string, value: V): void {
    const ttl = this.opts.ttlMs ?? 0;
    this.store.delete(key);
    this.store.set(key, { value, expiresAt: ttl > 0 ? this.now() + ttl : Infinity });
    while (this.store.size > this.opts.maxEntries) {
      const oldest = this.store.keys().next();
      if (oldest.done) break;
      this.store.delete(oldest.value);
    }
  }

  delete(key: string): boolean {
    return this.store.delete(key);
  }

  private lookup(key: string): { value: V; expiresAt: number } | undefined {
    const entry = this.store.get(key);
    if (!entry) return undefined;
    if (this.now() >= entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }
    this.store.delete(key);
    this.store.set(key, entry);
    return entry;
  }
}
