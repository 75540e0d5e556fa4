interface CacheEntry<V> {
  value: V;
  expires_at: number;
}

export class TTLCache<V> {
  private store = new Map<string, CacheEntry<V>>();
  private readonly default_ttl_ms: number;
  private readonly max_entries: number;
  private readonly now: () => number;

  constructor(ttl_seconds = 300, max_entries = 1000, now: () => number = Date.now) {
    this.default_ttl_ms = ttl_seconds * 1000;
    this.max_entries = max_entries;
    this.now = now;
  }

  get size(): number {
    return this.store.size;
  }

  get(key: string): V | undefined {
    const entry = this.store.get(key);
    if (!entry) return undefined;
    if (this.now() > entry.expires_at) {
      this.store.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: V): void {
    if (this.default_ttl_ms <= 0) return;
    this.store.delete(key);
    if (this.store.size >= this.max_entries) {
      // Map iteration order is insertion order: evict the oldest.
      const oldest = this.store.keys().next();
      if (!oldest.done) this.store.delete(oldest.value);
    }
    this.store.set(key, {
      value,
      expires_at: this.now() + this.default_ttl_ms,
    });
  }

  buildKey(...parts: unknown[]): string {
    return parts.map((p) => JSON.stringify(p)).join(":");
  }
}
