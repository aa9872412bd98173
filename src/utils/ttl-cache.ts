// Map whose entries expire
// Expired entries are dropped when read, and swept on write once the map grows past `sweepAbove`

interface Entry<V> {
  value: V;
  expiresAt: number;
}

export class TTLCache<K, V> {
  private entries = new Map<K, Entry<V>>();

  constructor(
    private defaultTtlMs: number,
    private sweepAbove = 1000,
  ) {}

  set(key: K, value: V, ttlMs = this.defaultTtlMs): void {
    if (this.entries.size >= this.sweepAbove) this.sweep(Date.now());
    this.entries.set(key, { value, expiresAt: Date.now() + ttlMs });
  }

  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  private sweep(now: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(key);
    }
  }
}
