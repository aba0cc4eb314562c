/**
 * Bounded LRU cache with per-entry TTL.
 *
 * Map preserves insertion order, so the first key is always the least
 * recently used: touching an entry is delete + re-insert. Expired entries
 * are dropped lazily on read and before each insert's eviction pass.
 *
 * @example
 * const cache = new BoundedCache<string>({ maxEntries: 500, ttlMs: 60_000 })
 * cache.set("key", "value")
 * cache.get("key") // "value", now most recently used
 */

export interface BoundedCacheOptions<T> {
  /** Maximum number of entries (default: 1000) */
  maxEntries?: number;
  /** Entry lifetime in ms; 0 or absent means entries never expire */
  ttlMs?: number;
  /** Clock, injectable for tests */
  now?: () => number;
  onEvict?: (key: string, value: T, reason: "capacity" | "expired") => void;
}

interface Entry<T> {
  value: T;
  expiresAt: number;
}

export class BoundedCache<T> {
  private readonly entries = new Map<string, Entry<T>>();
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly onEvict?: BoundedCacheOptions<T>["onEvict"];

  constructor(options: BoundedCacheOptions<T> = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? 1000);
    this.ttlMs = options.ttlMs ?? 0;
    this.now = options.now ?? Date.now;
    this.onEvict = options.onEvict;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.isExpired(entry)) {
      this.entries.delete(key);
      this.onEvict?.(key, entry.value, "expired");
      return undefined;
    }
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  set(key: string, value: T): void {
    this.entries.delete(key);
    const expiresAt = this.ttlMs > 0 ? this.now() + this.ttlMs : Number.POSITIVE_INFINITY;
    this.entries.set(key, { value, expiresAt });
    this.evict();
  }

  /** Presence check without touching recency. */
  has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && !this.isExpired(entry);
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  private isExpired(entry: Entry<T>): boolean {
    return entry.expiresAt <= this.now();
  }

  private evict(): void {
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        this.onEvict?.(key, entry.value, "expired");
      }
    }
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      const entry = this.entries.get(oldest.value);
      this.entries.delete(oldest.value);
      if (entry) this.onEvict?.(oldest.value, entry.value, "capacity");
    }
  }
}
