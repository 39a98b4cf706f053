/**
 * ResultCache - bounded key/value store with TTL expiry and LRU eviction.
 *
 * Entries are replaced on write, never edited. An expired entry is treated as
 * absent and dropped lazily on the next read. When the map is full, expired
 * entries are swept first and then the least-recently-used one is evicted.
 */

import { ValidationError } from "./errors";

export interface ResultCacheOptions {
  maxEntries?: number;
  ttlMs?: number;
}

export interface CacheEntry<V> {
  readonly key: string;
  readonly value: V;
  readonly expiresAt: number;
}

export interface ResultCacheStats {
  size: number;
  hits: number;
  misses: number;
  evictions: number;
  expirations: number;
  hitRate: string;
}

export const DEFAULT_CACHE_TTL_MS = 10 * 60 * 1000; // 10 minutes
export const DEFAULT_CACHE_MAX_ENTRIES = 200;

function assertTtl(ttlMs: number): void {
  if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
    throw new ValidationError(`ttlMs must be > 0 (got ${ttlMs})`);
  }
}

interface Slot<V> {
  entry: CacheEntry<V>;
  accessedAt: number;
}

export class ResultCache<V = unknown> {
  private map = new Map<string, Slot<V>>();
  private readonly maxEntries: number;
  readonly ttlMs: number;

  // Monotonic counter rather than wall time, so two touches in the same
  // millisecond still order correctly.
  private clock = 0;

  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;

  constructor(opts: ResultCacheOptions = {}) {
    const maxEntries = opts.maxEntries ?? DEFAULT_CACHE_MAX_ENTRIES;
    const ttlMs = opts.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new ValidationError(`maxEntries must be an integer >= 1 (got ${maxEntries})`);
    }
    assertTtl(ttlMs);
    this.maxEntries = maxEntries;
    this.ttlMs = ttlMs;
  }

  /** Returns the live entry for key, or undefined on miss/expiry. */
  lookup(key: string): CacheEntry<V> | undefined {
    const slot = this.map.get(key);
    if (!slot) {
      this.misses++;
      return undefined;
    }

    if (Date.now() > slot.entry.expiresAt) {
      this.map.delete(key);
      this.expirations++;
      this.misses++;
      return undefined;
    }

    slot.accessedAt = ++this.clock;
    this.hits++;
    return slot.entry;
  }

  get(key: string): V | undefined {
    return this.lookup(key)?.value;
  }

  set(key: string, value: V, ttlMs: number = this.ttlMs): this {
    assertTtl(ttlMs);
    if (!this.map.has(key) && this.map.size >= this.maxEntries) {
      this.sweepExpired();
      if (this.map.size >= this.maxEntries) {
        this.evictLRU();
      }
    }

    this.map.set(key, {
      entry: { key, value, expiresAt: Date.now() + ttlMs },
      accessedAt: ++this.clock,
    });
    return this;
  }

  has(key: string): boolean {
    const slot = this.map.get(key);
    if (!slot) return false;
    if (Date.now() > slot.entry.expiresAt) {
      this.map.delete(key);
      this.expirations++;
      return false;
    }
    return true;
  }

  delete(key: string): boolean {
    return this.map.delete(key);
  }

  clear(): void {
    this.map.clear();
  }

  get size(): number {
    return this.map.size;
  }

  /** Return non-expired keys */
  keys(): string[] {
    this.sweepExpired();
    return Array.from(this.map.keys());
  }

  stats(): ResultCacheStats {
    const total = this.hits + this.misses;
    const hitRate = total > 0 ? ((this.hits / total) * 100).toFixed(1) + "%" : "0%";
    return {
      size: this.map.size,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      expirations: this.expirations,
      hitRate,
    };
  }

  private sweepExpired(): void {
    const now = Date.now();
    for (const [key, slot] of Array.from(this.map.entries())) {
      if (now > slot.entry.expiresAt) {
        this.map.delete(key);
        this.expirations++;
      }
    }
  }

  private evictLRU(): void {
    let oldestKey: string | null = null;
    let oldestAccess = Infinity;

    for (const [key, slot] of Array.from(this.map.entries())) {
      if (slot.accessedAt < oldestAccess) {
        oldestAccess = slot.accessedAt;
        oldestKey = key;
      }
    }

    if (oldestKey !== null) {
      this.map.delete(oldestKey);
      this.evictions++;
      console.log(`[ResultCache] Evicted: ${oldestKey}`);
    }
  }
}
