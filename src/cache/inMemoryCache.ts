import type { Cache } from '../types.js';

interface Entry<V> {
  value: V;
  expiresAt: number;
}

export interface InMemoryCacheOptions {
  /** Oldest insertion is evicted once reached. Unbounded when omitted. */
  maxSize?: number;
  now?: () => number;
}

export class InMemoryCache<V> implements Cache<V> {
  private store = new Map<string, Entry<V>>();
  private maxSize: number;
  private now: () => number;

  constructor(opts: InMemoryCacheOptions = {}) {
    this.maxSize = opts.maxSize ?? Number.POSITIVE_INFINITY;
    this.now = opts.now ?? Date.now;
  }

  get size(): number {
    return this.store.size;
  }

  get(key: string): V | undefined {
    const e = this.store.get(key);
    if (!e) return undefined;
    if (this.now() >= e.expiresAt) {
      this.store.delete(key);
      return undefined;
    }
    return e.value;
  }

  set(key: string, value: V, ttlMs: number) {
    // Replacing a key must not evict an unrelated entry.
    this.store.delete(key);
    if (this.store.size >= this.maxSize) {
      const firstKey = this.store.keys().next().value;
      if (firstKey !== undefined) this.store.delete(firstKey);
    }
    this.store.set(key, { value, expiresAt: this.now() + ttlMs });
  }

  delete(key: string): boolean {
    return this.store.delete(key);
  }
}
