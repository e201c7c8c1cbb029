import type { Cache, DomainKey, Verdict } from '../types.js';
import { assertPositiveInteger } from '../errors.js';
import { fqdn } from '../validator.js';

export const DEFAULT_CACHE_TTL_MS = 300_000;

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
}

/**
 * Verdict memo keyed by canonical (label, tld). Verdicts are held by value: the
 * stored copy always carries `fromCache: false`, and callers get a deep copy
 * marked as cached.
 */
export class ResultCache {
  private readonly store: Cache<Verdict>;
  private readonly defaultTtlMs: number;
  private hits = 0;
  private misses = 0;

  constructor(store: Cache<Verdict>, defaultTtlMs = DEFAULT_CACHE_TTL_MS) {
    assertPositiveInteger('cache ttl', defaultTtlMs);
    this.store = store;
    this.defaultTtlMs = defaultTtlMs;
  }

  get(key: DomainKey): Verdict | undefined {
    const verdict = this.store.get(fqdn(key));
    if (!verdict) {
      this.misses++;
      return undefined;
    }
    this.hits++;
    return { ...structuredClone(verdict), fromCache: true };
  }

  put(key: DomainKey, verdict: Verdict, ttlMs = this.defaultTtlMs): void {
    assertPositiveInteger('cache ttl', ttlMs);
    this.store.set(fqdn(key), Object.freeze({ ...structuredClone(verdict), fromCache: false }), ttlMs);
  }

  stats(): CacheStats {
    return { hits: this.hits, misses: this.misses, size: this.store.size };
  }
}
