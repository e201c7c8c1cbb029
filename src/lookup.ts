import type { ResultCache } from './cache/resultCache.js';
import type { ResolutionEngine } from './engine.js';
import type { DomainKey, Verdict } from './types.js';

/**
 * Cache-first resolution shared by single and batch lookups.
 */
export class CachedLookup {
  private readonly engine: ResolutionEngine;
  private readonly cache: ResultCache;

  constructor(engine: ResolutionEngine, cache: ResultCache) {
    this.engine = engine;
    this.cache = cache;
  }

  async lookup(key: DomainKey): Promise<Verdict> {
    const cached = this.cache.get(key);
    if (cached) return cached;
    const verdict = await this.engine.resolve(key);
    // put stores its own copy, so the caller keeps sole ownership of this one
    this.cache.put(key, verdict);
    return verdict;
  }
}
