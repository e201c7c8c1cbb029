import { HostAdapter } from './adapters/hostAdapter.js';
import { WhoisLibAdapter } from './adapters/whoisLibAdapter.js';
import { BatchCoordinator, type BatchItemResult } from './batch.js';
import { InMemoryCache } from './cache/inMemoryCache.js';
import { DEFAULT_CACHE_TTL_MS, ResultCache, type CacheStats } from './cache/resultCache.js';
import { ResolutionEngine } from './engine.js';
import { resolveLogger } from './logging/defaultLogger.js';
import { CachedLookup } from './lookup.js';
import type { BatchItem, BatchOutcome, CheckerOptions, Verdict } from './types.js';
import { validateDomain } from './validator.js';

export type {
  BatchError,
  BatchItem,
  BatchOutcome,
  Cache,
  CheckerOptions,
  DnsOutcome,
  DnsProbe,
  DnsTakenDetail,
  DomainKey,
  DomainStatus,
  Logger,
  Probe,
  ProbeOutcome,
  Verdict,
  WhoisOutcome,
  WhoisProbe,
  WhoisTakenDetail,
} from './types.js';
export type { BatchItemResult } from './batch.js';
export type { CacheStats } from './cache/resultCache.js';
export { BatchRejectedError, ConfigError, DomainCheckError, ValidationError } from './errors.js';
export { runWithDeadline } from './deadline.js';
export { fuseOutcomes, ResolutionEngine } from './engine.js';
export { BatchCoordinator } from './batch.js';
export { InMemoryCache } from './cache/inMemoryCache.js';
export { ResultCache } from './cache/resultCache.js';
export { HostAdapter } from './adapters/hostAdapter.js';
export { WhoisLibAdapter } from './adapters/whoisLibAdapter.js';
export { DefaultLogger } from './logging/defaultLogger.js';
export { fqdn, splitDomainName, validateDomain } from './validator.js';
export { toBatchBody, toErrorBody, toItemErrorBody, toVerdictBody } from './response.js';
export { loadConfig } from './config.js';

export interface DomainChecker {
  /**
   * Checks one domain. Rejects with a `ValidationError` for malformed input before
   * any probe runs; otherwise always resolves with a verdict.
   */
  check(rawLabel: string, rawTld?: string): Promise<Verdict>;
  checkBatch(items: BatchItem[], tldDefault?: string): Promise<BatchOutcome>;
  /** Per-item results in completion order, without the batch size limit. */
  checkStream(items: BatchItem[], tldDefault?: string): AsyncGenerator<BatchItemResult>;
  stats(): CacheStats;
}

export function createDomainChecker(opts: CheckerOptions = {}): DomainChecker {
  const logger = resolveLogger(opts);
  const engine = new ResolutionEngine({
    whois: opts.probes?.whois ?? new WhoisLibAdapter(undefined, logger),
    dns: opts.probes?.dns ?? new HostAdapter(undefined, logger),
    timeouts: { whoisMs: opts.whoisTimeoutMs, dnsMs: opts.dnsTimeoutMs },
    logger,
  });
  const cache = new ResultCache(opts.cache ?? new InMemoryCache<Verdict>(), opts.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS);
  const lookup = new CachedLookup(engine, cache);
  const batch = new BatchCoordinator({
    lookup,
    maxItems: opts.maxBatchItems,
    concurrency: opts.concurrency,
    logger,
  });

  return {
    async check(rawLabel, rawTld) {
      const validated = validateDomain(rawLabel, rawTld);
      if (!validated.ok) {
        logger.error(`validation error for domain '${rawLabel}', error: ${validated.error.message}`);
        throw validated.error;
      }
      return lookup.lookup(validated.value);
    },
    checkBatch: (items, tldDefault) => batch.resolveBatch(items, tldDefault),
    checkStream: (items, tldDefault) => batch.stream(items, tldDefault),
    stats: () => cache.stats(),
  };
}
