import { assertPositiveInteger, BatchRejectedError, errorMessage } from './errors.js';
import { noopLogger } from './logging/defaultLogger.js';
import type { CachedLookup } from './lookup.js';
import type { BatchError, BatchItem, BatchOutcome, Logger, Verdict } from './types.js';
import { DEFAULT_TLD, validateDomain } from './validator.js';

export const DEFAULT_MAX_BATCH_ITEMS = 10;

export type BatchItemResult =
  | { index: number; item: BatchItem; verdict: Verdict }
  | { index: number; item: BatchItem; error: BatchError };

export interface BatchCoordinatorOptions {
  lookup: CachedLookup;
  maxItems?: number;
  /** Items resolved at once. Defaults to maxItems. */
  concurrency?: number;
  logger?: Logger;
}

export class BatchCoordinator {
  private readonly lookup: CachedLookup;
  readonly maxItems: number;
  private readonly concurrency: number;
  private readonly logger: Logger;

  constructor(opts: BatchCoordinatorOptions) {
    this.lookup = opts.lookup;
    this.maxItems = opts.maxItems ?? DEFAULT_MAX_BATCH_ITEMS;
    this.concurrency = opts.concurrency ?? this.maxItems;
    assertPositiveInteger('maxItems', this.maxItems);
    assertPositiveInteger('concurrency', this.concurrency);
    this.logger = opts.logger ?? noopLogger;
  }

  /**
   * Resolves every item and keeps failures per item. Throws only for the two
   * request-level rejections: too many items, or no item that could be checked.
   */
  async resolveBatch(items: BatchItem[], tldDefault?: string): Promise<BatchOutcome> {
    if (items.length > this.maxItems) {
      throw new BatchRejectedError('TOO_MANY_ITEMS', `Maximum ${this.maxItems} domains per request`);
    }

    const settled: BatchItemResult[] = [];
    for await (const res of this.stream(items, tldDefault)) {
      settled.push(res);
    }
    settled.sort((a, b) => a.index - b.index);

    const results: Verdict[] = [];
    const errors: BatchError[] = [];
    for (const res of settled) {
      if ('verdict' in res) {
        results.push(res.verdict);
      } else {
        errors.push(res.error);
      }
    }

    if (results.length === 0 && errors.length > 0) {
      throw new BatchRejectedError('NO_VALID_ITEMS', 'No valid domains in request', errors);
    }
    return { results, errors };
  }

  /**
   * Yields per-item results as they complete, in completion order. No size limit
   * is applied here.
   */
  async *stream(items: BatchItem[], tldDefault?: string): AsyncGenerator<BatchItemResult> {
    const queue = items.map((item, index) => ({ item, index }));
    const active = new Map<number, Promise<BatchItemResult>>();

    const enqueue = () => {
      const next = queue.shift();
      if (!next) return;
      active.set(next.index, this.resolveItem(next.item, next.index, tldDefault));
    };

    for (let i = 0; i < this.concurrency && queue.length; i++) {
      enqueue();
    }

    while (active.size) {
      const res = await Promise.race(active.values());
      active.delete(res.index);
      enqueue();
      yield res;
    }
  }

  private async resolveItem(item: BatchItem, index: number, tldDefault?: string): Promise<BatchItemResult> {
    // Items may come straight from parsed JSON; anything that is not a string reads as absent.
    const name = typeof item?.name === 'string' ? item.name : undefined;
    const tld = typeof item?.tld === 'string' ? item.tld : tldDefault;
    const validated = validateDomain(name, tld);
    if (!validated.ok) {
      const error = {
        input: `${name ?? ''}.${tld ?? DEFAULT_TLD}`,
        code: validated.error.code,
        reason: validated.error.message,
      };
      this.logger.warn('batch.item.invalid', { index, ...error });
      return { index, item, error };
    }
    try {
      return { index, item, verdict: await this.lookup.lookup(validated.value) };
    } catch (err) {
      const error = {
        input: `${validated.value.label}.${validated.value.tld}`,
        code: 'RESOLUTION_FAILED',
        reason: errorMessage(err),
      };
      this.logger.error('batch.item.failed', { index, ...error });
      return { index, item, error };
    }
  }
}
