import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { InMemoryCache } from '../src/cache/inMemoryCache.js';
import { ResultCache } from '../src/cache/resultCache.js';
import type { Verdict } from '../src/types.js';
import { makeVerdict } from './helpers.js';

function clock(start = 0) {
  let t = start;
  return {
    now: () => t,
    advance: (ms: number) => {
      t += ms;
    },
  };
}

describe('InMemoryCache', () => {
  it('expires entries once their ttl has elapsed', () => {
    const c = clock();
    const cache = new InMemoryCache<string>({ now: c.now });
    cache.set('k', 'v', 100);
    c.advance(99);
    assert.equal(cache.get('k'), 'v');
    c.advance(1);
    assert.equal(cache.get('k'), undefined);
    assert.equal(cache.size, 0);
  });

  it('replaces an existing entry', () => {
    const cache = new InMemoryCache<string>();
    cache.set('k', 'old', 1000);
    cache.set('k', 'new', 1000);
    assert.equal(cache.get('k'), 'new');
    assert.equal(cache.size, 1);
  });

  it('evicts the oldest insertion when full', () => {
    const cache = new InMemoryCache<number>({ maxSize: 2 });
    cache.set('a', 1, 1000);
    cache.set('b', 2, 1000);
    cache.set('c', 3, 1000);
    assert.equal(cache.get('a'), undefined);
    assert.equal(cache.get('b'), 2);
    assert.equal(cache.get('c'), 3);
  });

  it('does not evict when overwriting a key at capacity', () => {
    const cache = new InMemoryCache<number>({ maxSize: 2 });
    cache.set('a', 1, 1000);
    cache.set('b', 2, 1000);
    cache.set('a', 10, 1000);
    assert.equal(cache.get('a'), 10);
    assert.equal(cache.get('b'), 2);
  });

  it('deletes entries', () => {
    const cache = new InMemoryCache<number>();
    cache.set('a', 1, 1000);
    assert.equal(cache.delete('a'), true);
    assert.equal(cache.delete('a'), false);
  });
});

describe('ResultCache', () => {
  const key = { label: 'google', tld: 'com' };

  it('marks hits as cached without touching the stored copy', () => {
    const store = new InMemoryCache<Verdict>();
    const cache = new ResultCache(store);
    cache.put(key, makeVerdict({ domain: 'google.com', status: 'taken' }));

    const hit = cache.get(key);
    assert.equal(hit?.fromCache, true);
    assert.equal(hit?.status, 'taken');
    assert.equal(store.get('google.com')?.fromCache, false);
    assert.ok(Object.isFrozen(store.get('google.com')));
  });

  it('never stores the cached decoration', () => {
    const store = new InMemoryCache<Verdict>();
    const cache = new ResultCache(store);
    cache.put(key, makeVerdict({ fromCache: true }));
    assert.equal(store.get('google.com')?.fromCache, false);
  });

  it('keeps the last verdict written', () => {
    const cache = new ResultCache(new InMemoryCache<Verdict>());
    cache.put(key, makeVerdict({ status: 'available' }));
    cache.put(key, makeVerdict({ status: 'taken' }));
    assert.equal(cache.get(key)?.status, 'taken');
  });

  it('applies the default ttl and per-call overrides', () => {
    const c = clock();
    const cache = new ResultCache(new InMemoryCache<Verdict>({ now: c.now }), 300_000);
    const other = { label: 'example', tld: 'org' };
    cache.put(key, makeVerdict());
    cache.put(other, makeVerdict(), 10);
    c.advance(10);
    assert.equal(cache.get(other), undefined);
    assert.ok(cache.get(key));
    c.advance(299_990);
    assert.equal(cache.get(key), undefined);
  });

  it('counts hits and misses', () => {
    const cache = new ResultCache(new InMemoryCache<Verdict>());
    cache.get(key);
    cache.put(key, makeVerdict());
    cache.get(key);
    cache.get(key);
    assert.deepEqual(cache.stats(), { hits: 2, misses: 1, size: 1 });
  });

  it('holds verdicts by value', () => {
    const store = new InMemoryCache<Verdict>();
    const cache = new ResultCache(store);
    const original = makeVerdict({
      domain: 'google.com',
      status: 'taken',
      whois: { status: 'taken', detail: { registrar: 'Test Registrar' } },
      dns: { status: 'taken', detail: { address: '192.0.2.1' } },
    });
    cache.put(key, original);
    if (original.whois.status === 'taken') original.whois.detail.registrar = 'Changed';

    const hit = cache.get(key);
    assert.deepEqual(hit?.whois, { status: 'taken', detail: { registrar: 'Test Registrar' } });
    if (hit?.dns.status === 'taken') hit.dns.detail.address = '192.0.2.99';

    assert.deepEqual(cache.get(key)?.dns, { status: 'taken', detail: { address: '192.0.2.1' } });
    assert.deepEqual(store.get('google.com')?.dns, { status: 'taken', detail: { address: '192.0.2.1' } });
  });

  it('rejects a ttl that is not a positive integer', () => {
    const store = new InMemoryCache<Verdict>();
    assert.throws(() => new ResultCache(store, Number.NaN), RangeError);
    assert.throws(() => new ResultCache(store, 0), RangeError);
    assert.throws(() => new ResultCache(store).put(key, makeVerdict(), 1.5), RangeError);
  });
});
