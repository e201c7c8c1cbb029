import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createDomainChecker, InMemoryCache, ValidationError, type Verdict } from '../src/index.js';
import { fakeRegistry } from './helpers.js';

describe('createDomainChecker', () => {
  it('reports a registered domain as taken', async () => {
    const checker = createDomainChecker({ probes: fakeRegistry() });
    const verdict = await checker.check('Google', 'COM');
    assert.equal(verdict.domain, 'google.com');
    assert.equal(verdict.status, 'taken');
    assert.equal(verdict.fromCache, false);
  });

  it('rejects invalid input without probing', async () => {
    const registry = fakeRegistry();
    const checker = createDomainChecker({ probes: registry });
    await assert.rejects(checker.check('inv@lid', 'com'), (err: unknown) => {
      assert.ok(err instanceof ValidationError);
      assert.equal(err.code, 'INVALID_DOMAIN_FORMAT');
      return true;
    });
    assert.equal(registry.whois.calls.length, 0);
    assert.equal(registry.dns.calls.length, 0);
  });

  it('answers a repeated check from the cache', async () => {
    const registry = fakeRegistry();
    const checker = createDomainChecker({ probes: registry });
    const first = await checker.check('google');
    const second = await checker.check('GOOGLE', '.com');

    assert.equal(second.fromCache, true);
    assert.equal(second.status, first.status);
    assert.deepEqual(second.whois, first.whois);
    assert.deepEqual(second.dns, first.dns);
    assert.deepEqual(registry.whois.calls, ['google.com']);
    assert.deepEqual(checker.stats(), { hits: 1, misses: 1, size: 1 });
  });

  it('resolves again once the ttl has passed', async () => {
    let now = 0;
    const registry = fakeRegistry();
    const checker = createDomainChecker({
      probes: registry,
      cache: new InMemoryCache<Verdict>({ now: () => now }),
      cacheTtlMs: 1000,
    });
    await checker.check('google');
    now = 999;
    assert.equal((await checker.check('google')).fromCache, true);
    now = 1000;
    assert.equal((await checker.check('google')).fromCache, false);
    assert.equal(registry.dns.calls.length, 2);
  });

  it('shares verdicts through a common store', async () => {
    const store = new InMemoryCache<Verdict>();
    const first = fakeRegistry();
    const second = fakeRegistry();
    await createDomainChecker({ probes: first, cache: store }).check('google');
    const verdict = await createDomainChecker({ probes: second, cache: store }).check('google');
    assert.equal(verdict.fromCache, true);
    assert.equal(second.dns.calls.length, 0);
  });

  it('checks batches with the configured limit', async () => {
    const checker = createDomainChecker({ probes: fakeRegistry(), maxBatchItems: 2 });
    await assert.rejects(checker.checkBatch([{ name: 'a1' }, { name: 'b2' }, { name: 'c3' }]), {
      code: 'TOO_MANY_ITEMS',
      message: 'Maximum 2 domains per request',
    });
    const outcome = await checker.checkBatch([{ name: 'google' }, { name: 'free-name' }]);
    assert.deepEqual(
      outcome.results.map((r) => r.status),
      ['taken', 'available'],
    );
  });

  it('keeps the cached verdict intact when a caller changes its copy', async () => {
    const checker = createDomainChecker({ probes: fakeRegistry() });
    const first = await checker.check('google');
    if (first.whois.status === 'taken') first.whois.detail.registrar = 'Changed';

    const second = await checker.check('google');
    assert.equal(second.fromCache, true);
    assert.deepEqual(second.whois, { status: 'taken', detail: { registrar: 'Test Registrar' } });
  });

  it('refuses limits that are not positive integers', () => {
    assert.throws(() => createDomainChecker({ probes: fakeRegistry(), concurrency: Number.NaN }), RangeError);
    assert.throws(() => createDomainChecker({ probes: fakeRegistry(), maxBatchItems: -1 }), RangeError);
    assert.throws(() => createDomainChecker({ probes: fakeRegistry(), cacheTtlMs: Number.NaN }), RangeError);
  });
});
