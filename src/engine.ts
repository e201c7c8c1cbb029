import { assertTimeout, runWithDeadline } from './deadline.js';
import { noopLogger } from './logging/defaultLogger.js';
import { fqdn } from './validator.js';
import type {
  DnsProbe,
  DomainKey,
  DomainStatus,
  Logger,
  Probe,
  ProbeOutcome,
  ProbeTimeouts,
  Verdict,
  WhoisProbe,
} from './types.js';

// Default per-probe execution timeouts (in ms)
export const defaultTimeouts: ProbeTimeouts = {
  whoisMs: 5000,
  dnsMs: 3000,
};

export interface ResolutionEngineOptions {
  whois: WhoisProbe;
  dns: DnsProbe;
  timeouts?: Partial<ProbeTimeouts>;
  logger?: Logger;
  now?: () => number;
}

/**
 * A single `taken` from either source decides; errors and timeouts are
 * non-authoritative, so two inconclusive probes still read as available.
 */
export function fuseOutcomes(whois: ProbeOutcome<unknown>, dns: ProbeOutcome<unknown>): DomainStatus {
  return whois.status === 'taken' || dns.status === 'taken' ? 'taken' : 'available';
}

export class ResolutionEngine {
  private readonly whois: WhoisProbe;
  private readonly dns: DnsProbe;
  private readonly timeouts: ProbeTimeouts;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(opts: ResolutionEngineOptions) {
    this.whois = opts.whois;
    this.dns = opts.dns;
    this.timeouts = {
      whoisMs: opts.timeouts?.whoisMs ?? defaultTimeouts.whoisMs,
      dnsMs: opts.timeouts?.dnsMs ?? defaultTimeouts.dnsMs,
    };
    assertTimeout('whois timeout', this.timeouts.whoisMs);
    assertTimeout('dns timeout', this.timeouts.dnsMs);
    this.logger = opts.logger ?? noopLogger;
    this.now = opts.now ?? Date.now;
  }

  async resolve(key: DomainKey): Promise<Verdict> {
    const start = this.now();
    const domain = fqdn(key);
    this.logger.info('domain.resolve.start', { domain });

    const [whois, dns] = await Promise.all([
      this.probe(this.whois, domain, this.timeouts.whoisMs),
      this.probe(this.dns, domain, this.timeouts.dnsMs),
    ]);

    const verdict: Verdict = {
      domain,
      status: fuseOutcomes(whois, dns),
      whois,
      dns,
      tld: key.tld,
      responseTime: this.now() - start,
      fromCache: false,
    };
    this.logger.info('domain.resolve.end', {
      domain,
      status: verdict.status,
      whois: whois.status,
      dns: dns.status,
      responseTime: verdict.responseTime,
    });
    return verdict;
  }

  private async probe<D>(probe: Probe<D>, domain: string, timeoutMs: number): Promise<ProbeOutcome<D>> {
    const outcome = await runWithDeadline((signal) => probe.check(domain, { signal, timeoutMs }), timeoutMs);
    if (outcome.status === 'timeout') {
      this.logger.warn(`${probe.namespace}.timeout`, { domain, timeoutMs });
    } else if (outcome.status === 'error') {
      this.logger.warn(`${probe.namespace}.failed`, { domain, error: outcome.message });
    }
    return outcome;
  }
}
