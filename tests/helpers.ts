import type {
  DnsTakenDetail,
  Probe,
  ProbeOptions,
  ProbeOutcome,
  ProbeSource,
  Verdict,
  WhoisTakenDetail,
} from '../src/types.js';

type Behaviour<D> = (fqdn: string, opts: ProbeOptions) => Promise<ProbeOutcome<D>>;

export class StubProbe<D> implements Probe<D> {
  readonly namespace: ProbeSource;
  readonly calls: string[] = [];
  readonly options: ProbeOptions[] = [];
  private readonly behaviour: Behaviour<D>;

  constructor(namespace: ProbeSource, behaviour: Behaviour<D>) {
    this.namespace = namespace;
    this.behaviour = behaviour;
  }

  check(fqdn: string, opts: ProbeOptions = {}): Promise<ProbeOutcome<D>> {
    this.calls.push(fqdn);
    this.options.push(opts);
    return this.behaviour(fqdn, opts);
  }
}

export function whoisStub(behaviour: Behaviour<WhoisTakenDetail>): StubProbe<WhoisTakenDetail> {
  return new StubProbe('whois.lib', behaviour);
}

export function dnsStub(behaviour: Behaviour<DnsTakenDetail>): StubProbe<DnsTakenDetail> {
  return new StubProbe('dns.host', behaviour);
}

/** google.com and any name starting with "taken" are registered; everything else is free. */
export function fakeRegistry() {
  const isTaken = (fqdn: string) => fqdn === 'google.com' || fqdn.startsWith('taken');
  return {
    whois: whoisStub(async (fqdn) =>
      isTaken(fqdn) ? { status: 'taken', detail: { registrar: 'Test Registrar' } } : { status: 'available' },
    ),
    dns: dnsStub(async (fqdn) =>
      isTaken(fqdn) ? { status: 'taken', detail: { address: '192.0.2.1' } } : { status: 'available' },
    ),
  };
}

export const never = <T>(): Promise<T> => new Promise<T>(() => {});

export const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export class Collector {
  text = '';
  write(chunk: string): boolean {
    this.text += chunk;
    return true;
  }
  lines(): string[] {
    return this.text.split('\n').filter(Boolean);
  }
}

export function makeVerdict(overrides: Partial<Verdict> = {}): Verdict {
  return {
    domain: 'example.com',
    status: 'available',
    whois: { status: 'available' },
    dns: { status: 'available' },
    tld: 'com',
    responseTime: 12,
    fromCache: false,
    ...overrides,
  };
}
