export type DomainStatus = 'available' | 'taken';

export type ProbeSource = 'whois.lib' | 'dns.host';

/**
 * Canonical, validated identifier of a domain. Only the validator builds these.
 */
export interface DomainKey {
  readonly label: string;
  readonly tld: string;
}

export interface WhoisTakenDetail {
  /** Calendar date formatted as YYYY-MM-DD. */
  expirationDate?: string;
  registrar?: string;
}

export interface DnsTakenDetail {
  address: string;
}

export type ProbeOutcome<D = WhoisTakenDetail | DnsTakenDetail> =
  | { status: 'available' }
  | { status: 'taken'; detail: D }
  | { status: 'error'; message: string }
  | { status: 'timeout' };

export type WhoisOutcome = ProbeOutcome<WhoisTakenDetail>;
export type DnsOutcome = ProbeOutcome<DnsTakenDetail>;

export interface Verdict {
  readonly domain: string;
  readonly status: DomainStatus;
  readonly whois: WhoisOutcome;
  readonly dns: DnsOutcome;
  readonly tld: string;
  /**
   * Wall-clock duration of the resolution in milliseconds.
   */
  readonly responseTime: number;
  readonly fromCache: boolean;
}

export interface ProbeOptions {
  /** Aborted by the deadline executor once the probe's time is up. */
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface Probe<D> {
  /** Unique identifier used in logs for this probe */
  readonly namespace: ProbeSource;
  check(fqdn: string, opts?: ProbeOptions): Promise<ProbeOutcome<D>>;
}

export type WhoisProbe = Probe<WhoisTakenDetail>;
export type DnsProbe = Probe<DnsTakenDetail>;

export interface BatchItem {
  name?: string;
  tld?: string;
}

export interface BatchError {
  input: string;
  code: string;
  reason: string;
}

export interface BatchOutcome {
  results: Verdict[];
  errors: BatchError[];
}

export interface Logger {
  info(msg: string, meta?: object): void;
  warn(msg: string, meta?: object): void;
  error(msg: string, meta?: object): void;
  debug(msg: string, meta?: object): void;
}

/**
 * Key-value store with per-entry time-to-live. Entries are replaced whole.
 */
export interface Cache<V> {
  get(key: string): V | undefined;
  set(key: string, value: V, ttlMs: number): void;
  delete(key: string): boolean;
  readonly size: number;
}

export interface ProbeTimeouts {
  whoisMs: number;
  dnsMs: number;
}

export interface CheckerOptions {
  logger?: Logger;
  verbose?: boolean;
  /** Maximum WHOIS execution time in milliseconds. Defaults to 5000. */
  whoisTimeoutMs?: number;
  /** Maximum DNS execution time in milliseconds. Defaults to 3000. */
  dnsTimeoutMs?: number;
  /** How long a verdict stays cached, in milliseconds. Defaults to 300000. */
  cacheTtlMs?: number;
  /** Largest accepted batch. Defaults to 10. */
  maxBatchItems?: number;
  /** How many batch items resolve at once. Defaults to maxBatchItems. */
  concurrency?: number;
  /**
   * Backing store for verdicts. A fresh in-memory store is created when omitted;
   * pass a shared store when several checkers should see the same verdicts.
   */
  cache?: Cache<Verdict>;
  probes?: {
    whois?: WhoisProbe;
    dns?: DnsProbe;
  };
}
