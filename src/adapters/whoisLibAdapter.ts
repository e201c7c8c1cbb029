import { lookup as whoisLookup } from 'whois';
import type { Logger, ProbeOptions, ProbeOutcome, WhoisTakenDetail } from '../types.js';
import { errorMessage } from '../errors.js';
import { BaseProbeAdapter } from './baseAdapter.js';

const DEFAULT_TIMEOUT_MS = 5000;

export type WhoisLookup = (fqdn: string, timeoutMs: number) => Promise<string>;

// The client takes no abort signal. With one referral hop an abandoned
// lookup holds its socket for at most two socket timeouts past the deadline.
export function lookupOptions(timeoutMs: number): { timeout: number; follow: number } {
  return { timeout: timeoutMs, follow: 1 };
}

function lookup(fqdn: string, timeoutMs: number): Promise<string> {
  return new Promise((resolve, reject) => {
    whoisLookup(fqdn, lookupOptions(timeoutMs), (err, data) => {
      if (err) {
        reject(err);
      } else {
        resolve(String(data));
      }
    });
  });
}

const availablePatterns = [
  'no match',
  'not found',
  'no object found',
  'no data found',
  'no entries found',
  'status: available',
  'status: free',
];

const rateLimitPatterns = ['rate limit', 'quota exceeded', 'too many requests'];

const DOMAIN_LINE = /^\s*domain(?: name)?:\s*\S/im;
const REGISTRAR_LINE = /^\s*registrar:\s*(.+)$/im;
const EXPIRY_LINE =
  /^\s*(?:registry expiry date|registrar registration expiration date|expiration date|expiry date|expire date|paid-till|expires(?: on)?)\s*:\s*(.+)$/im;

export function normalizeDate(value: string): string | undefined {
  const iso = /(\d{4})[-./](\d{2})[-./](\d{2})/.exec(value);
  if (iso) {
    return `${iso[1]}-${iso[2]}-${iso[3]}`;
  }
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) return undefined;
  return new Date(ms).toISOString().slice(0, 10);
}

/**
 * Maps raw WHOIS text to an outcome. A "not found" marker wins over everything
 * else; after that only a `Domain Name:` record counts as registration.
 */
export function parseWhoisText(text: string): ProbeOutcome<WhoisTakenDetail> {
  const lower = text.toLowerCase();
  if (lower.includes('tld is not supported')) {
    return { status: 'error', message: 'TLD is not supported for whois' };
  }
  if (availablePatterns.some((p) => lower.includes(p))) {
    return { status: 'available' };
  }
  if (DOMAIN_LINE.test(text)) {
    const detail: WhoisTakenDetail = {};
    const expiry = EXPIRY_LINE.exec(text);
    const expirationDate = expiry ? normalizeDate(expiry[1].trim()) : undefined;
    if (expirationDate) detail.expirationDate = expirationDate;
    const registrar = REGISTRAR_LINE.exec(text)?.[1].trim();
    if (registrar) detail.registrar = registrar;
    return { status: 'taken', detail };
  }
  if (rateLimitPatterns.some((p) => lower.includes(p))) {
    return { status: 'error', message: 'WHOIS rate limit exceeded' };
  }
  return { status: 'available' };
}

export class WhoisLibAdapter extends BaseProbeAdapter<WhoisTakenDetail> {
  private readonly lookup: WhoisLookup;

  constructor(lookupFn: WhoisLookup = lookup, logger?: Logger) {
    super('whois.lib', logger);
    this.lookup = lookupFn;
  }

  protected async doCheck(fqdn: string, opts: ProbeOptions): Promise<ProbeOutcome<WhoisTakenDetail>> {
    const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    try {
      const text = await this.lookup(fqdn, timeoutMs);
      return parseWhoisText(text);
    } catch (err) {
      return { status: 'error', message: errorMessage(err) };
    }
  }
}
