import { promises as dns } from 'node:dns';
import type { DnsTakenDetail, Logger, ProbeOptions, ProbeOutcome } from '../types.js';
import { errorMessage } from '../errors.js';
import { BaseProbeAdapter } from './baseAdapter.js';

const DEFAULT_TIMEOUT_MS = 3000;

/** Resolves A records for a name; rejects with the resolver's error code. */
export type HostLookup = (hostname: string, opts: ProbeOptions) => Promise<string[]>;

const NOT_FOUND_CODES = new Set(['ENOTFOUND', 'ENODATA']);

const systemLookup: HostLookup = async (hostname, opts) => {
  const resolver = new dns.Resolver({ timeout: opts.timeoutMs ?? DEFAULT_TIMEOUT_MS, tries: 1 });
  const onAbort = () => resolver.cancel();
  opts.signal?.addEventListener('abort', onAbort, { once: true });
  try {
    return await resolver.resolve4(hostname);
  } finally {
    opts.signal?.removeEventListener('abort', onAbort);
  }
};

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Resolves the name through the host's configured DNS servers. An address means
 * the domain is in use; a name the resolver cannot find maps to available.
 */
export class HostAdapter extends BaseProbeAdapter<DnsTakenDetail> {
  private readonly lookup: HostLookup;

  constructor(lookup: HostLookup = systemLookup, logger?: Logger) {
    super('dns.host', logger);
    this.lookup = lookup;
  }

  protected async doCheck(fqdn: string, opts: ProbeOptions): Promise<ProbeOutcome<DnsTakenDetail>> {
    try {
      const [address] = await this.lookup(fqdn, opts);
      if (!address) return { status: 'available' };
      return { status: 'taken', detail: { address } };
    } catch (err) {
      const code = errorCode(err);
      if (code && NOT_FOUND_CODES.has(code)) {
        return { status: 'available' };
      }
      return { status: 'error', message: errorMessage(err) };
    }
  }
}
