import type { Logger, Probe, ProbeOptions, ProbeOutcome, ProbeSource } from '../types.js';
import { noopLogger } from '../logging/defaultLogger.js';

export abstract class BaseProbeAdapter<D> implements Probe<D> {
  public readonly namespace: ProbeSource;
  protected readonly logger: Logger;

  constructor(namespace: ProbeSource, logger: Logger = noopLogger) {
    if (!namespace) {
      throw new Error('BaseProbeAdapter requires a namespace');
    }
    this.namespace = namespace;
    this.logger = logger;
  }

  async check(fqdn: string, opts: ProbeOptions = {}): Promise<ProbeOutcome<D>> {
    const start = Date.now();
    const res = await this.doCheck(fqdn, opts);
    this.logger.debug(`${this.namespace}.done`, { domain: fqdn, status: res.status, latency: Date.now() - start });
    return res;
  }

  protected abstract doCheck(fqdn: string, opts: ProbeOptions): Promise<ProbeOutcome<D>>;
}
