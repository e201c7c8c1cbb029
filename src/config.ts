import { ConfigError } from './errors.js';
import type { CheckerOptions } from './types.js';

type EnvConfig = Pick<CheckerOptions, 'whoisTimeoutMs' | 'dnsTimeoutMs' | 'cacheTtlMs' | 'maxBatchItems'>;

const ENV_KEYS = [
  ['whoisTimeoutMs', 'DOMAINPROBE_WHOIS_TIMEOUT'],
  ['dnsTimeoutMs', 'DOMAINPROBE_DNS_TIMEOUT'],
  ['cacheTtlMs', 'DOMAINPROBE_CACHE_TTL'],
  ['maxBatchItems', 'DOMAINPROBE_MAX_BATCH'],
] as const satisfies ReadonlyArray<readonly [keyof EnvConfig, string]>;

export function parsePositiveInt(name: string, raw: string): number {
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} expects a positive integer, received '${raw}'`);
  }
  return value;
}

/**
 * Reads checker settings from the environment. Unset or empty variables are left
 * out so library defaults apply.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const config: EnvConfig = {};
  for (const [field, name] of ENV_KEYS) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') continue;
    config[field] = parsePositiveInt(name, raw);
  }
  return config;
}
