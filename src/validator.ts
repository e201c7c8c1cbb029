import { parse } from 'tldts';
import { ValidationError } from './errors.js';
import type { BatchItem, DomainKey } from './types.js';
import { err, ok, type Result } from './utils/result.js';

export const DEFAULT_TLD = 'com';
const MAX_LABEL_LENGTH = 63;

const LABEL_PATTERN = /^[a-z0-9][a-z0-9-]*[a-z0-9]$/;
const TLD_PATTERN = /^[a-z]{2,}$/;

export function isValidLabel(label: string): boolean {
  return label.length <= MAX_LABEL_LENGTH && LABEL_PATTERN.test(label) && !label.includes('--');
}

export function isValidTld(tld: string): boolean {
  return TLD_PATTERN.test(tld);
}

function cleanTld(rawTld: string | undefined): string {
  const tld = (rawTld ?? '').trim().replace(/^\.+/, '').toLowerCase();
  return tld || DEFAULT_TLD;
}

/**
 * Normalizes a (label, tld) pair into a {@link DomainKey}.
 *
 * The label is the single name being checked: `foo.bar` is rejected rather than
 * split, and the TLD falls back to `com` when absent.
 */
export function validateDomain(rawLabel: string | undefined, rawTld?: string): Result<DomainKey, ValidationError> {
  const label = (rawLabel ?? '').trim().toLowerCase();
  if (!label) {
    return err(new ValidationError('MISSING_DOMAIN', 'Missing domain parameter'));
  }
  if (!isValidLabel(label)) {
    return err(new ValidationError('INVALID_DOMAIN_FORMAT', 'Invalid domain name format'));
  }
  const tld = cleanTld(rawTld);
  if (!isValidTld(tld)) {
    return err(new ValidationError('INVALID_TLD_FORMAT', 'Invalid TLD format'));
  }
  return ok(Object.freeze({ label, tld }));
}

export function fqdn(key: DomainKey): string {
  return `${key.label}.${key.tld}`;
}

/**
 * Splits a free-form `name.tld` argument at its public suffix. Input without a
 * known suffix comes back whole as the name, leaving the TLD to the default.
 */
export function splitDomainName(input: string): BatchItem {
  const domain = input.trim().toLowerCase();
  const { publicSuffix } = parse(domain, { extractHostname: false, validateHostname: false });
  if (publicSuffix && domain.endsWith(`.${publicSuffix}`)) {
    return { name: domain.slice(0, -(publicSuffix.length + 1)), tld: publicSuffix };
  }
  return { name: domain };
}
