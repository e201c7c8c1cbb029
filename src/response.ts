import { DomainCheckError } from './errors.js';
import type { BatchError, BatchOutcome, DnsOutcome, DomainStatus, Verdict, WhoisOutcome } from './types.js';

export type OutcomeBody =
  | { status: 'available' }
  | { status: 'taken'; expiration_date: string | null; registrar: string | null }
  | { status: 'taken'; ip: string }
  | { status: 'error'; error: string }
  | { status: 'timeout' };

export interface VerdictBody {
  domain: string;
  status: DomainStatus;
  whois: OutcomeBody;
  dns: OutcomeBody;
  tld: string;
  /** Seconds with two decimals, e.g. "0.45s". */
  response_time: string;
  cached: boolean;
}

export interface BatchBody {
  results: VerdictBody[];
  errors: BatchError[] | null;
}

export interface ErrorBody {
  error: string;
  message: string;
}

export interface ItemErrorBody extends ErrorBody {
  input: string;
}

function whoisBody(outcome: WhoisOutcome): OutcomeBody {
  switch (outcome.status) {
    case 'taken':
      return {
        status: 'taken',
        expiration_date: outcome.detail.expirationDate ?? null,
        registrar: outcome.detail.registrar ?? null,
      };
    case 'error':
      return { status: 'error', error: outcome.message };
    case 'timeout':
      return { status: 'timeout' };
    default:
      return { status: 'available' };
  }
}

function dnsBody(outcome: DnsOutcome): OutcomeBody {
  switch (outcome.status) {
    case 'taken':
      return { status: 'taken', ip: outcome.detail.address };
    case 'error':
      return { status: 'error', error: outcome.message };
    case 'timeout':
      return { status: 'timeout' };
    default:
      return { status: 'available' };
  }
}

export function formatResponseTime(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

export function toVerdictBody(verdict: Verdict): VerdictBody {
  return {
    domain: verdict.domain,
    status: verdict.status,
    whois: whoisBody(verdict.whois),
    dns: dnsBody(verdict.dns),
    tld: verdict.tld,
    response_time: formatResponseTime(verdict.responseTime),
    cached: verdict.fromCache,
  };
}

export function toBatchBody(outcome: BatchOutcome): BatchBody {
  return {
    results: outcome.results.map(toVerdictBody),
    errors: outcome.errors.length ? outcome.errors : null,
  };
}

/**
 * Input errors become a 400 carrying the machine-readable code; anything else is
 * a 500 that does not leak the underlying message.
 */
export function toErrorBody(err: unknown): { status: number; body: ErrorBody } {
  if (err instanceof DomainCheckError) {
    return { status: 400, body: { error: err.code, message: err.message } };
  }
  return { status: 500, body: { error: 'INTERNAL_ERROR', message: 'Internal server error' } };
}

/** A single rejected item, in the `{ error, message }` shape of `toErrorBody`. */
export function toItemErrorBody(error: BatchError): ItemErrorBody {
  return { input: error.input, error: error.code, message: error.reason };
}
