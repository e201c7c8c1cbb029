import type { BatchError } from './types.js';

export type ValidationErrorCode = 'MISSING_DOMAIN' | 'INVALID_DOMAIN_FORMAT' | 'INVALID_TLD_FORMAT';
export type BatchRejectionCode = 'TOO_MANY_ITEMS' | 'NO_VALID_ITEMS';
export type DomainCheckErrorCode = ValidationErrorCode | BatchRejectionCode;

/**
 * Caller mistakes. Reported synchronously, never retried and never cached.
 */
export class DomainCheckError extends Error {
  readonly code: DomainCheckErrorCode;

  constructor(code: DomainCheckErrorCode, message: string) {
    super(message);
    this.name = 'DomainCheckError';
    this.code = code;
  }
}

export class ValidationError extends DomainCheckError {
  declare readonly code: ValidationErrorCode;

  constructor(code: ValidationErrorCode, message: string) {
    super(code, message);
    this.name = 'ValidationError';
  }
}

export class BatchRejectedError extends DomainCheckError {
  declare readonly code: BatchRejectionCode;
  /** Per-item errors collected before the batch was rejected. */
  readonly errors: BatchError[];

  constructor(code: BatchRejectionCode, message: string, errors: BatchError[] = []) {
    super(code, message);
    this.name = 'BatchRejectedError';
    this.errors = errors;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}

export function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer, received ${value}`);
  }
}
