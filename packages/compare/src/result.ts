import type { CompareError } from './errors.js';

/**
 * Outcome of a fallible comparison: either a value or the reason the operands
 * could not be compared.
 */
export type CompareResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: CompareError };

export function success<T>(value: T): CompareResult<T> {
  return { ok: true, value };
}

export function failure<T>(error: CompareError): CompareResult<T> {
  return { ok: false, error };
}
