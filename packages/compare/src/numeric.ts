import { CompareError } from './errors.js';
import { describeType } from './kinds.js';
import { failure, success, type CompareResult } from './result.js';

/**
 * Absolute difference under which two coerced numbers compare as equal.
 * Absorbs binary floating point representation error only; it is not a
 * tolerance setting (see {@link withinDelta} and {@link withinEpsilon}).
 */
export const NUMERIC_COMPARE_EPSILON = 1e-9;

export type Ordering = -1 | 0 | 1;

export interface DeltaComparison {
  within: boolean;
  /** Signed `expected - actual`. */
  diff: number;
}

export interface EpsilonComparison {
  within: boolean;
  /** `|expected - actual|` relative to the mean magnitude of both values. */
  relativeDiff: number;
}

/**
 * Coerces a numeric runtime value (`number` or `bigint`) to a `number`.
 * @param value - Value to coerce
 * @returns The number, or an `UNSUPPORTED_TYPE` error naming the runtime type
 * @public
 */
export function toNumber(value: unknown): CompareResult<number> {
  if (typeof value === 'number') return success(value);
  if (typeof value === 'bigint') return success(Number(value));
  return failure(
    CompareError.unsupportedType(
      `unsupported type for numeric comparison: ${describeType(value)}`,
    ),
  );
}

/**
 * Three-way numeric comparison with a fixed {@link NUMERIC_COMPARE_EPSILON}.
 * @param a - Left operand
 * @param b - Right operand
 * @returns -1, 0 or 1; or an error naming both operand types when either is
 * not numeric
 * @public
 */
export function compareNumeric(a: unknown, b: unknown): CompareResult<Ordering> {
  const left = toNumber(a);
  const right = toNumber(b);
  if (!left.ok || !right.ok) {
    return failure(
      CompareError.unsupportedType(
        `unsupported numeric types: ${describeType(a)} vs ${describeType(b)}`,
      ),
    );
  }

  if (left.value === right.value) return success<Ordering>(0);
  const diff = left.value - right.value;
  if (Math.abs(diff) < NUMERIC_COMPARE_EPSILON) return success<Ordering>(0);
  return success<Ordering>(diff > 0 ? 1 : -1);
}

/**
 * Checks that two numeric values lie within an absolute `delta` of each other.
 * @param expected - Reference value
 * @param actual - Observed value
 * @param delta - Largest accepted absolute difference
 * @public
 */
export function withinDelta(
  expected: unknown,
  actual: unknown,
  delta: number,
): CompareResult<DeltaComparison> {
  const operands = coerceOperands(expected, actual);
  if (!operands.ok) return operands;

  const [a, b] = operands.value;
  const diff = a - b;
  return success({ within: Math.abs(diff) <= delta, diff });
}

/**
 * Checks that two numeric values differ by at most `epsilon` relative to
 * their mean magnitude. Identical values always pass, which also covers two
 * zeros.
 * @param expected - Reference value
 * @param actual - Observed value
 * @param epsilon - Largest accepted relative difference, e.g. `0.01` for 1%
 * @public
 */
export function withinEpsilon(
  expected: unknown,
  actual: unknown,
  epsilon: number,
): CompareResult<EpsilonComparison> {
  const operands = coerceOperands(expected, actual);
  if (!operands.ok) return operands;

  const [a, b] = operands.value;
  if (a === b) return success({ within: true, relativeDiff: 0 });

  const mean = Math.abs(a + b) / 2;
  const relativeDiff = Math.abs(a - b) / mean;
  return success({ within: relativeDiff <= epsilon, relativeDiff });
}

function coerceOperands(
  expected: unknown,
  actual: unknown,
): CompareResult<[number, number]> {
  const a = toNumber(expected);
  if (!a.ok) {
    return failure(
      CompareError.unsupportedType(
        `expected value is not numeric: ${a.error.message}`,
      ),
    );
  }
  const b = toNumber(actual);
  if (!b.ok) {
    return failure(
      CompareError.unsupportedType(
        `actual value is not numeric: ${b.error.message}`,
      ),
    );
  }
  return success<[number, number]>([a.value, b.value]);
}
