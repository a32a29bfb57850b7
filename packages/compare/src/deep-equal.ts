import { isSequence, kindOf, type Sequence } from './kinds.js';
import { Ref } from './ref.js';

/**
 * Object pairs currently under comparison. A pair met again while still in
 * progress is part of a cycle and is treated as equal.
 */
type InProgress = Map<object, Set<object>>;

/**
 * Structural, recursive equality shared by every engine operation.
 *
 * Values of different kinds are never equal (`1` vs `1n`, `[]` vs `{}`).
 * Numbers use SameValueZero (`NaN` equals `NaN`, `0` equals `-0`); functions,
 * symbols and opaque values compare by identity; containers, records and
 * class instances compare by prototype and contents; references compare their
 * targets.
 * @param a - First value
 * @param b - Second value
 * @returns true when both values have the same type, shape and contents
 * @example
 * ```typescript
 * deepEqual({ a: [1, 2] }, { a: [1, 2] }); // true
 * deepEqual(new Set([1, 2]), new Set([2, 1])); // true
 * deepEqual(1, 1n); // false
 * ```
 * @public
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  return equalValues(a, b, new Map());
}

function equalValues(a: unknown, b: unknown, inProgress: InProgress): boolean {
  if (a === b) return true;

  const kind = kindOf(a);
  if (kind !== kindOf(b)) return false;

  if (typeof a === 'number' && typeof b === 'number') {
    return Number.isNaN(a) && Number.isNaN(b);
  }
  if (
    typeof a !== 'object' ||
    a === null ||
    typeof b !== 'object' ||
    b === null
  ) {
    return false;
  }

  if (isInProgress(a, b, inProgress)) return true;
  markInProgress(a, b, inProgress);
  try {
    switch (kind) {
      case 'sequence':
        return equalSequences(a, b, inProgress);
      case 'map':
        return (
          a instanceof Map && b instanceof Map && equalMaps(a, b, inProgress)
        );
      case 'set':
        return (
          a instanceof Set && b instanceof Set && equalSets(a, b, inProgress)
        );
      case 'reference':
        return equalReferences(a, b, inProgress);
      case 'date':
        return (
          a instanceof Date &&
          b instanceof Date &&
          equalValues(a.getTime(), b.getTime(), inProgress)
        );
      case 'regexp':
        return (
          a instanceof RegExp &&
          b instanceof RegExp &&
          a.source === b.source &&
          a.flags === b.flags
        );
      case 'record':
      case 'struct':
        return equalObjects(a, b, inProgress);
      default:
        return false;
    }
  } finally {
    unmarkInProgress(a, b, inProgress);
  }
}

function isInProgress(a: object, b: object, inProgress: InProgress): boolean {
  return inProgress.get(a)?.has(b) ?? false;
}

function markInProgress(a: object, b: object, inProgress: InProgress): void {
  const partners = inProgress.get(a);
  if (partners) {
    partners.add(b);
  } else {
    inProgress.set(a, new Set([b]));
  }
}

function unmarkInProgress(a: object, b: object, inProgress: InProgress): void {
  const partners = inProgress.get(a);
  if (!partners) return;
  partners.delete(b);
  if (partners.size === 0) inProgress.delete(a);
}

function equalSequences(a: object, b: object, inProgress: InProgress): boolean {
  if (!isSequence(a) || !isSequence(b)) return false;
  if (Object.getPrototypeOf(a) !== Object.getPrototypeOf(b)) return false;
  return equalElements(a, b, inProgress);
}

function equalElements(
  a: Sequence,
  b: Sequence,
  inProgress: InProgress,
): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (!equalValues(a[i], b[i], inProgress)) return false;
  }
  return true;
}

function equalMaps(
  a: Map<unknown, unknown>,
  b: Map<unknown, unknown>,
  inProgress: InProgress,
): boolean {
  if (a.size !== b.size) return false;

  const remaining = new Map(b);
  for (const [key, value] of a) {
    if (remaining.has(key)) {
      if (!equalValues(value, remaining.get(key), inProgress)) return false;
      remaining.delete(key);
      continue;
    }

    let matched = false;
    for (const [otherKey, otherValue] of remaining) {
      if (
        equalValues(key, otherKey, inProgress) &&
        equalValues(value, otherValue, inProgress)
      ) {
        remaining.delete(otherKey);
        matched = true;
        break;
      }
    }
    if (!matched) return false;
  }
  return true;
}

function equalSets(
  a: Set<unknown>,
  b: Set<unknown>,
  inProgress: InProgress,
): boolean {
  if (a.size !== b.size) return false;

  const remaining = Array.from(b);
  for (const value of a) {
    const index = remaining.findIndex((other) =>
      equalValues(value, other, inProgress),
    );
    if (index === -1) return false;
    remaining.splice(index, 1);
  }
  return true;
}

function equalReferences(
  a: object,
  b: object,
  inProgress: InProgress,
): boolean {
  if (a instanceof Ref && b instanceof Ref) {
    if (a.isNil() || b.isNil()) return a.isNil() && b.isNil();
    return equalValues(a.deref(), b.deref(), inProgress);
  }
  if (a instanceof WeakRef && b instanceof WeakRef) {
    return a.deref() === b.deref();
  }
  return false;
}

function equalObjects(a: object, b: object, inProgress: InProgress): boolean {
  if (Object.getPrototypeOf(a) !== Object.getPrototypeOf(b)) return false;

  if (a instanceof Error && b instanceof Error) {
    if (a.name !== b.name || a.message !== b.message) return false;
  }

  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;

  for (const key of keys) {
    if (!Object.prototype.hasOwnProperty.call(b, key)) return false;
    const left: unknown = Reflect.get(a, key);
    const right: unknown = Reflect.get(b, key);
    if (!equalValues(left, right, inProgress)) return false;
  }
  return true;
}
