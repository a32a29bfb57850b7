import { deepEqual } from './deep-equal.js';
import { CompareError } from './errors.js';
import {
  describeType,
  isHashableKind,
  isSequence,
  kindOf,
  type Sequence,
} from './kinds.js';
import { failure, success, type CompareResult } from './result.js';

/**
 * Membership test over strings, sequences, sets, maps and records.
 *
 * - string: `item` must be a string (`TYPE_MISMATCH` otherwise); substring search
 * - sequence or set: linear scan with {@link deepEqual}
 * - map: key presence, falling back to a deep-equal scan of the keys
 * - record: own enumerable key presence
 * - anything else: `UNSUPPORTED_TYPE`
 * @param container - Value searched
 * @param item - Element, key or substring looked for
 * @public
 */
export function contains(
  container: unknown,
  item: unknown,
): CompareResult<boolean> {
  if (typeof container === 'string') {
    if (typeof item !== 'string') {
      return failure(
        CompareError.typeMismatch(
          `item must be a string when container is a string, got ${describeType(item)}`,
        ),
      );
    }
    return success(container.includes(item));
  }

  if (isSequence(container) || container instanceof Set) {
    return success(includesDeep(container, item));
  }
  if (container instanceof Map) {
    return success(findMapEntry(container, item) !== undefined);
  }
  if (
    kindOf(container) === 'record' &&
    typeof container === 'object' &&
    container !== null
  ) {
    return success(hasRecordKey(container, item));
  }

  return failure(
    CompareError.unsupportedType(
      `unsupported container type: ${describeType(container)}`,
    ),
  );
}

/**
 * Checks that every member of `candidate` is found in `superset`.
 *
 * For sequences and sets each element only has to exist somewhere in the
 * superset: duplicates in the candidate are not counted (use
 * {@link sameElements} for multiset semantics). For maps and records every
 * key of the candidate must be present in the superset with a deep-equal
 * value.
 * @param superset - Containing collection
 * @param candidate - Collection expected to be contained
 * @public
 */
export function subset(
  superset: unknown,
  candidate: unknown,
): CompareResult<boolean> {
  const kind = kindOf(superset);

  if (isSequence(superset) || superset instanceof Set) {
    if (!isSequence(candidate) && !(candidate instanceof Set)) {
      return failure(
        CompareError.typeMismatch(
          `subset must be a sequence or set when superset is a ${kind}, got ${describeType(candidate)}`,
        ),
      );
    }
    for (const element of candidate) {
      if (!includesDeep(superset, element)) return success(false);
    }
    return success(true);
  }

  if (superset instanceof Map) {
    if (!(candidate instanceof Map)) {
      return failure(
        CompareError.typeMismatch(
          `subset must be a Map when superset is a Map, got ${describeType(candidate)}`,
        ),
      );
    }
    for (const [key, value] of candidate) {
      const entry = findMapEntry(superset, key);
      if (!entry || !deepEqual(entry[1], value)) return success(false);
    }
    return success(true);
  }

  if (kind === 'record' && typeof superset === 'object' && superset !== null) {
    if (
      kindOf(candidate) !== 'record' ||
      typeof candidate !== 'object' ||
      candidate === null
    ) {
      return failure(
        CompareError.typeMismatch(
          `subset must be a plain object when superset is a plain object, got ${describeType(candidate)}`,
        ),
      );
    }
    for (const key of Object.keys(candidate)) {
      if (
        !Object.prototype.hasOwnProperty.call(superset, key) ||
        !deepEqual(Reflect.get(superset, key), Reflect.get(candidate, key))
      ) {
        return success(false);
      }
    }
    return success(true);
  }

  return failure(
    CompareError.unsupportedType(
      `unsupported type for subset: ${describeType(superset)}`,
    ),
  );
}

/**
 * Multiset equality of two sequences: same elements with the same number of
 * occurrences, in any order.
 *
 * Both arguments must be sequences (`UNSUPPORTED_TYPE` naming the offending
 * argument). Sequences of different length are unequal. Elements that cannot
 * act as a distinguishing key (nested sequences, maps, sets, records, class
 * instances, dates, regexps) yield `UNHASHABLE` instead of a silent `false`.
 * @param a - First sequence
 * @param b - Second sequence
 * @public
 */
export function sameElements(a: unknown, b: unknown): CompareResult<boolean> {
  if (!isSequence(a)) {
    return failure(
      CompareError.unsupportedType(
        `first argument must be an array, got ${describeType(a)}`,
      ),
    );
  }
  if (!isSequence(b)) {
    return failure(
      CompareError.unsupportedType(
        `second argument must be an array, got ${describeType(b)}`,
      ),
    );
  }
  if (a.length !== b.length) return success(false);

  for (const element of [...Array.from(a), ...Array.from(b)]) {
    if (!isHashableKind(kindOf(element))) {
      return failure(CompareError.unhashable(describeType(element)));
    }
  }

  return success(sameOccurrences(a, b));
}

/**
 * Multiset equality under {@link deepEqual} for any element kind, including
 * nested arrays and records that {@link sameElements} rejects as unhashable.
 * @param a - First sequence
 * @param b - Second sequence
 * @public
 */
export function elementsMatch(a: unknown, b: unknown): CompareResult<boolean> {
  if (!isSequence(a) || !isSequence(b)) {
    return failure(
      CompareError.unsupportedType(
        `element lists must be arrays, got ${describeType(a)} and ${describeType(b)}`,
      ),
    );
  }
  if (a.length !== b.length) return success(false);
  return success(sameOccurrences(a, b));
}

function sameOccurrences(a: Sequence, b: Sequence): boolean {
  const counts = countOccurrences(a);
  const otherCounts = countOccurrences(b);
  if (counts.length !== otherCounts.length) return false;

  for (const { element, count } of counts) {
    const match = otherCounts.find((entry) => deepEqual(entry.element, element));
    if (!match || match.count !== count) return false;
  }
  return true;
}

interface Occurrence {
  element: unknown;
  count: number;
}

function countOccurrences(values: Sequence): Occurrence[] {
  const occurrences: Occurrence[] = [];
  for (const element of Array.from(values)) {
    const existing = occurrences.find((entry) =>
      deepEqual(entry.element, element),
    );
    if (existing) {
      existing.count++;
    } else {
      occurrences.push({ element, count: 1 });
    }
  }
  return occurrences;
}

function includesDeep(values: Iterable<unknown>, item: unknown): boolean {
  for (const value of values) {
    if (deepEqual(value, item)) return true;
  }
  return false;
}

function findMapEntry(
  map: Map<unknown, unknown>,
  key: unknown,
): [unknown, unknown] | undefined {
  if (map.has(key)) return [key, map.get(key)];
  for (const entry of map) {
    if (deepEqual(entry[0], key)) return entry;
  }
  return undefined;
}

function hasRecordKey(record: object, key: unknown): boolean {
  if (
    typeof key !== 'string' &&
    typeof key !== 'number' &&
    typeof key !== 'symbol'
  ) {
    return false;
  }
  return Object.prototype.propertyIsEnumerable.call(record, key);
}
