import { kindOf, lengthOf } from './kinds.js';
import { Ref } from './ref.js';

/**
 * Nilness check that also sees typed nil references.
 *
 * `null` and `undefined` are nil, and so are a `Ref` created with `Ref.nil()`
 * and a `WeakRef` whose target has been collected. Zero, empty strings, empty
 * containers and functions are not nil.
 * @param value - Any runtime value
 * @public
 */
export function isNil(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (value instanceof Ref) return value.isNil();
  if (value instanceof WeakRef) return value.deref() === undefined;
  return false;
}

/**
 * Emptiness check.
 *
 * - nil values are empty
 * - sequences, maps, sets and records are empty when they have no entries
 * - references are empty when nil, otherwise their target is checked
 * - everything else is empty when it equals the zero value of its type
 * @param value - Any runtime value
 * @public
 */
export function isEmpty(value: unknown): boolean {
  if (isNil(value)) return true;

  switch (kindOf(value)) {
    case 'sequence':
    case 'map':
    case 'set':
    case 'record':
      return lengthOf(value) === 0;
    case 'reference':
      return isEmpty(dereference(value));
    default:
      return isZeroValue(value);
  }
}

/**
 * Reports whether a value equals the zero value of its type: `0`, `0n`, `''`,
 * `false`, the epoch `Date`, an empty `RegExp`, a nil reference, an empty
 * container, or a class instance whose own fields are all zero. An error also
 * needs an empty message. Functions, symbols and opaque values never are.
 * Private `#` fields are not visible and are ignored.
 * @param value - Any runtime value
 * @public
 */
export function isZeroValue(value: unknown): boolean {
  switch (kindOf(value)) {
    case 'nil':
      return true;
    case 'boolean':
      return value === false;
    case 'number':
      return value === 0;
    case 'bigint':
      return value === 0n;
    case 'string':
      return value === '';
    case 'sequence':
    case 'map':
    case 'set':
    case 'record':
      return lengthOf(value) === 0;
    case 'reference':
      return isNil(value);
    case 'date':
      return value instanceof Date && value.getTime() === 0;
    case 'regexp':
      return (
        value instanceof RegExp &&
        value.source === new RegExp('').source &&
        value.flags === ''
      );
    case 'struct':
      if (typeof value !== 'object' || value === null) return false;
      // message is not enumerable; deepEqual compares it for errors
      if (value instanceof Error && value.message !== '') return false;
      return Object.keys(value).every((key) =>
        isZeroValue(Reflect.get(value, key)),
      );
    case 'symbol':
    case 'function':
    case 'opaque':
      return false;
  }
}

function dereference(value: unknown): unknown {
  if (value instanceof Ref || value instanceof WeakRef) {
    return value.deref();
  }
  return undefined;
}
