import { Ref } from './ref.js';

/**
 * Sealed classification of runtime values used for every dispatch in the
 * comparison engine.
 *
 * - `nil`: `null` and `undefined`
 * - `sequence`: arrays and typed arrays
 * - `map`: `Map` instances
 * - `set`: `Set` instances
 * - `record`: plain objects (prototype `Object.prototype` or `null`)
 * - `struct`: every other object with a prototype of its own (class instances, errors)
 * - `reference`: {@link Ref} and `WeakRef`
 * - `opaque`: `Promise`, `WeakMap`, `WeakSet`; only identity is observable
 * @public
 */
export type ValueKind =
  | 'nil'
  | 'boolean'
  | 'number'
  | 'bigint'
  | 'string'
  | 'symbol'
  | 'function'
  | 'sequence'
  | 'map'
  | 'set'
  | 'record'
  | 'struct'
  | 'reference'
  | 'date'
  | 'regexp'
  | 'opaque';

/**
 * Ordered collection viewed element by element.
 * @public
 */
export type Sequence = ArrayLike<unknown> & Iterable<unknown>;

/**
 * Kinds whose values can serve as a distinguishing key when counting
 * occurrences.
 * @internal
 */
const HASHABLE_KINDS: ReadonlySet<ValueKind> = new Set<ValueKind>([
  'nil',
  'boolean',
  'number',
  'bigint',
  'string',
  'symbol',
  'function',
  'reference',
  'opaque',
]);

function isTypedArray(value: object): value is ArrayBufferView & Sequence {
  return ArrayBuffer.isView(value) && !(value instanceof DataView);
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Classifies a value into its {@link ValueKind}.
 * @param value - Any runtime value
 * @public
 */
export function kindOf(value: unknown): ValueKind {
  switch (typeof value) {
    case 'undefined':
      return 'nil';
    case 'boolean':
      return 'boolean';
    case 'number':
      return 'number';
    case 'bigint':
      return 'bigint';
    case 'string':
      return 'string';
    case 'symbol':
      return 'symbol';
    case 'function':
      return 'function';
    case 'object':
      return value === null ? 'nil' : objectKindOf(value);
  }
}

function objectKindOf(value: object): ValueKind {
  if (Array.isArray(value) || isTypedArray(value)) return 'sequence';
  if (value instanceof Map) return 'map';
  if (value instanceof Set) return 'set';
  if (value instanceof Ref || value instanceof WeakRef) return 'reference';
  if (value instanceof Date) return 'date';
  if (value instanceof RegExp) return 'regexp';
  if (
    value instanceof Promise ||
    value instanceof WeakMap ||
    value instanceof WeakSet
  ) {
    return 'opaque';
  }
  return isPlainObject(value) ? 'record' : 'struct';
}

/**
 * Narrows a value to an ordered sequence (array or typed array).
 * @public
 */
export function isSequence(value: unknown): value is Sequence {
  return kindOf(value) === 'sequence';
}

/**
 * @public
 */
export function isHashableKind(kind: ValueKind): boolean {
  return HASHABLE_KINDS.has(kind);
}

/**
 * Length of strings, sequences, maps, sets and records (own enumerable keys).
 * Returns `undefined` for every other kind.
 * @public
 */
export function lengthOf(value: unknown): number | undefined {
  if (typeof value === 'string') return value.length;
  if (value instanceof Map || value instanceof Set) return value.size;
  if (isSequence(value)) return value.length;
  if (typeof value === 'object' && value !== null && isPlainObject(value)) {
    return Object.keys(value).length;
  }
  return undefined;
}

/**
 * Human readable runtime type label for messages, e.g. `number`, `Array`,
 * `Map`, `Ref` or a class name.
 * @param value - Any runtime value
 * @public
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value !== 'object') return typeof value;

  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null) return 'Object';

  const ctor: unknown = Reflect.get(value, 'constructor');
  if (typeof ctor === 'function' && ctor.name.length > 0) {
    return ctor.name;
  }
  return Object.prototype.toString.call(value).slice(8, -1);
}
