/**
 * Value rendering for failure messages, built on safe-stable-stringify
 */

import { configure } from 'safe-stable-stringify';

const stringify = configure({
  deterministic: true,
  circularValue: '[Circular]',
  maximumDepth: 32,
});

function describeFunction(name: string): string {
  return `[Function ${name || 'anonymous'}]`;
}

function describeError(error: Error): string {
  return `${error.name}: ${error.message}`;
}

function toSerializable(_key: string, value: unknown): unknown {
  if (value instanceof Map) return [...value.entries()];
  if (value instanceof Set) return [...value.values()];
  if (value instanceof Error) return describeError(value);
  if (value instanceof RegExp) return String(value);
  if (typeof value === 'bigint') return `${value}n`;
  if (typeof value === 'symbol') return value.toString();
  if (typeof value === 'function') return describeFunction(value.name);
  return value;
}

/**
 * Renders a value for a human-readable failure message.
 *
 * Strings are returned as-is; objects are serialised as JSON with sorted keys,
 * `Map` as an entry list, `Set` as a value list, `RegExp` as its literal, and
 * circular references
 * as `"[Circular]"`.
 * @param value - Any value
 * @example
 * ```typescript
 * formatValue('text'); // 'text'
 * formatValue(10n); // '10n'
 * formatValue({ b: 1, a: 2 }); // '{"a":2,"b":1}'
 * formatValue(new Map([['k', 1]])); // '[["k",1]]'
 * ```
 * @public
 */
export function formatValue(value: unknown): string {
  switch (typeof value) {
    case 'string':
      return value;
    case 'undefined':
      return 'undefined';
    case 'bigint':
      return `${value}n`;
    case 'symbol':
      return value.toString();
    case 'function':
      return describeFunction(value.name);
    case 'number':
    case 'boolean':
      return String(value);
    default:
      if (value === null) return 'null';
      if (value instanceof Error) return describeError(value);
      if (value instanceof RegExp) return String(value);
      return stringify(value, toSerializable) ?? String(value);
  }
}
