import { describe, it, expect } from 'vitest';
import { formatValue } from '../format.js';

function namedHelper(): number {
  return 1;
}

describe('formatValue', () => {
  it('should render primitives directly', () => {
    expect(formatValue('text')).toBe('text');
    expect(formatValue(1.5)).toBe('1.5');
    expect(formatValue(true)).toBe('true');
    expect(formatValue(10n)).toBe('10n');
    expect(formatValue(undefined)).toBe('undefined');
    expect(formatValue(null)).toBe('null');
    expect(formatValue(Symbol('s'))).toBe('Symbol(s)');
  });

  it('should render functions by name', () => {
    expect(formatValue(namedHelper)).toBe('[Function namedHelper]');
  });

  it('should render errors as name and message', () => {
    expect(formatValue(new RangeError('out of range'))).toBe(
      'RangeError: out of range',
    );
  });

  it('should serialise objects with sorted keys', () => {
    expect(formatValue({ b: 1, a: 2 })).toBe('{"a":2,"b":1}');
    expect(formatValue([1, 'a', null])).toBe('[1,"a",null]');
  });

  it('should render maps as entry lists and sets as value lists', () => {
    expect(formatValue(new Map([['k', 1]]))).toBe('[["k",1]]');
    expect(formatValue(new Set([1, 2]))).toBe('[1,2]');
    expect(formatValue({ tags: new Set(['x']) })).toBe('{"tags":["x"]}');
  });

  it('should render nested bigints and errors', () => {
    expect(formatValue({ n: 2n })).toBe('{"n":"2n"}');
    expect(formatValue({ cause: new Error('boom') })).toBe(
      '{"cause":"Error: boom"}',
    );
  });

  it('should render regular expressions as literals', () => {
    expect(formatValue(/a/g)).toBe('/a/g');
    expect(formatValue({ re: /a+b/i })).toBe('{"re":"/a+b/i"}');
  });

  it('should mark circular references', () => {
    const node: Record<string, unknown> = { name: 'x' };
    node.self = node;

    expect(formatValue(node)).toBe('{"name":"x","self":"[Circular]"}');
  });
});
