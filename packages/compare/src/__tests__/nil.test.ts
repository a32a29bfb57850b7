import { describe, it, expect } from 'vitest';
import { isEmpty, isNil, isZeroValue } from '../nil.js';
import { Ref } from '../ref.js';

class Empty {}

class Counter {
  public count = 0;
  public label = '';
}

describe('isNil', () => {
  it('should report null and undefined as nil', () => {
    expect(isNil(null)).toBe(true);
    expect(isNil(undefined)).toBe(true);
  });

  it('should detect a typed nil reference', () => {
    expect(isNil(Ref.nil<number>())).toBe(true);
    expect(isNil(Ref.to(5))).toBe(false);
  });

  it('should never report non-nil scalars or containers as nil', () => {
    for (const value of [0, '', false, 5, 0n, [], {}, new Map(), () => 1]) {
      expect(isNil(value)).toBe(false);
    }
  });
});

describe('isEmpty', () => {
  it.each([
    [null, true],
    [undefined, true],
    [0, true],
    ['', true],
    [[], true],
    [{}, true],
    [new Map(), true],
    [new Set(), true],
    [false, true],
    [0.0, true],
    [0n, true],
    [new Empty(), true],
    [Ref.nil<number>(), true],
    [1, false],
    ['hello', false],
    [[1, 2], false],
    [{ a: 1 }, false],
    [new Map([['a', 1]]), false],
    [true, false],
  ])('should report %s as empty=%s', (value, expected) => {
    expect(isEmpty(value)).toBe(expected);
  });

  it('should look through non-nil references', () => {
    expect(isEmpty(Ref.to(0))).toBe(isEmpty(0));
    expect(isEmpty(Ref.to(1))).toBe(isEmpty(1));
    expect(isEmpty(Ref.to([]))).toBe(true);
    expect(isEmpty(Ref.to('x'))).toBe(false);
  });

  it('should treat class instances with only zero fields as empty', () => {
    const counter = new Counter();
    expect(isEmpty(counter)).toBe(true);
    counter.count = 3;
    expect(isEmpty(counter)).toBe(false);
  });

  it('should not treat an error with a message as empty', () => {
    expect(isEmpty(new Error('boom'))).toBe(false);
    expect(isEmpty(new Error(''))).toBe(true);
  });

  it('should never treat functions as empty', () => {
    expect(isEmpty(() => undefined)).toBe(false);
  });
});

describe('isZeroValue', () => {
  it('should recognise zero values of each kind', () => {
    expect(isZeroValue(0)).toBe(true);
    expect(isZeroValue('')).toBe(true);
    expect(isZeroValue(new Date(0))).toBe(true);
    expect(isZeroValue(new RegExp(''))).toBe(true);
    expect(isZeroValue(Ref.nil())).toBe(true);
  });

  it('should not treat non-nil references as zero even when the target is', () => {
    expect(isZeroValue(Ref.to(0))).toBe(false);
  });

  it('should reject non-zero values', () => {
    expect(isZeroValue(1)).toBe(false);
    expect(isZeroValue(new Date(5))).toBe(false);
    expect(isZeroValue(/a/)).toBe(false);
    expect(isZeroValue(Symbol('s'))).toBe(false);
  });

  it('should require an empty message for an error to be zero', () => {
    expect(isZeroValue(new Error('boom'))).toBe(false);
    expect(isZeroValue(new TypeError('bad input'))).toBe(false);
    expect(isZeroValue(new Error(''))).toBe(true);
  });
});
