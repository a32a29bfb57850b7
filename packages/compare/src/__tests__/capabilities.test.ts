import { describe, it, expect } from 'vitest';
import {
  defineCapability,
  implementsCapability,
  sameType,
} from '../capabilities.js';
import { Ref } from '../ref.js';

interface Closer {
  close(): void;
  readonly closed: boolean;
}

const CloserCapability = defineCapability<Closer>('Closer', {
  close: 'method',
  closed: 'property',
});

class FileHandle implements Closer {
  public closed = false;

  public close(): void {
    this.closed = true;
  }
}

class Animal {}
class Dog extends Animal {}

describe('implementsCapability', () => {
  it('should accept values providing every member, including inherited methods', () => {
    expect(implementsCapability(CloserCapability, new FileHandle())).toBe(true);
    expect(
      implementsCapability(CloserCapability, {
        close: () => undefined,
        closed: true,
      }),
    ).toBe(true);
  });

  it('should reject values missing a member', () => {
    expect(implementsCapability(CloserCapability, { closed: false })).toBe(
      false,
    );
  });

  it('should reject a method member that is not callable', () => {
    expect(
      implementsCapability(CloserCapability, { close: 1, closed: false }),
    ).toBe(false);
  });

  it('should never accept nil', () => {
    expect(implementsCapability(CloserCapability, null)).toBe(false);
    expect(implementsCapability(CloserCapability, undefined)).toBe(false);
  });

  it('should check primitives through their wrapper objects', () => {
    const Uppercaser = defineCapability<{ toUpperCase(): string }>(
      'Uppercaser',
      { toUpperCase: 'method' },
    );
    expect(implementsCapability(Uppercaser, 'text')).toBe(true);
    expect(implementsCapability(Uppercaser, 42)).toBe(false);
  });
});

describe('sameType', () => {
  it('should distinguish number from bigint with equal value', () => {
    expect(sameType(1, 1n)).toBe(false);
    expect(sameType(1, 2.5)).toBe(true);
  });

  it('should compare prototypes of objects', () => {
    expect(sameType(new Dog(), new Dog())).toBe(true);
    expect(sameType(new Dog(), new Animal())).toBe(false);
    expect(sameType([], [1, 2])).toBe(true);
    expect(sameType([], {})).toBe(false);
    expect(sameType(new Int8Array(1), new Int16Array(1))).toBe(false);
    expect(sameType(Ref.to(1), Ref.nil())).toBe(true);
  });

  it('should only match null with null', () => {
    expect(sameType(null, null)).toBe(true);
    expect(sameType(null, {})).toBe(false);
    expect(sameType(null, undefined)).toBe(false);
  });
});
