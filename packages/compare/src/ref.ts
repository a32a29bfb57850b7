/**
 * Explicit reference cell used wherever a value needs pointer semantics.
 *
 * A `Ref` either points at a target or is a typed nil reference. Nilness and
 * emptiness checks see through it, and deep equality compares the targets.
 * @example
 * ```typescript
 * const answer = Ref.to(42);
 * const missing = Ref.nil<number>();
 *
 * isNil(missing); // true
 * isEmpty(Ref.to(0)); // true, same as isEmpty(0)
 * ```
 * @public
 */
export class Ref<T> {
  private constructor(private readonly target: T | null) {}

  public static to<T>(target: T): Ref<T> {
    return new Ref<T>(target);
  }

  public static nil<T>(): Ref<T> {
    return new Ref<T>(null);
  }

  public isNil(): boolean {
    return this.target === null;
  }

  /**
   * Returns the target, or `undefined` for a nil reference.
   */
  public deref(): T | undefined {
    return this.target === null ? undefined : this.target;
  }

  public toJSON(): { ref: T | null } {
    return { ref: this.target };
  }
}
