/**
 * How a capability member must be present on a value.
 * - `method`: reachable (own or inherited) and callable
 * - `property`: reachable with the `in` operator
 * @public
 */
export type MemberRequirement = 'method' | 'property';

/**
 * Runtime description of a TypeScript interface: every key of `T` is listed
 * with its requirement, so the compiler rejects a capability that forgets a
 * member.
 * @public
 */
export interface Capability<T> {
  readonly name: string;
  readonly members: { readonly [K in keyof T]-?: MemberRequirement };
}

/**
 * Declares a capability set for interface-style checks.
 * @param name - Label used in failure messages
 * @param members - Requirement for every member of `T`
 * @example
 * ```typescript
 * interface Closer {
 *   close(): void;
 *   readonly closed: boolean;
 * }
 *
 * const CloserCapability = defineCapability<Closer>('Closer', {
 *   close: 'method',
 *   closed: 'property',
 * });
 *
 * if (implementsCapability(CloserCapability, resource)) {
 *   resource.close();
 * }
 * ```
 * @public
 */
export function defineCapability<T>(
  name: string,
  members: { readonly [K in keyof T]-?: MemberRequirement },
): Capability<T> {
  return { name, members };
}

/**
 * Reports whether a value provides every member of a capability set.
 * Primitives are checked through their wrapper objects; nil never implements
 * anything.
 * @param capability - Capability built with {@link defineCapability}
 * @param value - Value to inspect
 * @public
 */
export function implementsCapability<T>(
  capability: Capability<T>,
  value: unknown,
): value is T {
  if (value === null || value === undefined) return false;

  const target: object = Object(value);
  const members: Record<string, MemberRequirement> = capability.members;
  for (const [member, requirement] of Object.entries(members)) {
    if (!(member in target)) return false;
    if (
      requirement === 'method' &&
      typeof Reflect.get(target, member) !== 'function'
    ) {
      return false;
    }
  }
  return true;
}

/**
 * Runtime type identity: same `typeof` and, for objects, the identical
 * prototype. `1` and `1n` differ, as do `Int8Array` and `Int16Array` or two
 * unrelated classes with the same shape.
 * @public
 */
export function sameType(a: unknown, b: unknown): boolean {
  if (typeof a !== typeof b) return false;
  if (typeof a !== 'object' || typeof b !== 'object') return true;
  if (a === null || b === null) return a === b;
  return Object.getPrototypeOf(a) === Object.getPrototypeOf(b);
}
