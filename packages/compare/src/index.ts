export { Ref } from './ref.js';
export {
  kindOf,
  isSequence,
  isHashableKind,
  lengthOf,
  describeType,
} from './kinds.js';
export type { ValueKind, Sequence } from './kinds.js';
export { CompareError, CompareErrorCode } from './errors.js';
export { success, failure } from './result.js';
export type { CompareResult } from './result.js';
export { deepEqual } from './deep-equal.js';
export { isNil, isEmpty, isZeroValue } from './nil.js';
export {
  NUMERIC_COMPARE_EPSILON,
  toNumber,
  compareNumeric,
  withinDelta,
  withinEpsilon,
} from './numeric.js';
export type {
  Ordering,
  DeltaComparison,
  EpsilonComparison,
} from './numeric.js';
export {
  contains,
  subset,
  sameElements,
  elementsMatch,
} from './containers.js';
export {
  defineCapability,
  implementsCapability,
  sameType,
} from './capabilities.js';
export type { Capability, MemberRequirement } from './capabilities.js';
