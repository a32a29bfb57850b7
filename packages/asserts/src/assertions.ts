import {
  compareNumeric,
  contains,
  deepEqual,
  describeType,
  elementsMatch,
  implementsCapability,
  isEmpty,
  isNil,
  isSequence,
  isZeroValue,
  lengthOf,
  sameElements,
  sameType,
  subset,
  withinDelta,
  withinEpsilon,
  type Capability,
  type Ordering,
} from '@assay/compare';
import { formatValue, type ILogger } from '@assay/core';
import type { AssertionsConfig } from '@assay/schemas';
import {
  StackTrace,
  captureStackTrace,
  renderFrames,
} from '@assay/stacktrace';
import type { FailureSink } from './sinks.js';

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : formatValue(error);
}

function quote(text: string): string {
  return JSON.stringify(text);
}

function formatTime(date: Date): string {
  return Number.isNaN(date.getTime()) ? 'Invalid Date' : date.toISOString();
}

function isReference(value: unknown): value is object {
  return (
    (typeof value === 'object' && value !== null) || typeof value === 'function'
  );
}

function parseJson(
  text: string,
): { ok: true; value: unknown } | { ok: false; reason: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, reason: describeError(error) };
  }
}

/**
 * Assertion methods that evaluate through the comparison engine and report
 * failures, with a trimmed stack trace, to a {@link FailureSink}.
 *
 * Each method returns `true` when it passed. With the default throwing sink a
 * failure never returns; with a recording sink it returns `false`.
 *
 * @example
 * ```typescript
 * const assert = createAssertions();
 *
 * assert.equal(parse('1 + 2'), { op: '+', args: [1, 2] });
 * assert.inDelta(area(circle), 3.1416, 1e-4);
 * assert.sameElements(tags, ['a', 'b']);
 * ```
 * @public
 */
export class Assertions {
  public constructor(
    private readonly config: AssertionsConfig,
    private readonly sink: FailureSink,
    private readonly logger: ILogger,
  ) {}

  public equal(expected: unknown, actual: unknown): boolean {
    if (deepEqual(expected, actual)) return true;
    return this.fail(
      'equal',
      `values not equal: expected: ${formatValue(expected)} actual: ${formatValue(actual)}`,
    );
  }

  public notEqual(notExpected: unknown, actual: unknown): boolean {
    if (!deepEqual(notExpected, actual)) return true;
    return this.fail(
      'notEqual',
      `values unexpectedly equal: not expected: ${formatValue(notExpected)} actual: ${formatValue(actual)}`,
    );
  }

  public nil(actual: unknown): boolean {
    if (isNil(actual)) return true;
    return this.fail('nil', `expected nil, but got: ${formatValue(actual)}`);
  }

  public notNil(value: unknown): boolean {
    if (!isNil(value)) return true;
    return this.fail('notNil', 'expected non-nil value, but got nil');
  }

  public empty(value: unknown): boolean {
    if (isEmpty(value)) return true;
    return this.fail('empty', `expected empty value, but got: ${formatValue(value)}`);
  }

  public notEmpty(value: unknown): boolean {
    if (!isEmpty(value)) return true;
    return this.fail(
      'notEmpty',
      `expected non-empty value, but got empty: ${formatValue(value)}`,
    );
  }

  public noError(error: unknown): boolean {
    if (isNil(error)) return true;
    return this.fail('noError', `unexpected error: ${describeError(error)}`);
  }

  public error(error: unknown): boolean {
    if (!isNil(error)) return true;
    return this.fail('error', 'expected an error, but got nil');
  }

  public isTrue(condition: boolean): boolean {
    if (condition) return true;
    return this.fail('isTrue', 'expected true, but got false');
  }

  public isFalse(condition: boolean): boolean {
    if (!condition) return true;
    return this.fail('isFalse', 'expected false, but got true');
  }

  /**
   * Substring, element, map key or record key membership.
   */
  public contains(container: unknown, item: unknown): boolean {
    const result = contains(container, item);
    if (!result.ok) return this.fail('contains', result.error.message);
    if (result.value) return true;
    return this.fail(
      'contains',
      `expected ${formatValue(container)} to contain ${formatValue(item)}, but it did not`,
    );
  }

  public notContains(container: unknown, item: unknown): boolean {
    const result = contains(container, item);
    if (!result.ok) return this.fail('notContains', result.error.message);
    if (!result.value) return true;
    return this.fail(
      'notContains',
      `expected ${formatValue(container)} to not contain ${formatValue(item)}, but it did`,
    );
  }

  public len(value: unknown, length: number): boolean {
    const actual = lengthOf(value);
    if (actual === undefined) {
      return this.fail(
        'len',
        `unsupported type for length check: ${describeType(value)}`,
      );
    }
    if (actual === length) return true;
    return this.fail('len', `expected length ${length}, but got ${actual}`);
  }

  /**
   * Passes when `fn` throws synchronously.
   */
  public throws(fn: () => unknown): boolean {
    try {
      fn();
    } catch {
      return true;
    }
    return this.fail('throws', 'expected a throw, but none occurred');
  }

  public notThrows(fn: () => unknown): boolean {
    try {
      fn();
      return true;
    } catch (error) {
      return this.fail('notThrows', `unexpected throw: ${describeError(error)}`);
    }
  }

  /**
   * Passes when `fn` throws a value deeply equal to `expected`.
   */
  public throwsWithValue(expected: unknown, fn: () => unknown): boolean {
    try {
      fn();
    } catch (thrown) {
      if (deepEqual(thrown, expected)) return true;
      return this.fail(
        'throwsWithValue',
        `expected thrown value ${formatValue(expected)}, but got ${formatValue(thrown)}`,
      );
    }
    return this.fail('throwsWithValue', 'expected a throw, but none occurred');
  }

  /**
   * Reference identity; both values must be objects or functions.
   */
  public same(expected: unknown, actual: unknown): boolean {
    if (!isReference(expected) || !isReference(actual)) {
      return this.fail(
        'same',
        `expected and actual must both be references, but got: ${describeType(expected)} vs ${describeType(actual)}`,
      );
    }
    if (expected === actual) return true;
    return this.fail(
      'same',
      `expected same reference, but got different: ${formatValue(expected)} vs ${formatValue(actual)}`,
    );
  }

  public greater(a: unknown, b: unknown): boolean {
    const message = this.orderingFailure(a, b, (o) => o > 0, 'greater than');
    return message === undefined ? true : this.fail('greater', message);
  }

  public less(a: unknown, b: unknown): boolean {
    const message = this.orderingFailure(a, b, (o) => o < 0, 'less than');
    return message === undefined ? true : this.fail('less', message);
  }

  public greaterOrEqual(a: unknown, b: unknown): boolean {
    const message = this.orderingFailure(
      a,
      b,
      (o) => o >= 0,
      'greater than or equal to',
    );
    return message === undefined ? true : this.fail('greaterOrEqual', message);
  }

  public lessOrEqual(a: unknown, b: unknown): boolean {
    const message = this.orderingFailure(
      a,
      b,
      (o) => o <= 0,
      'less than or equal to',
    );
    return message === undefined ? true : this.fail('lessOrEqual', message);
  }

  public isOfType(expectedType: unknown, value: unknown): boolean {
    if (sameType(expectedType, value)) return true;
    return this.fail(
      'isOfType',
      `expected type ${describeType(expectedType)}, but got ${describeType(value)}`,
    );
  }

  public isZero(value: unknown): boolean {
    if (isZeroValue(value)) return true;
    return this.fail('isZero', `expected zero value, but got: ${formatValue(value)}`);
  }

  /**
   * Every element (or entry) of `candidate` exists in `list`. Duplicates in
   * `candidate` need only one occurrence in `list`.
   */
  public subset(list: unknown, candidate: unknown): boolean {
    const result = subset(list, candidate);
    if (!result.ok) return this.fail('subset', result.error.message);
    if (result.value) return true;
    return this.fail(
      'subset',
      `expected ${formatValue(candidate)} to be a subset of ${formatValue(list)}, but it's not`,
    );
  }

  public errorContains(error: unknown, substring: string): boolean {
    if (isNil(error)) {
      return this.fail('errorContains', 'expected an error, but got nil');
    }
    const text = describeError(error);
    if (text.includes(substring)) return true;
    return this.fail(
      'errorContains',
      `expected error message to contain ${quote(substring)}, but got ${quote(text)}`,
    );
  }

  public implements<T>(capability: Capability<T>, value: unknown): boolean {
    if (implementsCapability(capability, value)) return true;
    return this.fail(
      'implements',
      `expected ${describeType(value)} to implement ${capability.name}, but it does not`,
    );
  }

  /**
   * Same elements with the same counts in any order; elements must be
   * hashable primitives or references.
   */
  public sameElements(a: unknown, b: unknown): boolean {
    const result = sameElements(a, b);
    if (!result.ok) return this.fail('sameElements', result.error.message);
    if (result.value) return true;
    if (isSequence(a) && isSequence(b) && a.length !== b.length) {
      return this.fail(
        'sameElements',
        `expected arrays of the same length, but got ${a.length} and ${b.length}`,
      );
    }
    return this.fail(
      'sameElements',
      `expected same elements in both arrays: ${formatValue(a)} vs ${formatValue(b)}`,
    );
  }

  public elementsMatch(a: unknown, b: unknown): boolean {
    const result = elementsMatch(a, b);
    if (!result.ok) return this.fail('elementsMatch', result.error.message);
    if (result.value) return true;
    return this.fail(
      'elementsMatch',
      `element lists are not equal: expected: ${formatValue(a)} actual: ${formatValue(b)}`,
    );
  }

  public matchesRegex(text: string, pattern: string | RegExp): boolean {
    let regex: RegExp;
    try {
      regex = typeof pattern === 'string' ? new RegExp(pattern) : pattern;
    } catch (error) {
      return this.fail(
        'matchesRegex',
        `invalid regex pattern: ${describeError(error)}`,
      );
    }
    // a global or sticky regex carries lastIndex between calls
    regex.lastIndex = 0;
    if (regex.test(text)) return true;
    return this.fail(
      'matchesRegex',
      `expected string ${quote(text)} to match regex ${quote(regex.source)}, but it did not`,
    );
  }

  public hasPrefix(text: string, prefix: string): boolean {
    if (text.startsWith(prefix)) return true;
    return this.fail(
      'hasPrefix',
      `expected string ${quote(text)} to have prefix ${quote(prefix)}, but it did not`,
    );
  }

  public hasSuffix(text: string, suffix: string): boolean {
    if (text.endsWith(suffix)) return true;
    return this.fail(
      'hasSuffix',
      `expected string ${quote(text)} to have suffix ${quote(suffix)}, but it did not`,
    );
  }

  /**
   * Passes when `|expected - actual| <= deltaMs`.
   */
  public withinDuration(expected: Date, actual: Date, deltaMs: number): boolean {
    const diff = expected.getTime() - actual.getTime();
    if (Math.abs(diff) <= deltaMs) return true;
    return this.fail(
      'withinDuration',
      `expected time ${formatTime(actual)} to be within ${deltaMs}ms of ${formatTime(expected)}, but difference was ${diff}ms`,
    );
  }

  /**
   * JSON documents equal after parsing, ignoring whitespace and key order.
   */
  public jsonEq(expected: string, actual: string): boolean {
    const expectedJson = parseJson(expected);
    if (!expectedJson.ok) {
      return this.fail(
        'jsonEq',
        `failed to parse expected JSON: ${expectedJson.reason}`,
      );
    }
    const actualJson = parseJson(actual);
    if (!actualJson.ok) {
      return this.fail('jsonEq', `failed to parse actual JSON: ${actualJson.reason}`);
    }
    if (deepEqual(expectedJson.value, actualJson.value)) return true;
    return this.fail(
      'jsonEq',
      `JSON not equal: expected: ${formatValue(expectedJson.value)} actual: ${formatValue(actualJson.value)}`,
    );
  }

  public inDelta(expected: unknown, actual: unknown, delta: number): boolean {
    const result = withinDelta(expected, actual, delta);
    if (!result.ok) return this.fail('inDelta', result.error.message);
    if (result.value.within) return true;
    return this.fail(
      'inDelta',
      `expected ${formatValue(actual)} to be within ${delta} of ${formatValue(expected)}, but difference was ${Math.abs(result.value.diff)}`,
    );
  }

  /**
   * Relative tolerance; `epsilon` of `0.01` accepts a 1% difference.
   */
  public inEpsilon(expected: unknown, actual: unknown, epsilon: number): boolean {
    const result = withinEpsilon(expected, actual, epsilon);
    if (!result.ok) return this.fail('inEpsilon', result.error.message);
    if (result.value.within) return true;
    return this.fail(
      'inEpsilon',
      `expected ${formatValue(actual)} to be within ${epsilon * 100}% of ${formatValue(expected)}, but difference was ${result.value.relativeDiff * 100}%`,
    );
  }

  private orderingFailure(
    a: unknown,
    b: unknown,
    accept: (ordering: Ordering) => boolean,
    relation: string,
  ): string | undefined {
    const result = compareNumeric(a, b);
    if (!result.ok) return `failed to compare values: ${result.error.message}`;
    if (accept(result.value)) return undefined;
    return `expected ${formatValue(a)} to be ${relation} ${formatValue(b)}`;
  }

  // Called directly by every public method: the capture skips this frame and
  // the assertion's, so the trace starts at the calling test.
  private fail(assertion: string, message: string): false {
    const trace = this.config.includeStackTrace
      ? captureStackTrace(this.config.capture)
          .withoutOrigins(this.config.excludeOrigins)
          .limit(this.config.frameLimit)
      : StackTrace.empty();
    const renderedTrace = renderFrames(trace.frames());

    this.logger.debug('assertion failed', {
      assertion,
      message,
      frames: trace.frames(),
    });
    this.sink.report({ assertion, message, trace, renderedTrace });
    return false;
  }
}
