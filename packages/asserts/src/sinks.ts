import type { StackTrace } from '@assay/stacktrace';
import { AssertionFailedError } from './errors.js';

/**
 * One failed assertion.
 * @public
 */
export interface FailureReport {
  /** Assertion method name, e.g. `equal`. */
  readonly assertion: string;
  readonly message: string;
  /** Trace limited to the configured frame count. */
  readonly trace: StackTrace;
  /** `file:line function` lines of {@link FailureReport.trace}. */
  readonly renderedTrace: string;
}

/**
 * Receives failures from an {@link Assertions} instance.
 * @public
 */
export interface FailureSink {
  report(failure: FailureReport): void;
}

/**
 * Default sink: every failure throws an {@link AssertionFailedError}.
 * @public
 */
export class ThrowingFailureSink implements FailureSink {
  public report(failure: FailureReport): never {
    throw new AssertionFailedError(failure);
  }
}

/**
 * Keeps failures in memory instead of failing the test, for checking the
 * assertions themselves.
 * @public
 */
export class RecordingFailureSink implements FailureSink {
  private readonly recorded: FailureReport[] = [];

  public get failures(): readonly FailureReport[] {
    return this.recorded;
  }

  public get lastMessage(): string | undefined {
    return this.recorded.at(-1)?.message;
  }

  public report(failure: FailureReport): void {
    this.recorded.push(failure);
  }

  public clear(): void {
    this.recorded.length = 0;
  }
}
