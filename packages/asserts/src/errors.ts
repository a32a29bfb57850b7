import type { FailureReport } from './sinks.js';

/**
 * Rendering of a failure: the message, then the trace between marker lines.
 * The markers are omitted when there are no frames.
 */
export function formatFailure(report: FailureReport): string {
  if (!report.renderedTrace) return report.message;
  return [
    report.message,
    '--- Stack trace ---',
    report.renderedTrace,
    '-------------------',
  ].join('\n');
}

/**
 * Thrown by {@link ThrowingFailureSink} so the test runner records the failure.
 * @public
 */
export class AssertionFailedError extends Error {
  public readonly assertion: string;
  public readonly report: FailureReport;

  public constructor(report: FailureReport) {
    super(formatFailure(report));
    this.name = 'AssertionFailedError';
    this.assertion = report.assertion;
    this.report = report;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, AssertionFailedError.prototype);
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      assertion: this.assertion,
      message: this.report.message,
      frames: this.report.trace.frames(),
    };
  }
}
