import { createScopedLogger, type ILogger } from '@assay/core';
import {
  parseAssertionsConfig,
  type AssertionsConfigInput,
} from '@assay/schemas';
import { Assertions } from './assertions.js';
import { ThrowingFailureSink, type FailureSink } from './sinks.js';

export { Assertions } from './assertions.js';
export { AssertionFailedError, formatFailure } from './errors.js';
export {
  RecordingFailureSink,
  ThrowingFailureSink,
  type FailureReport,
  type FailureSink,
} from './sinks.js';

/**
 * Options for {@link createAssertions}: validated configuration plus the
 * collaborators failures flow into.
 * @public
 */
export type AssertionsOptions = AssertionsConfigInput & {
  /** Receives failures; throws {@link AssertionFailedError} by default. */
  sink?: FailureSink;
  logger?: ILogger;
};

/**
 * Creates an {@link Assertions} instance.
 * @param options - Trace capture, frame limit and origin filtering, sink and logger
 * @throws ZodError when a configuration field is invalid
 * @example
 * ```typescript
 * const recorder = new RecordingFailureSink();
 * const check = createAssertions({ sink: recorder, frameLimit: 3 });
 *
 * check.greater(1, 2);
 * recorder.lastMessage; // 'expected 1 to be greater than 2'
 * ```
 * @public
 */
export function createAssertions(options: AssertionsOptions = {}): Assertions {
  const { sink, logger, ...config } = options;
  return new Assertions(
    parseAssertionsConfig(config),
    sink ?? new ThrowingFailureSink(),
    logger ?? createScopedLogger('asserts'),
  );
}
