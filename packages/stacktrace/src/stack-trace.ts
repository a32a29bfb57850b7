import { excludeFrameOrigins, filterFrames } from './filter.js';
import type { FrameOrigin } from './origin.js';
import { isStackLine, parseStackLine } from './parse.js';
import type { CaptureConfig, Frame, RawFrame } from './types.js';

export const DEFAULT_CAPTURE_CONFIG: CaptureConfig = Object.freeze({
  bufferSize: 2048,
  skipFrames: 2,
});

/**
 * Immutable snapshot of the call stack: filtered frames (innermost first) and
 * the raw text of the same capture.
 * @public
 */
export class StackTrace {
  private static readonly EMPTY = new StackTrace([], '');

  private readonly frameList: readonly Frame[];

  private constructor(
    frames: readonly Frame[],
    private readonly raw: string,
  ) {
    this.frameList = Object.freeze(frames.map((frame) => Object.freeze({ ...frame })));
  }

  /**
   * Builds a snapshot from frames that are already filtered.
   */
  public static from(frames: readonly Frame[], raw = ''): StackTrace {
    return new StackTrace(frames, raw);
  }

  public static empty(): StackTrace {
    return StackTrace.EMPTY;
  }

  public frames(): readonly Frame[] {
    return this.frameList;
  }

  /** Raw, unfiltered text of the capture. */
  public toString(): string {
    return this.raw;
  }

  /**
   * Keeps the first `n` frames. Returns this snapshot itself when it already
   * holds `n` frames or fewer; the raw text is never truncated.
   */
  public limit(n: number): StackTrace {
    if (n >= this.frameList.length) return this;
    return new StackTrace(this.frameList.slice(0, Math.max(0, n)), this.raw);
  }

  /**
   * Drops frames whose file belongs to one of `origins`, keeping the raw text.
   */
  public withoutOrigins(origins: readonly FrameOrigin[]): StackTrace {
    const frames = excludeFrameOrigins(this.frameList, origins);
    if (frames.length === this.frameList.length) return this;
    return new StackTrace(frames, this.raw);
  }
}

function clampCount(value: number): number {
  return Number.isFinite(value) && value > 0 ? Math.floor(value) : 0;
}

/**
 * Captures the current call stack.
 *
 * With `skipFrames: 0` the first frame is the direct caller of this
 * function; the default config skips two more. A zero buffer, or a skip
 * beyond the stack depth, yields an empty snapshot.
 * @param config - Buffer size and skip count, defaults to {@link DEFAULT_CAPTURE_CONFIG}
 * @example
 * ```typescript
 * function reportFailure(): string {
 *   const trace = captureStackTrace({ bufferSize: 32, skipFrames: 1 });
 *   return renderFrames(trace.limit(5).frames());
 * }
 * ```
 * @public
 */
export function captureStackTrace(
  config: CaptureConfig = DEFAULT_CAPTURE_CONFIG,
): StackTrace {
  const bufferSize = clampCount(config.bufferSize);
  const skipFrames = clampCount(config.skipFrames);
  if (bufferSize === 0) return StackTrace.empty();

  const previousLimit = Error.stackTraceLimit;
  Error.stackTraceLimit = skipFrames + bufferSize;
  let stack: string;
  try {
    stack = readStack();
  } finally {
    Error.stackTraceLimit = previousLimit;
  }

  const lines = stack
    .split('\n')
    .filter(isStackLine)
    .slice(skipFrames, skipFrames + bufferSize);
  if (lines.length === 0) return StackTrace.empty();

  const rawFrames: RawFrame[] = [];
  for (const line of lines) {
    const frame = parseStackLine(line);
    if (frame) rawFrames.push(frame);
  }

  return StackTrace.from(filterFrames(rawFrames), lines.join('\n').trim());
}

/**
 * Captures the stack above {@link captureStackTrace} as V8 text. A custom
 * `Error.prepareStackTrace` that returns something other than a string is
 * bypassed for a second capture.
 */
function readStack(): string {
  const holder: { stack?: unknown } = {};
  Error.captureStackTrace(holder, captureStackTrace);
  // formatted lazily on first read
  if (typeof holder.stack === 'string') return holder.stack;

  const prepare = Error.prepareStackTrace;
  Error.prepareStackTrace = undefined;
  try {
    const plain: { stack?: unknown } = {};
    Error.captureStackTrace(plain, captureStackTrace);
    return typeof plain.stack === 'string' ? plain.stack : '';
  } finally {
    Error.prepareStackTrace = prepare;
  }
}
