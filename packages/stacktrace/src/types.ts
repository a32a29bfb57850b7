/**
 * One call-stack entry before filtering, as read from the runtime.
 * `function` and `file` may be empty and `line` may be 0 for frames the
 * runtime could not attribute.
 */
export interface RawFrame {
  readonly function: string;
  readonly file: string;
  readonly line: number;
  readonly column?: number;
}

/**
 * A filtered, normalised call-stack entry. Always has a non-empty function
 * name (`Class.method`, `functionName` or `<anonymous>`), a source file and a
 * 1-based line number.
 */
export interface Frame {
  readonly function: string;
  readonly file: string;
  readonly line: number;
}

export type Frames = readonly Frame[];

/**
 * Parameters of a single capture.
 */
export interface CaptureConfig {
  /** Maximum number of call-stack entries read after skipping. */
  readonly bufferSize: number;
  /** Innermost entries discarded, counted from the caller of the capture. */
  readonly skipFrames: number;
}
