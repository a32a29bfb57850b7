export type { CaptureConfig, Frame, Frames, RawFrame } from './types.js';
export { classifyOrigin, type FrameOrigin } from './origin.js';
export { ANONYMOUS_FUNCTION, isStackLine, parseStackLine } from './parse.js';
export {
  DEFAULT_SOURCE_SUFFIXES,
  excludeFrameOrigins,
  filterFrames,
  normalizeFunctionName,
  type FilterOptions,
} from './filter.js';
export { renderFrames } from './render.js';
export {
  DEFAULT_CAPTURE_CONFIG,
  StackTrace,
  captureStackTrace,
} from './stack-trace.js';
