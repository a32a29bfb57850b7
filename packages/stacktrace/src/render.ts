import type { Frame } from './types.js';

/**
 * Renders frames as `file:line function` lines joined by a single newline.
 * An empty list renders to `''`; there is never a trailing newline.
 */
export function renderFrames(frames: readonly Frame[]): string {
  return frames
    .map((frame) => `${frame.file}:${frame.line} ${frame.function}`)
    .join('\n');
}
