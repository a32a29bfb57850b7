import { classifyOrigin, type FrameOrigin } from './origin.js';
import type { Frame, RawFrame } from './types.js';

export const DEFAULT_SOURCE_SUFFIXES: readonly string[] = [
  '.ts',
  '.tsx',
  '.mts',
  '.cts',
  '.js',
  '.jsx',
  '.mjs',
  '.cjs',
];

export interface FilterOptions {
  /** File suffixes that mark a frame as source code. */
  sourceSuffixes?: readonly string[];
  /** Origins whose frames are dropped, e.g. `['library']` for `node_modules`. */
  excludeOrigins?: readonly FrameOrigin[];
}

/**
 * Strips a path-qualifying prefix up to and including the last `/`.
 * @example
 * ```typescript
 * normalizeFunctionName('github.com/user/project/package.Function'); // 'package.Function'
 * normalizeFunctionName('Parser.parse'); // 'Parser.parse'
 * ```
 */
export function normalizeFunctionName(name: string): string {
  const separator = name.lastIndexOf('/');
  return separator === -1 ? name : name.slice(separator + 1);
}

/**
 * Keeps the frames worth showing in a failure report, innermost first.
 *
 * A frame is dropped when its function or file is empty, its line is below 1,
 * or its file does not end with one of the source suffixes. Retained frames
 * have their function name normalised and their column discarded.
 */
export function filterFrames(
  rawFrames: readonly RawFrame[],
  options: FilterOptions = {},
): Frame[] {
  const suffixes = options.sourceSuffixes ?? DEFAULT_SOURCE_SUFFIXES;
  const excluded = new Set<FrameOrigin>(options.excludeOrigins ?? []);

  const frames: Frame[] = [];
  for (const raw of rawFrames) {
    if (!raw.function || !raw.file || raw.line < 1) continue;
    if (!suffixes.some((suffix) => raw.file.endsWith(suffix))) continue;
    if (excluded.size > 0 && excluded.has(classifyOrigin(raw.file))) continue;

    frames.push({
      function: normalizeFunctionName(raw.function),
      file: raw.file,
      line: raw.line,
    });
  }
  return frames;
}

/**
 * Drops already-filtered frames whose file belongs to one of `origins`.
 */
export function excludeFrameOrigins(
  frames: readonly Frame[],
  origins: readonly FrameOrigin[],
): Frame[] {
  if (origins.length === 0) return [...frames];
  return frames.filter((frame) => !origins.includes(classifyOrigin(frame.file)));
}
