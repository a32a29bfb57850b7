import { fileURLToPath } from 'url';
import type { RawFrame } from './types.js';

/** Name given to frames the runtime reports without a function name. */
export const ANONYMOUS_FUNCTION = '<anonymous>';

// at [async ][new ]name (location:line:column)  |  at location:line:column
const FRAME_LINE = /^\s*at (?:(.+?) \()?(.+?):(\d+):(\d+)\)?$/;
const CALL_PREFIX = /^(?:async |new )+/;

/**
 * Recognises a V8 stack line (`    at ...`), whether or not it carries a
 * location that can be parsed.
 */
export function isStackLine(line: string): boolean {
  return line.trimStart().startsWith('at ');
}

/**
 * Parses one V8 stack line into a raw frame.
 *
 * `file://` URLs are converted to paths, `async` and `new` prefixes are
 * dropped, and frames without a function name are named `<anonymous>`.
 * Lines without a `file:line:column` location (`at Array.map (<anonymous>)`,
 * `at async Promise.all (index 0)`) yield `undefined`.
 * @param line - A single line of `Error.prototype.stack`
 * @example
 * ```typescript
 * parseStackLine('    at Parser.parse (/app/src/parser.ts:42:7)');
 * // { function: 'Parser.parse', file: '/app/src/parser.ts', line: 42, column: 7 }
 * ```
 */
export function parseStackLine(line: string): RawFrame | undefined {
  const match = FRAME_LINE.exec(line);
  if (!match) return undefined;

  const [, name, location, lineNumber, column] = match;
  const functionName = (name ?? '').replace(CALL_PREFIX, '').trim();

  return {
    function: functionName || ANONYMOUS_FUNCTION,
    file: toFilePath(location ?? ''),
    line: Number(lineNumber),
    column: Number(column),
  };
}

function toFilePath(location: string): string {
  if (!location.startsWith('file://')) return location;
  try {
    return fileURLToPath(location);
  } catch {
    return location;
  }
}
