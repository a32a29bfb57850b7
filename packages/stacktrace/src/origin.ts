/**
 * Classification of where a stack frame's code comes from.
 *
 * - `user`: application and test code (absolute paths, `file://` URLs or paths without a scheme)
 * - `internal`: Node.js built-ins (`node:` and `internal/` prefixes)
 * - `library`: third-party dependencies (anything under `node_modules`)
 * - `unknown`: missing or unclassifiable locations
 * @public
 */
export type FrameOrigin = 'user' | 'internal' | 'library' | 'unknown';

/**
 * Classifies the origin of a frame from its file path.
 *
 * Rules, first match wins:
 * 1. Missing path → `unknown`
 * 2. `node:` or `internal/` prefix → `internal`
 * 3. Contains a `node_modules` segment → `library`
 * 4. `file://` prefix, absolute path (POSIX or drive letter) or no scheme → `user`
 * 5. Otherwise → `unknown`
 * @param file - Frame file path (may be undefined)
 * @example
 * ```typescript
 * classifyOrigin('node:internal/process/task_queues'); // 'internal'
 * classifyOrigin('/app/node_modules/vitest/dist/index.js'); // 'library'
 * classifyOrigin('/app/src/math.test.ts'); // 'user'
 * classifyOrigin(undefined); // 'unknown'
 * ```
 * @public
 */
export function classifyOrigin(file?: string): FrameOrigin {
  if (!file) return 'unknown';

  const normalized = file.replace(/\\/g, '/');

  if (normalized.startsWith('node:') || normalized.startsWith('internal/')) {
    return 'internal';
  }

  if (/(^|\/)node_modules\//.test(normalized)) {
    return 'library';
  }

  if (
    normalized.startsWith('file://') ||
    normalized.startsWith('/') ||
    /^[A-Za-z]:\//.test(normalized) ||
    !normalized.includes(':')
  ) {
    return 'user';
  }

  return 'unknown';
}
