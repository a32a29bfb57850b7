import { describe, it, expect } from 'vitest';
import { classifyOrigin } from '../origin.js';

describe('classifyOrigin', () => {
  it.each([
    ['node:internal/process/task_queues', 'internal'],
    ['internal/modules/cjs/loader.js', 'internal'],
    ['/app/node_modules/vitest/dist/index.js', 'library'],
    ['C:\\app\\node_modules\\pkg\\index.js', 'library'],
    ['/app/src/math.test.ts', 'user'],
    ['file:///app/src/math.ts', 'user'],
    ['C:\\app\\src\\math.ts', 'user'],
    ['src/math.ts', 'user'],
    ['webpack://app/src/math.ts', 'unknown'],
    ['', 'unknown'],
  ])('should classify %s', (file, expected) => {
    expect(classifyOrigin(file)).toBe(expected);
  });

  it('should treat a missing file as unknown', () => {
    expect(classifyOrigin(undefined)).toBe('unknown');
  });
});
