import type { z } from 'zod';
import { AssertionsConfigSchema } from './config/index.js';

export * from './config/index.js';

export type AssertionsConfig = z.infer<typeof AssertionsConfigSchema>;
export type AssertionsConfigInput = z.input<typeof AssertionsConfigSchema>;

/**
 * Validates assertion options and fills in defaults.
 * @param input - Raw options, e.g. from a test setup file
 * @throws ZodError when a field has the wrong type or range
 * @public
 */
export function parseAssertionsConfig(input: unknown = {}): AssertionsConfig {
  return AssertionsConfigSchema.parse(input);
}
