import type { z } from 'zod';
import type { CaptureConfigSchema } from './CaptureConfigSchema.js';
import type {
  AssertionsConfigSchema,
  ExcludedOriginSchema,
} from './AssertionsConfigSchema.js';

export { CaptureConfigSchema } from './CaptureConfigSchema.js';
export {
  AssertionsConfigSchema,
  ExcludedOriginSchema,
} from './AssertionsConfigSchema.js';

export type CaptureConfigZod = z.infer<typeof CaptureConfigSchema>;
export type ExcludedOrigin = z.infer<typeof ExcludedOriginSchema>;
