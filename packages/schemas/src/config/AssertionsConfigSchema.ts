import { z } from 'zod';
import { CaptureConfigSchema } from './CaptureConfigSchema.js';

export const ExcludedOriginSchema = z.enum(['internal', 'library']);

export const AssertionsConfigSchema = z.object({
  capture: CaptureConfigSchema.default({}),
  frameLimit: z
    .number()
    .int()
    .positive()
    .default(10)
    .describe('Maximum number of frames rendered under a failure message'),
  // Frames from node_modules are runner plumbing in a failure report
  excludeOrigins: z.array(ExcludedOriginSchema).default(['library']),
  includeStackTrace: z.boolean().default(true),
});
