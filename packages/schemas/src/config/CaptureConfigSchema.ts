import { z } from 'zod';

// Stack capture parameters; defaults start the trace at the code under test
export const CaptureConfigSchema = z.object({
  bufferSize: z.number().int().nonnegative().default(2048),
  skipFrames: z.number().int().nonnegative().default(2),
});
