import { z } from 'zod';

/**
 * Instrumentation event as emitted by the hook scripts: either the compact
 * "TAG:payload" string or a structured object.
 */
export const RawInstrumentationEventSchema = z.union([
  z.string().min(1),
  z.object({
    tag: z.string().min(1),
    payload: z.unknown().optional(),
    timestamp: z.number().optional(),
  }),
]);
export type RawInstrumentationEvent = z.infer<typeof RawInstrumentationEventSchema>;
