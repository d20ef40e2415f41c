import { z } from 'zod';
import { FeatureNameSchema, type FeatureName } from './extractors.js';
import { RawInstrumentationEventSchema, type RawInstrumentationEvent } from './event.js';
import { ScoringOverridesSchema, type ScoringOverrides } from './scoring.js';

/**
 * Wire form of an assessment job (HTTP body, CLI job file)
 */
export const AssessmentJobSchema = z.object({
  jobId: z.string().min(1).max(128).optional(),
  staticResults: z.record(z.unknown()).default({}),
  dynamicEvents: z.array(RawInstrumentationEventSchema).optional(),
  dynamicTruncated: z.boolean().default(false),
  features: z.record(FeatureNameSchema, z.boolean()).optional(),
  configOverrides: ScoringOverridesSchema.optional(),
});

/**
 * Programmatic form: dynamic events may also arrive as a live stream.
 * Omitting dynamicEvents means dynamic analysis was skipped.
 */
export interface AssessmentJob {
  jobId?: string;
  staticResults?: Readonly<Record<string, unknown>>;
  dynamicEvents?: Iterable<RawInstrumentationEvent> | AsyncIterable<RawInstrumentationEvent>;
  dynamicTruncated?: boolean;
  features?: Readonly<Partial<Record<FeatureName, boolean>>>;
  configOverrides?: ScoringOverrides;
}
