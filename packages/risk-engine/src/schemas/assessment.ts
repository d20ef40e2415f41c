import { z } from 'zod';
import { ExtractorNameSchema, FeatureNameSchema } from './extractors.js';
import { MetricNameSchema } from './metric.js';
import { UnavailablePolicySchema } from './scoring.js';

export const RiskLabelSchema = z.enum(['Low', 'Medium', 'High']);
export type RiskLabel = z.infer<typeof RiskLabelSchema>;

export const NoticeCodeSchema = z.enum([
  'OPTIONAL_FEATURE_UNAVAILABLE',
  'DYNAMIC_ANALYSIS_TRUNCATED',
  'DYNAMIC_ANALYSIS_SKIPPED',
]);
export type NoticeCode = z.infer<typeof NoticeCodeSchema>;

/**
 * Non-fatal condition recorded on the assessment
 */
export const NoticeSchema = z
  .object({
    code: NoticeCodeSchema,
    message: z.string(),
    extractor: ExtractorNameSchema.optional(),
    feature: FeatureNameSchema.optional(),
  })
  .readonly();
export type Notice = z.infer<typeof NoticeSchema>;

export const RationaleEntrySchema = z
  .object({
    metric: MetricNameSchema,
    /** Score points this metric added */
    contribution: z.number().min(0),
    /** Fraction of the total score */
    share: z.number().min(0).max(1),
    explanation: z.string(),
  })
  .readonly();
export type RationaleEntry = z.infer<typeof RationaleEntrySchema>;

export const DynamicSummarySchema = z
  .object({
    eventCount: z.number().int().min(0),
    truncated: z.boolean(),
    unknownTags: z.array(z.string()).readonly(),
  })
  .readonly();
export type DynamicSummary = z.infer<typeof DynamicSummarySchema>;

export const RiskAssessmentSchema = z
  .object({
    assessmentVersion: z.literal('0.1.0'),
    assessmentId: z.string().regex(/^[0-9a-f]{64}$/),
    jobId: z.string().nullable(),
    generatedAt: z.number().int(),
    score: z.number().int().min(0).max(100),
    label: RiskLabelSchema,
    summary: z.string(),
    rationale: z.array(RationaleEntrySchema).readonly(),
    breakdown: z.record(MetricNameSchema, z.number()).readonly(),
    excludedMetrics: z.array(MetricNameSchema).readonly(),
    notices: z.array(NoticeSchema).readonly(),
    dynamic: DynamicSummarySchema,
    unavailablePolicy: UnavailablePolicySchema,
  })
  .readonly();
export type RiskAssessment = z.infer<typeof RiskAssessmentSchema>;
