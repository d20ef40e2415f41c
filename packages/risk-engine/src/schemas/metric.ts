import { z } from 'zod';

export const METRIC_NAMES = [
  'permission_density',
  'component_exposure',
  'permission_invocation_count',
  'cleartext_endpoint_count',
  'malicious_endpoint_count',
  'file_write_count',
  'vulnerable_dependency_count',
  'yara_match_count',
  'hardcoded_secret_count',
  'untrusted_signature',
  'cleartext_traffic_permitted',
  'missing_certificate_pinning',
  'debug_overrides',
  'expired_certificate',
  'self_signed_certificate',
  'other_event_count',
] as const;

export const MetricNameSchema = z.enum(METRIC_NAMES);
export type MetricName = z.infer<typeof MetricNameSchema>;

/**
 * continuous: ratio already in [0,1]; count: non-negative integer; boolean: flag
 */
export const MetricKindSchema = z.enum(['continuous', 'count', 'boolean']);
export type MetricKind = z.infer<typeof MetricKindSchema>;

export const MetricSourceSchema = z.enum(['static', 'dynamic']);
export type MetricSource = z.infer<typeof MetricSourceSchema>;

export const MetricValueSchema = z
  .object({
    name: MetricNameSchema,
    rawValue: z.union([z.number(), z.boolean()]),
    kind: MetricKindSchema,
    source: MetricSourceSchema,
    available: z.boolean(),
  })
  .readonly();
export type MetricValue = z.infer<typeof MetricValueSchema>;
