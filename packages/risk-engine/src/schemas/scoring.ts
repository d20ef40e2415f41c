import { z } from 'zod';

export const UnavailablePolicySchema = z.enum(['redistribute', 'zero']);
export type UnavailablePolicy = z.infer<typeof UnavailablePolicySchema>;

/**
 * Per-call overrides. Only the shape is checked here: metric names, band
 * names, ranges and the policy are checked by resolveScoringConfig, which
 * raises ConfigurationError.
 */
export const ScoringOverridesSchema = z
  .object({
    weights: z.record(z.number()).optional(),
    caps: z.record(z.number()).optional(),
    bands: z.record(z.number()).optional(),
    unavailablePolicy: z.string().optional(),
  })
  .strict();
export type ScoringOverrides = z.infer<typeof ScoringOverridesSchema>;
