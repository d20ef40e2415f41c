import type { ScoringDefaults, UnavailablePolicy } from './schema.js';

/**
 * Service-level scoring defaults in the shape the engine takes as overrides
 */
export interface ScoringDefaultOverrides {
  weights: Record<string, number>;
  caps: Record<string, number>;
  bands: { medium: number; high: number };
  unavailablePolicy: UnavailablePolicy;
}

export function toScoringOverrides(scoring: ScoringDefaults): ScoringDefaultOverrides {
  return {
    weights: { ...scoring.weights },
    caps: { ...scoring.caps },
    bands: { medium: scoring.bandMedium, high: scoring.bandHigh },
    unavailablePolicy: scoring.unavailablePolicy,
  };
}
