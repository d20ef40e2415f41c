import { rawValueAsNumber } from '../catalog/metricValue.js';
import { ConfigurationError } from '../errors.js';
import type { MetricKind, MetricName, MetricSource, MetricValue } from '../schemas/metric.js';
import type { EffectiveScoringConfig } from './scoringConfig.js';

export interface NormalizedMetric {
  readonly name: MetricName;
  readonly kind: MetricKind;
  readonly source: MetricSource;
  readonly available: boolean;
  readonly rawValue: number | boolean;
  /** Contribution scale in [0,1] */
  readonly normalized: number;
}

/**
 * Map one metric onto [0,1]: counts are capped and divided by the cap
 * (a zero cap yields 0), continuous values are clamped, booleans become 0/1.
 */
export function normalizeMetric(value: MetricValue, config: EffectiveScoringConfig): number {
  const n = rawValueAsNumber(value.rawValue);

  switch (value.kind) {
    case 'count': {
      const cap = config.caps.get(value.name);
      if (cap === undefined) {
        throw new ConfigurationError([`caps.${value.name}: no cap configured for count metric`]);
      }
      if (cap <= 0 || !Number.isFinite(n) || n <= 0) {
        return 0;
      }
      return Math.min(n, cap) / cap;
    }
    case 'continuous':
      return Number.isFinite(n) ? Math.min(1, Math.max(0, n)) : 0;
    case 'boolean':
      return n > 0 ? 1 : 0;
  }
}

/**
 * Normalize every value. Unavailable metrics keep normalized = 0 and stay
 * flagged so the scorer can apply its policy.
 */
export function normalizeMetrics(
  values: readonly MetricValue[],
  config: EffectiveScoringConfig,
): NormalizedMetric[] {
  return values.map((value) =>
    Object.freeze({
      name: value.name,
      kind: value.kind,
      source: value.source,
      available: value.available,
      rawValue: value.rawValue,
      normalized: value.available ? normalizeMetric(value, config) : 0,
    }),
  );
}
