import type { MetricName } from '../schemas/metric.js';
import type { NormalizedMetric } from './normalizeMetrics.js';
import type { EffectiveScoringConfig } from './scoringConfig.js';

export interface MetricContribution {
  readonly name: MetricName;
  /** Configured weight */
  readonly weight: number;
  /** Weight after redistribution of unavailable mass */
  readonly effectiveWeight: number;
  readonly normalized: number;
  /** effectiveWeight × normalized, on the [0,1] score scale */
  readonly contribution: number;
}

export interface ScoreResult {
  /** Integer in [0,100] */
  readonly score: number;
  /** Unclamped weighted sum on the [0,1] scale */
  readonly scoreRaw: number;
  /** Scored metrics in catalog order */
  readonly contributions: readonly MetricContribution[];
  /** Metric → score points, two decimals */
  readonly breakdown: Readonly<Partial<Record<MetricName, number>>>;
  /** Unavailable metrics left out of the sum and breakdown */
  readonly excludedMetrics: readonly MetricName[];
}

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Weighted sum of normalized metrics, iterated in catalog order.
 *
 * Catalog metrics missing from the input score as observed zeros. Metrics
 * flagged unavailable follow the configured policy: 'redistribute' drops
 * them and scales the rest by W_total / W_available; 'zero' keeps them as
 * zero terms.
 */
export function scoreMetrics(
  metrics: readonly NormalizedMetric[],
  config: EffectiveScoringConfig,
): ScoreResult {
  const { catalog, weights, unavailablePolicy } = config;
  const byName = new Map<MetricName, NormalizedMetric>();
  for (const metric of metrics) {
    byName.set(metric.name, metric);
  }

  const isUnavailable = (name: MetricName): boolean => byName.get(name)?.available === false;

  let totalWeight = 0;
  let availableWeight = 0;
  for (const spec of catalog.specs) {
    const weight = weights.get(spec.name) ?? 0;
    totalWeight += weight;
    if (!isUnavailable(spec.name)) {
      availableWeight += weight;
    }
  }

  const redistribute = unavailablePolicy === 'redistribute';
  let scale = 1;
  if (redistribute && availableWeight < totalWeight) {
    scale = availableWeight > 0 ? totalWeight / availableWeight : 0;
  }

  const contributions: MetricContribution[] = [];
  const excludedMetrics: MetricName[] = [];
  const breakdown: Partial<Record<MetricName, number>> = {};
  let scoreRaw = 0;

  for (const spec of catalog.specs) {
    const weight = weights.get(spec.name) ?? 0;
    const unavailable = isUnavailable(spec.name);

    if (unavailable && redistribute) {
      excludedMetrics.push(spec.name);
      continue;
    }

    const normalized = unavailable ? 0 : (byName.get(spec.name)?.normalized ?? 0);
    const effectiveWeight = weight * scale;
    const contribution = effectiveWeight * normalized;
    scoreRaw += contribution;

    contributions.push(
      Object.freeze({ name: spec.name, weight, effectiveWeight, normalized, contribution }),
    );
    breakdown[spec.name] = roundTo(contribution * 100, 2);
  }

  const score = Math.round(Math.min(100, Math.max(0, scoreRaw * 100)));

  return Object.freeze({
    score,
    scoreRaw,
    contributions: Object.freeze(contributions),
    breakdown: Object.freeze(breakdown),
    excludedMetrics: Object.freeze(excludedMetrics),
  });
}
