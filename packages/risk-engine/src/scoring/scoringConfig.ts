import { DEFAULT_METRIC_CATALOG } from '../catalog/defaultCatalog.js';
import type { MetricCatalog } from '../catalog/metricCatalog.js';
import { ConfigurationError } from '../errors.js';
import type { MetricName } from '../schemas/metric.js';
import {
  UnavailablePolicySchema,
  type ScoringOverrides,
  type UnavailablePolicy,
} from '../schemas/scoring.js';

export interface ScoreBands {
  /** Lowest score labelled Medium */
  readonly medium: number;
  /** Lowest score labelled High */
  readonly high: number;
}

export const DEFAULT_SCORE_BANDS: ScoreBands = Object.freeze({ medium: 40, high: 70 });

const BAND_NAMES: ReadonlySet<string> = new Set(['medium', 'high']);

export const DEFAULT_UNAVAILABLE_POLICY: UnavailablePolicy = 'redistribute';

/**
 * Catalog defaults with one call's overrides applied
 */
export interface EffectiveScoringConfig {
  readonly catalog: MetricCatalog;
  readonly weights: ReadonlyMap<MetricName, number>;
  readonly caps: ReadonlyMap<MetricName, number>;
  readonly bands: ScoreBands;
  readonly unavailablePolicy: UnavailablePolicy;
}

function isScoreBound(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 100;
}

/**
 * Validate overrides against the catalog and merge them over its defaults.
 * Only the named weights and caps change.
 *
 * @throws ConfigurationError listing every invalid override
 */
export function resolveScoringConfig(
  overrides: ScoringOverrides = {},
  catalog: MetricCatalog = DEFAULT_METRIC_CATALOG,
): EffectiveScoringConfig {
  const issues: string[] = [];
  const weights = new Map<MetricName, number>();
  const caps = new Map<MetricName, number>();

  for (const spec of catalog.specs) {
    weights.set(spec.name, spec.defaultWeight);
    if (spec.cap !== undefined) {
      caps.set(spec.name, spec.cap);
    }
  }

  for (const [name, weight] of Object.entries(overrides.weights ?? {})) {
    if (!catalog.has(name)) {
      issues.push(`weights.${name}: unknown metric`);
      continue;
    }
    if (!Number.isFinite(weight) || weight < 0 || weight > 1) {
      issues.push(`weights.${name}: weight must be within [0, 1], got ${weight}`);
      continue;
    }
    weights.set(name, weight);
  }

  for (const [name, cap] of Object.entries(overrides.caps ?? {})) {
    if (!catalog.has(name)) {
      issues.push(`caps.${name}: unknown metric`);
      continue;
    }
    if (catalog.get(name)?.kind !== 'count') {
      issues.push(`caps.${name}: caps apply only to count metrics`);
      continue;
    }
    if (!Number.isInteger(cap) || cap < 0) {
      issues.push(`caps.${name}: cap must be a non-negative integer, got ${cap}`);
      continue;
    }
    caps.set(name, cap);
  }

  for (const name of Object.keys(overrides.bands ?? {})) {
    if (!BAND_NAMES.has(name)) {
      issues.push(`bands.${name}: unknown band`);
    }
  }
  const medium = overrides.bands?.medium ?? DEFAULT_SCORE_BANDS.medium;
  const high = overrides.bands?.high ?? DEFAULT_SCORE_BANDS.high;
  if (!isScoreBound(medium)) {
    issues.push(`bands.medium: must be an integer within [0, 100], got ${medium}`);
  }
  if (!isScoreBound(high)) {
    issues.push(`bands.high: must be an integer within [0, 100], got ${high}`);
  }
  if (isScoreBound(medium) && isScoreBound(high) && medium >= high) {
    issues.push(`bands: medium (${medium}) must be lower than high (${high})`);
  }

  const policy = UnavailablePolicySchema.safeParse(overrides.unavailablePolicy ?? DEFAULT_UNAVAILABLE_POLICY);
  if (!policy.success) {
    issues.push(`unavailablePolicy: unknown policy '${String(overrides.unavailablePolicy)}'`);
  }

  if (issues.length > 0 || !policy.success) {
    throw new ConfigurationError(issues);
  }

  return Object.freeze({
    catalog,
    weights,
    caps,
    bands: Object.freeze({ medium, high }),
    unavailablePolicy: policy.data,
  });
}

/**
 * Layer job overrides over service-level ones, key by key
 */
export function mergeScoringOverrides(
  base: ScoringOverrides | undefined,
  override: ScoringOverrides | undefined,
): ScoringOverrides {
  const policy = override?.unavailablePolicy ?? base?.unavailablePolicy;
  const bands =
    base?.bands !== undefined || override?.bands !== undefined
      ? { ...base?.bands, ...override?.bands }
      : undefined;

  return {
    weights: { ...base?.weights, ...override?.weights },
    caps: { ...base?.caps, ...override?.caps },
    ...(bands !== undefined && { bands }),
    ...(policy !== undefined && { unavailablePolicy: policy }),
  };
}
