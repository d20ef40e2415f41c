import type { MetricKind, MetricValue } from '../schemas/metric.js';
import type { MetricSpec } from './metricCatalog.js';

/**
 * Build a MetricValue, coercing the raw reading to its kind:
 * continuous → [0,1], count → non-negative integer, boolean → flag.
 * Non-finite numbers read as 0.
 */
export function createMetricValue(spec: MetricSpec, raw: number | boolean, available = true): MetricValue {
  return Object.freeze({
    name: spec.name,
    rawValue: coerceRawValue(spec.kind, raw),
    kind: spec.kind,
    source: spec.source,
    available,
  });
}

/**
 * Value recorded for a metric whose extractor did not run
 */
export function unavailableMetricValue(spec: MetricSpec): MetricValue {
  return createMetricValue(spec, spec.kind === 'boolean' ? false : 0, false);
}

export function coerceRawValue(kind: MetricKind, raw: number | boolean): number | boolean {
  if (kind === 'boolean') {
    return typeof raw === 'boolean' ? raw : Number.isFinite(raw) && raw !== 0;
  }

  const n = typeof raw === 'boolean' ? (raw ? 1 : 0) : raw;
  if (!Number.isFinite(n) || n <= 0) {
    return 0;
  }
  return kind === 'continuous' ? Math.min(1, n) : Math.floor(n);
}

/** Numeric view of a raw value */
export function rawValueAsNumber(raw: number | boolean): number {
  return typeof raw === 'boolean' ? (raw ? 1 : 0) : raw;
}
