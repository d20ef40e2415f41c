import { DEFAULT_METRIC_CATALOG } from '../catalog/defaultCatalog.js';
import type { MetricCatalog } from '../catalog/metricCatalog.js';
import { createMetricValue, unavailableMetricValue } from '../catalog/metricValue.js';
import type { MetricReadings } from '../extractors/convertResults.js';
import { generateRationale, type Rationale } from '../rationale/generateRationale.js';
import type { MetricName } from '../schemas/metric.js';
import type { ScoringOverrides } from '../schemas/scoring.js';
import { normalizeMetrics } from '../scoring/normalizeMetrics.js';
import { scoreMetrics, type ScoreResult } from '../scoring/scoreMetrics.js';
import { resolveScoringConfig } from '../scoring/scoringConfig.js';

export interface EvaluateOptions {
  overrides?: ScoringOverrides;
  catalog?: MetricCatalog;
  /** Metrics whose source could not be observed */
  unavailable?: readonly MetricName[];
}

export interface MetricEvaluation {
  readonly result: ScoreResult;
  readonly rationale: Rationale;
}

/**
 * Score plain metric readings without running a pipeline.
 * Metrics not listed read as observed zeros.
 */
export function evaluateMetrics(readings: MetricReadings, options: EvaluateOptions = {}): MetricEvaluation {
  const catalog = options.catalog ?? DEFAULT_METRIC_CATALOG;
  const config = resolveScoringConfig(options.overrides, catalog);
  const unavailable = new Set(options.unavailable ?? []);

  const values = catalog.specs.flatMap((spec) => {
    if (unavailable.has(spec.name)) {
      return [unavailableMetricValue(spec)];
    }
    const reading = readings[spec.name];
    return reading === undefined ? [] : [createMetricValue(spec, reading)];
  });

  const result = scoreMetrics(normalizeMetrics(values, config), config);
  return Object.freeze({ result, rationale: generateRationale(result, config) });
}
