export {
  resolveScoringConfig,
  mergeScoringOverrides,
  DEFAULT_SCORE_BANDS,
  DEFAULT_UNAVAILABLE_POLICY,
  type EffectiveScoringConfig,
  type ScoreBands,
} from './scoringConfig.js';
export { normalizeMetric, normalizeMetrics, type NormalizedMetric } from './normalizeMetrics.js';
export { scoreMetrics, type MetricContribution, type ScoreResult } from './scoreMetrics.js';
