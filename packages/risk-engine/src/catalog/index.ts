export { MetricCatalog, type MetricSpec, type MetricOrigin } from './metricCatalog.js';
export { DEFAULT_METRIC_CATALOG } from './defaultCatalog.js';
export { createMetricValue, unavailableMetricValue, coerceRawValue, rawValueAsNumber } from './metricValue.js';
