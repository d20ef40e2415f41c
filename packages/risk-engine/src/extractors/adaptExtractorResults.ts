import type { Logger } from 'pino';
import { createMetricValue, unavailableMetricValue } from '../catalog/metricValue.js';
import type { MetricCatalog } from '../catalog/metricCatalog.js';
import { MandatoryExtractorMissingError } from '../errors.js';
import {
  EXTRACTOR_FEATURES,
  featureUnavailableNotice,
  type FeatureAvailability,
} from '../features/featureAvailability.js';
import type { Notice } from '../schemas/assessment.js';
import {
  EXTRACTOR_NAMES,
  isMandatoryExtractor,
  isUnavailableMarker,
  type ExtractorName,
  type OptionalExtractorName,
} from '../schemas/extractors.js';
import type { MetricValue } from '../schemas/metric.js';
import { RESULT_CONVERTERS, type MetricReadings } from './convertResults.js';

const KNOWN_EXTRACTORS: ReadonlySet<string> = new Set(EXTRACTOR_NAMES);

export interface AdaptedStaticMetrics {
  readonly metrics: readonly MetricValue[];
  readonly notices: readonly Notice[];
  readonly unavailableExtractors: readonly ExtractorName[];
}

export interface AdaptOptions {
  readonly catalog: MetricCatalog;
  readonly features: FeatureAvailability;
  readonly logger?: Logger;
}

/**
 * Turn raw extractor results into typed metric values.
 *
 * Every catalog metric sourced from a present extractor gets a value; ones the
 * extractor did not report read as zero. Metrics of an optional extractor that
 * could not run are marked unavailable and a notice is recorded. A missing or
 * unusable mandatory result throws MandatoryExtractorMissingError.
 */
export function adaptExtractorResults(
  results: Readonly<Record<string, unknown>>,
  options: AdaptOptions,
): AdaptedStaticMetrics {
  const { catalog, features, logger } = options;
  const metrics: MetricValue[] = [];
  const notices: Notice[] = [];
  const unavailableExtractors: ExtractorName[] = [];

  for (const key of Object.keys(results)) {
    if (!KNOWN_EXTRACTORS.has(key)) {
      logger?.debug({ extractor: key }, 'Ignoring result from unknown extractor');
    }
  }

  for (const extractor of EXTRACTOR_NAMES) {
    const specs = catalog.fromOrigin(extractor);
    const readings = readExtractor(extractor, results[extractor], features, logger);

    if (readings.kind === 'unavailable') {
      unavailableExtractors.push(extractor);
      notices.push(readings.notice);
      logger?.info({ extractor, feature: readings.notice.feature }, readings.notice.message);
      metrics.push(...specs.map(unavailableMetricValue));
      continue;
    }

    for (const spec of specs) {
      const reading = readings.values[spec.name] ?? (spec.kind === 'boolean' ? false : 0);
      metrics.push(createMetricValue(spec, reading));
    }
  }

  return Object.freeze({
    metrics: Object.freeze(metrics),
    notices: Object.freeze(notices),
    unavailableExtractors: Object.freeze(unavailableExtractors),
  });
}

type ExtractorReadings =
  | { readonly kind: 'present'; readonly values: MetricReadings }
  | { readonly kind: 'unavailable'; readonly notice: Notice };

function readExtractor(
  extractor: ExtractorName,
  raw: unknown,
  features: FeatureAvailability,
  logger: Logger | undefined,
): ExtractorReadings {
  if (isMandatoryExtractor(extractor)) {
    if (raw === undefined) {
      throw new MandatoryExtractorMissingError(extractor, 'absent');
    }
    if (isUnavailableMarker(raw)) {
      throw new MandatoryExtractorMissingError(extractor, 'unavailable');
    }
    const converted = RESULT_CONVERTERS[extractor].convert(raw);
    if (!converted.success) {
      throw new MandatoryExtractorMissingError(extractor, 'malformed', { cause: converted.error });
    }
    return { kind: 'present', values: converted.readings };
  }

  return readOptionalExtractor(extractor, raw, features, logger);
}

function readOptionalExtractor(
  extractor: OptionalExtractorName,
  raw: unknown,
  features: FeatureAvailability,
  logger: Logger | undefined,
): ExtractorReadings {
  const status = features.status(EXTRACTOR_FEATURES[extractor]);
  const unavailable: ExtractorReadings = {
    kind: 'unavailable',
    notice: featureUnavailableNotice(status, extractor),
  };

  if (!status.available || raw === undefined || isUnavailableMarker(raw)) {
    return unavailable;
  }

  const converted = RESULT_CONVERTERS[extractor].convert(raw);
  if (!converted.success) {
    logger?.warn(
      { extractor, issues: converted.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) },
      'Discarding malformed optional extractor result',
    );
    return unavailable;
  }
  return { kind: 'present', values: converted.readings };
}
