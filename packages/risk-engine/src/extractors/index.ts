export { adaptExtractorResults, type AdaptedStaticMetrics, type AdaptOptions } from './adaptExtractorResults.js';
export { RESULT_CONVERTERS, type MetricReadings, type ResultConverter, type ConversionResult } from './convertResults.js';
