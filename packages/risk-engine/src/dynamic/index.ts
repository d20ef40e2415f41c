export {
  classifyInstrumentationEvent,
  parseEndpoint,
  type InstrumentationEvent,
  type InstrumentationEventKind,
} from './instrumentationEvent.js';
export {
  parseIntelFeed,
  loadIntelFeed,
  mergeThreatIntel,
  isMaliciousHost,
  EMPTY_THREAT_INTEL,
  type ThreatIntel,
} from './threatIntel.js';
export {
  DynamicMetricAggregator,
  ingestEvents,
  CLEARTEXT_SCHEMES,
  type DynamicIngestResult,
  type IngestOptions,
} from './ingestEvents.js';
export { collectInstrumentationEvents, type CollectOptions, type InstrumentationSource } from './collectEvents.js';
