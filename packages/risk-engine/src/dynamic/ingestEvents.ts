import type { Logger } from 'pino';
import { createMetricValue } from '../catalog/metricValue.js';
import type { MetricCatalog } from '../catalog/metricCatalog.js';
import { DEFAULT_METRIC_CATALOG } from '../catalog/defaultCatalog.js';
import type { RawInstrumentationEvent } from '../schemas/event.js';
import type { MetricName, MetricValue } from '../schemas/metric.js';
import { classifyInstrumentationEvent, type InstrumentationEvent } from './instrumentationEvent.js';
import { EMPTY_THREAT_INTEL, isMaliciousHost, type ThreatIntel } from './threatIntel.js';

/** Schemes that carry traffic without transport encryption */
export const CLEARTEXT_SCHEMES: ReadonlySet<string> = new Set(['http', 'ws', 'ftp']);

export interface DynamicIngestResult {
  /** Every dynamic catalog metric, all available */
  readonly metrics: readonly MetricValue[];
  readonly eventCount: number;
  /** The stream ended at the timeout rather than on its own */
  readonly truncated: boolean;
  /** Distinct unrecognized tags, sorted */
  readonly unknownTags: readonly string[];
}

export interface IngestOptions {
  catalog?: MetricCatalog;
  intel?: ThreatIntel;
  logger?: Logger;
}

/**
 * Folds classified events into dynamic metric counts. Events are not
 * retained once counted.
 */
export class DynamicMetricAggregator {
  private readonly counts = new Map<MetricName, number>();
  private readonly unknownTags = new Set<string>();
  private eventCount = 0;
  private readonly catalog: MetricCatalog;
  private readonly intel: ThreatIntel;
  private readonly logger: Logger | undefined;

  constructor(options: IngestOptions = {}) {
    this.catalog = options.catalog ?? DEFAULT_METRIC_CATALOG;
    this.intel = options.intel ?? EMPTY_THREAT_INTEL;
    this.logger = options.logger;
  }

  add(event: InstrumentationEvent): void {
    this.eventCount++;

    switch (event.kind) {
      case 'permission':
        this.increment('permission_invocation_count');
        break;
      case 'network':
        if (event.scheme !== undefined && CLEARTEXT_SCHEMES.has(event.scheme)) {
          this.increment('cleartext_endpoint_count');
        }
        if (isMaliciousHost(this.intel, event.host)) {
          this.increment('malicious_endpoint_count');
        }
        break;
      case 'file_write':
        this.increment('file_write_count');
        break;
      case 'unknown':
        if (!this.unknownTags.has(event.tag)) {
          this.logger?.debug({ tag: event.tag }, 'Unrecognized instrumentation tag');
          this.unknownTags.add(event.tag);
        }
        this.increment('other_event_count');
        break;
    }
  }

  addRaw(raw: RawInstrumentationEvent): void {
    this.add(classifyInstrumentationEvent(raw));
  }

  finish(truncated: boolean): DynamicIngestResult {
    const metrics = this.catalog.specs
      .filter((spec) => spec.source === 'dynamic')
      .map((spec) => createMetricValue(spec, this.counts.get(spec.name) ?? 0));

    return Object.freeze({
      metrics: Object.freeze(metrics),
      eventCount: this.eventCount,
      truncated,
      unknownTags: Object.freeze([...this.unknownTags].sort()),
    });
  }

  private increment(name: MetricName): void {
    this.counts.set(name, (this.counts.get(name) ?? 0) + 1);
  }
}

/**
 * Aggregate an already materialized event list
 */
export function ingestEvents(
  events: Iterable<RawInstrumentationEvent>,
  options: IngestOptions & { truncated?: boolean } = {},
): DynamicIngestResult {
  const aggregator = new DynamicMetricAggregator(options);
  for (const raw of events) {
    aggregator.addRaw(raw);
  }
  return aggregator.finish(options.truncated ?? false);
}
