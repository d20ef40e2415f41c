import { ConfigurationError } from '../errors.js';
import type { ExtractorName } from '../schemas/extractors.js';
import type { MetricKind, MetricName, MetricSource } from '../schemas/metric.js';

export type MetricOrigin = ExtractorName | 'instrumentation';

export interface MetricSpec {
  readonly name: MetricName;
  readonly kind: MetricKind;
  readonly source: MetricSource;
  /** Extractor (or the instrumentation stream) that yields this metric */
  readonly origin: MetricOrigin;
  readonly defaultWeight: number;
  /** Ceiling for count metrics; required for them, forbidden otherwise */
  readonly cap?: number;
  readonly description: string;
  /** Phrase the rationale uses when this metric drives the score */
  readonly reason: string;
}

const WEIGHT_SUM_TOLERANCE = 1e-9;

/**
 * Immutable table of metric definitions, default weights and caps.
 *
 * Declaration order is significant: scoring sums in this order and the
 * rationale breaks ties by it.
 */
export class MetricCatalog {
  readonly specs: readonly MetricSpec[];
  readonly totalWeight: number;
  private readonly byName: ReadonlyMap<MetricName, MetricSpec>;
  private readonly order: ReadonlyMap<MetricName, number>;
  private readonly names: ReadonlySet<string>;

  constructor(specs: readonly MetricSpec[]) {
    const issues: string[] = [];
    const byName = new Map<MetricName, MetricSpec>();
    const order = new Map<MetricName, number>();
    let totalWeight = 0;

    specs.forEach((spec, index) => {
      if (byName.has(spec.name)) {
        issues.push(`${spec.name}: declared more than once`);
        return;
      }
      if (!Number.isFinite(spec.defaultWeight) || spec.defaultWeight < 0 || spec.defaultWeight > 1) {
        issues.push(`${spec.name}: default weight must be within [0, 1], got ${spec.defaultWeight}`);
      }
      if (spec.kind === 'count') {
        if (spec.cap === undefined || !Number.isInteger(spec.cap) || spec.cap < 0) {
          issues.push(`${spec.name}: count metrics need a non-negative integer cap`);
        }
      } else if (spec.cap !== undefined) {
        issues.push(`${spec.name}: only count metrics take a cap`);
      }
      if (spec.source === 'dynamic' && spec.origin !== 'instrumentation') {
        issues.push(`${spec.name}: dynamic metrics must originate from instrumentation`);
      }
      byName.set(spec.name, Object.freeze({ ...spec }));
      order.set(spec.name, index);
      totalWeight += spec.defaultWeight;
    });

    if (specs.length > 0 && Math.abs(totalWeight - 1) > WEIGHT_SUM_TOLERANCE) {
      issues.push(`default weights must sum to 1, got ${totalWeight}`);
    }

    if (issues.length > 0) {
      throw new ConfigurationError(issues);
    }

    this.specs = Object.freeze([...byName.values()]);
    this.totalWeight = totalWeight;
    this.byName = byName;
    this.order = order;
    this.names = new Set<string>(byName.keys());
    Object.freeze(this);
  }

  has(name: string): name is MetricName {
    return this.names.has(name);
  }

  get(name: MetricName): MetricSpec | undefined {
    return this.byName.get(name);
  }

  /** Declaration index, used for stable tie-breaking */
  indexOf(name: MetricName): number {
    return this.order.get(name) ?? Number.MAX_SAFE_INTEGER;
  }

  fromOrigin(origin: MetricOrigin): MetricSpec[] {
    return this.specs.filter((spec) => spec.origin === origin);
  }
}
