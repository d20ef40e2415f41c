import pino, { type Logger } from 'pino';
import { DEFAULT_METRIC_CATALOG } from '../catalog/defaultCatalog.js';
import type { MetricCatalog } from '../catalog/metricCatalog.js';
import { collectInstrumentationEvents } from '../dynamic/collectEvents.js';
import { ingestEvents, type DynamicIngestResult } from '../dynamic/ingestEvents.js';
import type { ThreatIntel } from '../dynamic/threatIntel.js';
import { MandatoryExtractorMissingError, PipelineStateError, RiskEngineError } from '../errors.js';
import { adaptExtractorResults, type AdaptedStaticMetrics } from '../extractors/adaptExtractorResults.js';
import {
  EXTRACTOR_FEATURES,
  createFeatureAvailability,
  narrowFeatureAvailability,
  type FeatureAvailability,
} from '../features/featureAvailability.js';
import { generateRationale, type Rationale } from '../rationale/generateRationale.js';
import type { Notice, RiskAssessment } from '../schemas/assessment.js';
import { EXTRACTOR_NAMES, isMandatoryExtractor, type ExtractorName } from '../schemas/extractors.js';
import type { AssessmentJob } from '../schemas/job.js';
import type { ScoringOverrides } from '../schemas/scoring.js';
import { normalizeMetrics } from '../scoring/normalizeMetrics.js';
import { scoreMetrics, type ScoreResult } from '../scoring/scoreMetrics.js';
import {
  mergeScoringOverrides,
  resolveScoringConfig,
  type EffectiveScoringConfig,
} from '../scoring/scoringConfig.js';
import { canonicalJson, sha256Hex } from '../utils/canonical.js';
import { deepFreeze } from '../utils/freeze.js';
import { PipelineStateMachine, type PipelineState, type StateTransition } from './pipelineState.js';

export const ASSESSMENT_VERSION = '0.1.0' as const;
export const DEFAULT_DYNAMIC_TIMEOUT_MS = 60_000;

const SILENT_LOGGER = pino({ level: 'silent' });

const TRUNCATED_NOTICE: Notice = Object.freeze({
  code: 'DYNAMIC_ANALYSIS_TRUNCATED',
  message: 'dynamic analysis truncated',
});

const SKIPPED_NOTICE: Notice = Object.freeze({
  code: 'DYNAMIC_ANALYSIS_SKIPPED',
  message: 'dynamic analysis skipped: no instrumentation events supplied',
});

/**
 * Collaborator that runs a static extractor on demand
 */
export interface StaticExtractionSource {
  extract(extractor: ExtractorName): Promise<unknown>;
}

export interface PipelineOptions {
  catalog?: MetricCatalog;
  /** Service-level overrides; job overrides win key by key */
  defaults?: ScoringOverrides;
  /** Service capabilities, checked once at start; job.features can only narrow them */
  features?: FeatureAvailability;
  /** Called for extractors the job did not supply a result for */
  extraction?: StaticExtractionSource;
  intel?: ThreatIntel;
  dynamicTimeoutMs?: number;
  logger?: Logger;
  /** Clock in unix milliseconds */
  now?: () => number;
}

interface DynamicCollection {
  readonly result: DynamicIngestResult;
  readonly notices: readonly Notice[];
}

/**
 * Runs one assessment job through Collecting → Normalizing → Scoring → Done.
 *
 * An instance is single-use; its state and transition history stay readable
 * after run() settles. Configuration and mandatory-input errors move it to
 * Failed and are rethrown unchanged.
 */
export class AssessmentPipeline {
  private readonly machine: PipelineStateMachine;
  private readonly catalog: MetricCatalog;
  private readonly now: () => number;
  private started = false;
  private failure: Error | undefined;

  constructor(private readonly options: PipelineOptions = {}) {
    this.now = options.now ?? Date.now;
    this.machine = new PipelineStateMachine(this.now);
    this.catalog = options.catalog ?? DEFAULT_METRIC_CATALOG;
  }

  get state(): PipelineState {
    return this.machine.state;
  }

  get transitions(): readonly StateTransition[] {
    return this.machine.transitions;
  }

  /** Cause of the Failed state, if any */
  get error(): Error | undefined {
    return this.failure;
  }

  async run(job: AssessmentJob): Promise<RiskAssessment> {
    if (this.started) {
      throw new PipelineStateError(this.machine.state, 'Collecting');
    }
    this.started = true;

    const log = (this.options.logger ?? SILENT_LOGGER).child({ jobId: job.jobId ?? null });
    const abort = new AbortController();

    try {
      // Resolved up front so a bad override fails before any extractor runs
      const config = resolveScoringConfig(
        mergeScoringOverrides(this.options.defaults, job.configOverrides),
        this.catalog,
      );
      const features = narrowFeatureAvailability(
        this.options.features ?? createFeatureAvailability(),
        job.features,
      );
      const [adapted, dynamic] = await Promise.all([
        this.collectStatic(job, features, log),
        this.collectDynamic(job, abort.signal, log),
      ]);
      this.advance('Normalizing', log);

      const normalized = normalizeMetrics([...adapted.metrics, ...dynamic.result.metrics], config);
      this.advance('Scoring', log);

      const result = scoreMetrics(normalized, config);
      const rationale = generateRationale(result, config);
      const assessment = this.buildAssessment(job, config, result, rationale, [
        ...adapted.notices,
        ...dynamic.notices,
      ], dynamic.result);
      this.advance('Done', log);

      log.info(
        { assessmentId: assessment.assessmentId, score: assessment.score, label: assessment.label },
        'Assessment complete',
      );
      return assessment;
    } catch (error) {
      abort.abort();
      this.fail(error, log);
      throw error;
    }
  }

  // ── Collecting ─────────────────────────────────────────────────

  private async collectStatic(
    job: AssessmentJob,
    features: FeatureAvailability,
    log: Logger,
  ): Promise<AdaptedStaticMetrics> {
    const provided = job.staticResults ?? {};
    const results = this.options.extraction
      ? { ...provided, ...(await this.runExtractors(this.options.extraction, provided, features, log)) }
      : provided;

    return adaptExtractorResults(results, { catalog: this.catalog, features, logger: log });
  }

  private async runExtractors(
    extraction: StaticExtractionSource,
    provided: Readonly<Record<string, unknown>>,
    features: FeatureAvailability,
    log: Logger,
  ): Promise<Record<string, unknown>> {
    const pending = EXTRACTOR_NAMES.filter(
      (name) =>
        !Object.hasOwn(provided, name) &&
        (isMandatoryExtractor(name) || features.isAvailable(EXTRACTOR_FEATURES[name])),
    );

    const settled = await Promise.allSettled(pending.map((name) => extraction.extract(name)));

    const entries: [ExtractorName, unknown][] = [];
    settled.forEach((outcome, i) => {
      const name = pending[i];
      if (name === undefined) return;
      if (outcome.status === 'fulfilled') {
        entries.push([name, outcome.value]);
        return;
      }
      if (isMandatoryExtractor(name)) {
        throw new MandatoryExtractorMissingError(name, 'unavailable', { cause: outcome.reason });
      }
      log.warn({ extractor: name, err: outcome.reason }, 'Optional extractor failed');
      entries.push([
        name,
        {
          status: 'unavailable',
          reason: outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason),
        },
      ]);
    });

    return Object.fromEntries(entries);
  }

  private async collectDynamic(
    job: AssessmentJob,
    signal: AbortSignal,
    log: Logger,
  ): Promise<DynamicCollection> {
    const ingestOptions = { catalog: this.catalog, intel: this.options.intel, logger: log };

    if (job.dynamicEvents === undefined) {
      log.info('No instrumentation events supplied; dynamic analysis skipped');
      return { result: ingestEvents([], ingestOptions), notices: [SKIPPED_NOTICE] };
    }

    const result = await collectInstrumentationEvents(job.dynamicEvents, {
      ...ingestOptions,
      timeoutMs: this.options.dynamicTimeoutMs ?? DEFAULT_DYNAMIC_TIMEOUT_MS,
      truncated: job.dynamicTruncated ?? false,
      signal,
    });

    if (result.truncated) {
      log.warn({ eventCount: result.eventCount }, TRUNCATED_NOTICE.message);
      return { result, notices: [TRUNCATED_NOTICE] };
    }
    return { result, notices: [] };
  }

  // ── Output ─────────────────────────────────────────────────────

  private buildAssessment(
    job: AssessmentJob,
    config: EffectiveScoringConfig,
    result: ScoreResult,
    rationale: Rationale,
    notices: readonly Notice[],
    dynamic: DynamicIngestResult,
  ): RiskAssessment {
    // Hashed without generatedAt so identical inputs share an id
    const payload = {
      assessmentVersion: ASSESSMENT_VERSION,
      jobId: job.jobId ?? null,
      score: result.score,
      label: rationale.label,
      summary: rationale.summary,
      rationale: rationale.entries,
      breakdown: result.breakdown,
      excludedMetrics: result.excludedMetrics,
      notices,
      dynamic: {
        eventCount: dynamic.eventCount,
        truncated: dynamic.truncated,
        unknownTags: dynamic.unknownTags,
      },
      unavailablePolicy: config.unavailablePolicy,
    };

    const assessment: RiskAssessment = {
      ...payload,
      assessmentId: sha256Hex(canonicalJson(payload)),
      generatedAt: Math.floor(this.now() / 1000),
    };
    return deepFreeze(assessment);
  }

  // ── State ──────────────────────────────────────────────────────

  private advance(to: PipelineState, log: Logger): void {
    const from = this.machine.state;
    this.machine.transition(to);
    log.debug({ from, to }, 'Pipeline transition');
  }

  private fail(error: unknown, log: Logger): void {
    this.failure = error instanceof Error ? error : new Error(String(error));
    if (this.machine.canTransition('Failed')) {
      this.machine.transition('Failed');
    }
    if (error instanceof RiskEngineError) {
      log.warn({ code: error.code, err: error }, 'Assessment failed');
    } else {
      log.error({ err: error }, 'Assessment failed unexpectedly');
    }
  }
}

/**
 * Run a single job with a fresh pipeline
 */
export async function assessApplication(
  job: AssessmentJob,
  options: PipelineOptions = {},
): Promise<RiskAssessment> {
  return new AssessmentPipeline(options).run(job);
}
