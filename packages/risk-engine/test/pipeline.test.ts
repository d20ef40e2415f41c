import { describe, it, expect, vi } from 'vitest';
import {
  AssessmentPipeline,
  ConfigurationError,
  MandatoryExtractorMissingError,
  PipelineStateError,
  RiskAssessmentSchema,
  assessApplication,
  parseIntelFeed,
  probeFeatureAvailability,
  type AssessmentJob,
  type ExtractorName,
  type PipelineOptions,
} from '../src/index.js';
import {
  fullStaticResults,
  manifestResult,
  permissionsResult,
  sampleEvents,
  sampleIntelFeed,
  stalledStream,
} from './fixtures.js';

const intel = parseIntelFeed(sampleIntelFeed);
const FIXED_NOW = 1_700_000_000_000;

function fullJob(overrides: Partial<AssessmentJob> = {}): AssessmentJob {
  return {
    jobId: 'job-1',
    staticResults: fullStaticResults(),
    dynamicEvents: sampleEvents,
    ...overrides,
  };
}

function options(overrides: PipelineOptions = {}): PipelineOptions {
  return { intel, now: () => FIXED_NOW, ...overrides };
}

describe('AssessmentPipeline', () => {
  it('scores a complete job', async () => {
    const pipeline = new AssessmentPipeline(options());
    const assessment = await pipeline.run(fullJob());

    expect(assessment.score).toBe(35);
    expect(assessment.label).toBe('Low');
    expect(assessment.jobId).toBe('job-1');
    expect(assessment.generatedAt).toBe(1_700_000_000);
    expect(assessment.summary).toBe(
      'Low risk (35/100): elevated permission density, many exported components, untrusted or missing signature',
    );
    expect(assessment.rationale.map((r) => r.metric)).toEqual([
      'permission_density',
      'component_exposure',
      'untrusted_signature',
      'cleartext_traffic_permitted',
      'missing_certificate_pinning',
      'self_signed_certificate',
      'cleartext_endpoint_count',
      'yara_match_count',
      'malicious_endpoint_count',
      'permission_invocation_count',
      'hardcoded_secret_count',
      'vulnerable_dependency_count',
      'file_write_count',
    ]);
    expect(assessment.rationale[0]?.contribution).toBe(13.8);
    expect(assessment.rationale[0]?.explanation).toBe(
      'permission_density contributed 39% of the score due to elevated permission density',
    );
    expect(assessment.breakdown.yara_match_count).toBe(1.5);
    expect(assessment.breakdown.other_event_count).toBe(0);
    expect(assessment.dynamic).toEqual({ eventCount: 7, truncated: false, unknownTags: ['CRYPTO'] });
    expect(assessment.notices).toEqual([]);
    expect(assessment.excludedMetrics).toEqual([]);
    expect(assessment.unavailablePolicy).toBe('redistribute');

    expect(pipeline.state).toBe('Done');
    expect(pipeline.transitions.map((t) => `${t.from}->${t.to}`)).toEqual([
      'Collecting->Normalizing',
      'Normalizing->Scoring',
      'Scoring->Done',
    ]);
  });

  it('produces output that matches the assessment schema', async () => {
    const assessment = await assessApplication(fullJob(), options());
    expect(RiskAssessmentSchema.safeParse(assessment).success).toBe(true);
  });

  it('redistributes the weight of an unavailable optional extractor', async () => {
    const assessment = await assessApplication(
      fullJob({ staticResults: { ...fullStaticResults(), yara: 'unavailable' } }),
      options(),
    );

    expect(assessment.score).toBe(35);
    expect('yara_match_count' in assessment.breakdown).toBe(false);
    expect(assessment.excludedMetrics).toEqual(['yara_match_count']);
    expect(assessment.notices).toEqual([
      {
        code: 'OPTIONAL_FEATURE_UNAVAILABLE',
        message:
          'Optional feature unavailable: `yara` — skipping. Install `yara-python` to enable `YARA rule scanning`.',
        feature: 'yara',
        extractor: 'yara',
      },
    ]);
  });

  it('fails on an invalid override before collecting', async () => {
    const pipeline = new AssessmentPipeline(options());
    const job = fullJob({ configOverrides: { weights: { nonexistent_metric: 0.3 } } });

    await expect(pipeline.run(job)).rejects.toBeInstanceOf(ConfigurationError);
    expect(pipeline.state).toBe('Failed');
    expect(pipeline.error).toBeInstanceOf(ConfigurationError);
    expect(pipeline.transitions.map((t) => `${t.from}->${t.to}`)).toEqual(['Collecting->Failed']);
  });

  it('rejects an invalid override without running extractors or reading events', async () => {
    const extract = vi.fn(async (name: ExtractorName): Promise<unknown> => fullStaticResults()[name]);
    const pipeline = new AssessmentPipeline(options({ extraction: { extract }, dynamicTimeoutMs: 5_000 }));
    const job = fullJob({
      staticResults: {},
      dynamicEvents: stalledStream(sampleEvents),
      configOverrides: { weights: { nonexistent_metric: 0.3 } },
    });

    const started = Date.now();
    await expect(pipeline.run(job)).rejects.toBeInstanceOf(ConfigurationError);
    expect(Date.now() - started).toBeLessThan(1_000);
    expect(extract).not.toHaveBeenCalled();
    expect(pipeline.transitions.map((t) => t.to)).toEqual(['Failed']);
  });

  it('fails when a mandatory extractor is absent', async () => {
    const pipeline = new AssessmentPipeline(options());
    const { manifest: _manifest, ...withoutManifest } = fullStaticResults();

    await expect(pipeline.run(fullJob({ staticResults: withoutManifest }))).rejects.toMatchObject({
      code: 'MANDATORY_EXTRACTOR_MISSING',
      extractor: 'manifest',
      reason: 'absent',
    });
    expect(pipeline.transitions.map((t) => `${t.from}->${t.to}`)).toEqual(['Collecting->Failed']);
  });

  it('does not wait on the dynamic stream once collection fails', async () => {
    const pipeline = new AssessmentPipeline(options({ dynamicTimeoutMs: 5_000 }));
    const job = fullJob({
      staticResults: { manifest: manifestResult, permissions: 'unavailable' },
      dynamicEvents: stalledStream(sampleEvents),
    });

    await expect(pipeline.run(job)).rejects.toBeInstanceOf(MandatoryExtractorMissingError);
    expect(pipeline.state).toBe('Failed');
  });

  it('refuses to run twice', async () => {
    const pipeline = new AssessmentPipeline(options());
    await pipeline.run(fullJob());

    await expect(pipeline.run(fullJob())).rejects.toThrow(
      new PipelineStateError('Done', 'Collecting').message,
    );
    expect(pipeline.state).toBe('Done');
  });

  it('scores a zero policy with unavailable metrics held at zero', async () => {
    const assessment = await assessApplication(
      fullJob({
        staticResults: { ...fullStaticResults(), yara: 'unavailable' },
        configOverrides: { unavailablePolicy: 'zero' },
      }),
      options(),
    );
    expect(assessment.score).toBe(34);
    expect(assessment.breakdown.yara_match_count).toBe(0);
    expect(assessment.unavailablePolicy).toBe('zero');
  });

  it('applies service defaults under job overrides', async () => {
    const defaults = { bands: { medium: 10, high: 20 } };
    const high = await assessApplication(fullJob(), options({ defaults }));
    const medium = await assessApplication(
      fullJob({ configOverrides: { bands: { high: 50 } } }),
      options({ defaults }),
    );

    expect(high.label).toBe('High');
    expect(medium.label).toBe('Medium');
  });
});

describe('dynamic collection', () => {
  it('flags a stream cut off by the timeout', async () => {
    const assessment = await assessApplication(
      fullJob({ dynamicEvents: stalledStream(sampleEvents) }),
      options({ dynamicTimeoutMs: 30 }),
    );

    expect(assessment.score).toBe(35);
    expect(assessment.dynamic.truncated).toBe(true);
    expect(assessment.dynamic.eventCount).toBe(7);
    expect(assessment.notices).toEqual([
      { code: 'DYNAMIC_ANALYSIS_TRUNCATED', message: 'dynamic analysis truncated' },
    ]);
  });

  it('keeps a truncation reported by the sandbox', async () => {
    const assessment = await assessApplication(fullJob({ dynamicTruncated: true }), options());
    expect(assessment.dynamic.truncated).toBe(true);
    expect(assessment.notices.map((n) => n.code)).toEqual(['DYNAMIC_ANALYSIS_TRUNCATED']);
  });

  it('scores dynamic metrics as zero when no events are supplied', async () => {
    const assessment = await assessApplication(fullJob({ dynamicEvents: undefined }), options());

    expect(assessment.score).toBe(32);
    expect(assessment.dynamic).toEqual({ eventCount: 0, truncated: false, unknownTags: [] });
    expect(assessment.notices).toEqual([
      {
        code: 'DYNAMIC_ANALYSIS_SKIPPED',
        message: 'dynamic analysis skipped: no instrumentation events supplied',
      },
    ]);
  });
});

describe('static extraction source', () => {
  const results = fullStaticResults();

  it('runs only extractors whose results and features are missing', async () => {
    const extract = vi.fn(async (name: ExtractorName): Promise<unknown> => {
      if (name === 'signature') throw new Error('apksigtool crashed');
      return results[name];
    });

    const assessment = await assessApplication(
      fullJob({
        staticResults: { manifest: manifestResult, permissions: permissionsResult },
        features: { yara: false },
      }),
      options({ extraction: { extract } }),
    );

    expect(extract.mock.calls.map(([name]) => name).sort()).toEqual([
      'certificates',
      'dependencies',
      'network_security',
      'secrets',
      'signature',
    ]);
    expect(assessment.notices.map((n) => n.extractor)).toEqual(['signature', 'yara']);
    expect(assessment.excludedMetrics).toEqual(['yara_match_count', 'untrusted_signature']);
  });

  it('skips extractors the service lacks even when the job asks for them', async () => {
    const extract = vi.fn(async (name: ExtractorName): Promise<unknown> => results[name]);
    const service = await probeFeatureAvailability((feature) => feature !== 'yara');

    const assessment = await assessApplication(
      fullJob({
        staticResults: { manifest: manifestResult, permissions: permissionsResult },
        features: { yara: true },
      }),
      options({ extraction: { extract }, features: service }),
    );

    expect(extract.mock.calls.map(([name]) => name)).not.toContain('yara');
    expect(assessment.excludedMetrics).toEqual(['yara_match_count']);
  });

  it('fails when a mandatory extractor cannot run', async () => {
    const extract = vi.fn(async (name: ExtractorName): Promise<unknown> => {
      if (name === 'manifest') throw new Error('aapt missing');
      return results[name];
    });

    const pipeline = new AssessmentPipeline(options({ extraction: { extract } }));
    await expect(pipeline.run(fullJob({ staticResults: {} }))).rejects.toMatchObject({
      extractor: 'manifest',
      reason: 'unavailable',
    });
  });
});

describe('assessment output', () => {
  it('derives the id from content, not from the clock', async () => {
    const first = await assessApplication(fullJob(), options({ now: () => FIXED_NOW }));
    const second = await assessApplication(fullJob(), options({ now: () => FIXED_NOW + 60_000 }));

    expect(first.generatedAt).not.toBe(second.generatedAt);
    expect(first.assessmentId).toBe(second.assessmentId);
    expect(first.assessmentId).toMatch(/^[0-9a-f]{64}$/);
  });

  it('changes the id when the job id changes', async () => {
    const first = await assessApplication(fullJob(), options());
    const second = await assessApplication(fullJob({ jobId: 'job-2' }), options());
    expect(first.assessmentId).not.toBe(second.assessmentId);
  });

  it('is deeply frozen', async () => {
    const assessment = await assessApplication(fullJob(), options());

    expect(Object.isFrozen(assessment)).toBe(true);
    expect(Object.isFrozen(assessment.breakdown)).toBe(true);
    expect(Object.isFrozen(assessment.rationale[0])).toBe(true);
    expect(Object.isFrozen(assessment.dynamic.unknownTags)).toBe(true);
  });
});
