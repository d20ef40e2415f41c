import { describe, it, expect } from 'vitest';
import {
  DEFAULT_METRIC_CATALOG,
  MandatoryExtractorMissingError,
  RESULT_CONVERTERS,
  adaptExtractorResults,
  createFeatureAvailability,
  type AdaptedStaticMetrics,
  type MetricName,
} from '../src/index.js';
import { captureLogger, fullStaticResults, manifestResult, permissionsResult } from './fixtures.js';

function adapt(results: Record<string, unknown>, features = createFeatureAvailability()): AdaptedStaticMetrics {
  return adaptExtractorResults(results, { catalog: DEFAULT_METRIC_CATALOG, features });
}

function valuesOf(adapted: AdaptedStaticMetrics): Partial<Record<MetricName, number | boolean>> {
  return Object.fromEntries(adapted.metrics.filter((m) => m.available).map((m) => [m.name, m.rawValue]));
}

function mandatoryError(results: Record<string, unknown>): MandatoryExtractorMissingError | undefined {
  try {
    adapt(results);
  } catch (error) {
    if (error instanceof MandatoryExtractorMissingError) return error;
    throw error;
  }
  return undefined;
}

describe('RESULT_CONVERTERS', () => {
  it('computes component exposure from exported components', () => {
    expect(RESULT_CONVERTERS.manifest.convert(manifestResult)).toEqual({
      success: true,
      readings: { component_exposure: 0.5 },
    });
  });

  it('computes permission density from dangerous permissions', () => {
    expect(RESULT_CONVERTERS.permissions.convert(permissionsResult)).toEqual({
      success: true,
      readings: { permission_density: 0.6 },
    });
  });

  it('reads zero density for an app without permissions', () => {
    expect(RESULT_CONVERTERS.permissions.convert({ permissions: [] })).toEqual({
      success: true,
      readings: { permission_density: 0 },
    });
  });

  it('flags missing pinning only when a network config exists', () => {
    expect(RESULT_CONVERTERS.network_security.convert({})).toEqual({ success: true, readings: {} });
    expect(RESULT_CONVERTERS.network_security.convert({ cleartextPermitted: false })).toEqual({
      success: true,
      readings: {
        cleartext_traffic_permitted: false,
        missing_certificate_pinning: true,
        debug_overrides: false,
      },
    });
  });

  it('counts YARA hits across files', () => {
    expect(
      RESULT_CONVERTERS.yara.convert({ matches: { 'a.dex': ['R1', 'R2'], 'b.so': ['R3'], 'c.xml': [] } }),
    ).toEqual({ success: true, readings: { yara_match_count: 3 } });
  });

  it('maps trust to untrusted_signature', () => {
    expect(RESULT_CONVERTERS.signature.convert({ valid: true, trusted: true })).toEqual({
      success: true,
      readings: { untrusted_signature: false },
    });
  });

  it('rejects malformed results', () => {
    const converted = RESULT_CONVERTERS.secrets.convert({ findings: 'token' });
    expect(converted.success).toBe(false);
  });
});

describe('adaptExtractorResults', () => {
  it('converts every extractor result into metric values', () => {
    const adapted = adapt(fullStaticResults());

    expect(adapted.notices).toEqual([]);
    expect(adapted.unavailableExtractors).toEqual([]);
    expect(valuesOf(adapted)).toEqual({
      permission_density: 0.6,
      component_exposure: 0.5,
      vulnerable_dependency_count: 1,
      yara_match_count: 3,
      hardcoded_secret_count: 2,
      untrusted_signature: true,
      cleartext_traffic_permitted: true,
      missing_certificate_pinning: true,
      debug_overrides: false,
      expired_certificate: false,
      self_signed_certificate: true,
    });
  });

  it('emits only static metrics', () => {
    const adapted = adapt(fullStaticResults());
    expect(adapted.metrics.every((m) => m.source === 'static')).toBe(true);
    expect(adapted.metrics).toHaveLength(11);
  });

  it('marks an unavailable optional extractor and records a notice', () => {
    const adapted = adapt({ ...fullStaticResults(), yara: 'unavailable' });

    expect(adapted.unavailableExtractors).toEqual(['yara']);
    expect(adapted.notices).toEqual([
      {
        code: 'OPTIONAL_FEATURE_UNAVAILABLE',
        message:
          'Optional feature unavailable: `yara` — skipping. Install `yara-python` to enable `YARA rule scanning`.',
        feature: 'yara',
        extractor: 'yara',
      },
    ]);
    expect(adapted.metrics.find((m) => m.name === 'yara_match_count')).toEqual({
      name: 'yara_match_count',
      rawValue: 0,
      kind: 'count',
      source: 'static',
      available: false,
    });
  });

  it('accepts the structured unavailable marker', () => {
    const adapted = adapt({
      ...fullStaticResults(),
      signature: { status: 'unavailable', reason: 'apksigtool not installed' },
    });
    expect(adapted.unavailableExtractors).toEqual(['signature']);
    expect(adapted.notices[0]?.message).toBe(
      'Optional feature unavailable: `apksigtool` — skipping. Install `apksigtool` to enable `APK signature verification`.',
    );
  });

  it('ignores results for a feature declared unavailable', () => {
    const adapted = adapt(fullStaticResults(), createFeatureAvailability({ 'certificate-parser': false }));
    expect(adapted.unavailableExtractors).toEqual(['certificates']);
    const unavailable = adapted.metrics.filter((m) => !m.available).map((m) => m.name);
    expect(unavailable).toEqual(['expired_certificate', 'self_signed_certificate']);
  });

  it('treats absent optional results as unavailable', () => {
    const adapted = adapt({ manifest: manifestResult, permissions: permissionsResult });
    expect(adapted.unavailableExtractors).toEqual([
      'network_security',
      'secrets',
      'dependencies',
      'certificates',
      'signature',
      'yara',
    ]);
    expect(adapted.notices).toHaveLength(6);
  });

  it('treats a malformed optional result as unavailable and logs it', () => {
    const { logger, entries } = captureLogger();
    const adapted = adaptExtractorResults(
      { ...fullStaticResults(), secrets: { findings: 42 } },
      { catalog: DEFAULT_METRIC_CATALOG, features: createFeatureAvailability(), logger },
    );

    expect(adapted.unavailableExtractors).toEqual(['secrets']);
    const warnings = entries.filter((e) => e.level === 40);
    expect(warnings.map((e) => e.msg)).toEqual(['Discarding malformed optional extractor result']);
    expect(warnings[0]?.extractor).toBe('secrets');
  });

  it('logs result keys that match no extractor', () => {
    const { logger, entries } = captureLogger();
    adaptExtractorResults(
      { ...fullStaticResults(), obfuscation: { score: 3 } },
      { catalog: DEFAULT_METRIC_CATALOG, features: createFeatureAvailability(), logger },
    );
    expect(entries.find((e) => e.msg === 'Ignoring result from unknown extractor')?.extractor).toBe('obfuscation');
  });

  it('fails when the manifest is absent', () => {
    const error = mandatoryError({ permissions: permissionsResult });
    expect(error?.extractor).toBe('manifest');
    expect(error?.reason).toBe('absent');
    expect(error?.code).toBe('MANDATORY_EXTRACTOR_MISSING');
  });

  it('fails when permissions are marked unavailable', () => {
    const error = mandatoryError({ manifest: manifestResult, permissions: 'unavailable' });
    expect(error?.extractor).toBe('permissions');
    expect(error?.reason).toBe('unavailable');
  });

  it('fails when a mandatory result is malformed', () => {
    const error = mandatoryError({ manifest: manifestResult, permissions: { permissions: 'many' } });
    expect(error?.reason).toBe('malformed');
    expect(error?.message).toBe("Mandatory extractor 'permissions' is malformed");
  });
});
