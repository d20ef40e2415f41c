import type { z } from 'zod';
import {
  CertificatesResultSchema,
  DependenciesResultSchema,
  ManifestResultSchema,
  NetworkSecurityResultSchema,
  PermissionsResultSchema,
  SecretsResultSchema,
  SignatureResultSchema,
  YaraResultSchema,
  type ExtractorName,
  type ExtractorResults,
} from '../schemas/extractors.js';
import type { MetricName } from '../schemas/metric.js';

export type MetricReadings = Partial<Record<MetricName, number | boolean>>;

function ratio(part: number, total: number): number {
  return total === 0 ? 0 : part / total;
}

// ── Per-extractor conversions ────────────────────────────────────

function convertManifest(result: ExtractorResults['manifest']): MetricReadings {
  const exported = result.components.filter((c) => c.exported).length;
  return { component_exposure: ratio(exported, result.components.length) };
}

function convertPermissions(result: ExtractorResults['permissions']): MetricReadings {
  const dangerous = result.permissions.filter((p) => p.dangerous).length;
  return { permission_density: ratio(dangerous, result.permissions.length) };
}

/**
 * An empty result means no network security config was found: nothing is flagged.
 */
function convertNetworkSecurity(result: ExtractorResults['network_security']): MetricReadings {
  const configured =
    result.cleartextPermitted !== undefined ||
    result.certificatePinning !== undefined ||
    result.debugOverrides !== undefined;
  if (!configured) {
    return {};
  }
  return {
    cleartext_traffic_permitted: result.cleartextPermitted === true,
    missing_certificate_pinning: result.certificatePinning !== true,
    debug_overrides: result.debugOverrides === true,
  };
}

function convertSecrets(result: ExtractorResults['secrets']): MetricReadings {
  return { hardcoded_secret_count: result.findings.length };
}

function convertDependencies(result: ExtractorResults['dependencies']): MetricReadings {
  return { vulnerable_dependency_count: result.vulnerabilities.length };
}

function convertCertificates(result: ExtractorResults['certificates']): MetricReadings {
  return {
    expired_certificate: result.expired,
    self_signed_certificate: result.selfSigned,
  };
}

function convertSignature(result: ExtractorResults['signature']): MetricReadings {
  return { untrusted_signature: !result.trusted };
}

function convertYara(result: ExtractorResults['yara']): MetricReadings {
  let hits = 0;
  for (const rules of Object.values(result.matches)) {
    hits += rules.length;
  }
  return { yara_match_count: hits };
}

// ── Registry ─────────────────────────────────────────────────────

export type ConversionResult =
  | { readonly success: true; readonly readings: MetricReadings }
  | { readonly success: false; readonly error: z.ZodError };

export interface ResultConverter {
  readonly extractor: ExtractorName;
  /** Validate a raw result and turn it into metric readings */
  convert(raw: unknown): ConversionResult;
}

function defineConverter<T>(
  extractor: ExtractorName,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  toReadings: (result: T) => MetricReadings,
): ResultConverter {
  return Object.freeze({
    extractor,
    convert(raw: unknown): ConversionResult {
      const parsed = schema.safeParse(raw);
      if (!parsed.success) {
        return { success: false, error: parsed.error };
      }
      return { success: true, readings: toReadings(parsed.data) };
    },
  });
}

export const RESULT_CONVERTERS: Readonly<Record<ExtractorName, ResultConverter>> = Object.freeze({
  manifest: defineConverter('manifest', ManifestResultSchema, convertManifest),
  permissions: defineConverter('permissions', PermissionsResultSchema, convertPermissions),
  network_security: defineConverter('network_security', NetworkSecurityResultSchema, convertNetworkSecurity),
  secrets: defineConverter('secrets', SecretsResultSchema, convertSecrets),
  dependencies: defineConverter('dependencies', DependenciesResultSchema, convertDependencies),
  certificates: defineConverter('certificates', CertificatesResultSchema, convertCertificates),
  signature: defineConverter('signature', SignatureResultSchema, convertSignature),
  yara: defineConverter('yara', YaraResultSchema, convertYara),
});
