import { z } from 'zod';

// ── Extractor names ──────────────────────────────────────────────

export const EXTRACTOR_NAMES = [
  'manifest',
  'permissions',
  'network_security',
  'secrets',
  'dependencies',
  'certificates',
  'signature',
  'yara',
] as const;

export const ExtractorNameSchema = z.enum(EXTRACTOR_NAMES);
export type ExtractorName = z.infer<typeof ExtractorNameSchema>;

/** Extractors without which no assessment is produced */
export const MANDATORY_EXTRACTORS = ['manifest', 'permissions'] as const;
export type MandatoryExtractorName = (typeof MANDATORY_EXTRACTORS)[number];
export type OptionalExtractorName = Exclude<ExtractorName, MandatoryExtractorName>;

export function isMandatoryExtractor(name: ExtractorName): name is MandatoryExtractorName {
  return name === 'manifest' || name === 'permissions';
}

// ── Optional capabilities ────────────────────────────────────────

export const FEATURE_NAMES = [
  'apktool',
  'jadx',
  'androguard',
  'apksigtool',
  'certificate-parser',
  'yara',
] as const;

export const FeatureNameSchema = z.enum(FEATURE_NAMES);
export type FeatureName = z.infer<typeof FeatureNameSchema>;

// ── Raw results ──────────────────────────────────────────────────

/**
 * Explicit marker an extraction collaborator returns when it could not run.
 */
export const UnavailableMarkerSchema = z.union([
  z.literal('unavailable'),
  z.object({
    status: z.literal('unavailable'),
    reason: z.string().optional(),
  }),
]);
export type UnavailableMarker = z.infer<typeof UnavailableMarkerSchema>;

export function isUnavailableMarker(value: unknown): value is UnavailableMarker {
  return UnavailableMarkerSchema.safeParse(value).success;
}

export const ManifestResultSchema = z.object({
  packageName: z.string().optional(),
  components: z
    .array(
      z.object({
        name: z.string().min(1),
        type: z.enum(['activity', 'service', 'receiver', 'provider']),
        exported: z.boolean().default(false),
      }),
    )
    .default([]),
});

export const PermissionsResultSchema = z.object({
  permissions: z.array(
    z.object({
      name: z.string().min(1),
      dangerous: z.boolean().default(false),
    }),
  ),
});

export const NetworkSecurityResultSchema = z.object({
  cleartextPermitted: z.boolean().optional(),
  certificatePinning: z.boolean().optional(),
  debugOverrides: z.boolean().optional(),
});

export const SecretsResultSchema = z.object({
  findings: z.array(z.string()),
});

export const DependenciesResultSchema = z.object({
  dependencies: z
    .array(z.object({ name: z.string().min(1), version: z.string().optional() }))
    .default([]),
  vulnerabilities: z
    .array(
      z.object({
        name: z.string().min(1),
        version: z.string().optional(),
        cve: z.string().min(1),
      }),
    )
    .default([]),
});

export const CertificatesResultSchema = z.object({
  certificates: z
    .array(
      z.object({
        subject: z.string().optional(),
        issuer: z.string().optional(),
        notAfter: z.string().optional(),
      }),
    )
    .default([]),
  expired: z.boolean(),
  selfSigned: z.boolean(),
});

export const SignatureResultSchema = z.object({
  valid: z.boolean(),
  trusted: z.boolean(),
  fingerprints: z.array(z.string()).default([]),
});

/** File path → names of the rules that matched it */
export const YaraResultSchema = z.object({
  matches: z.record(z.array(z.string())),
});

export const EXTRACTOR_RESULT_SCHEMAS = {
  manifest: ManifestResultSchema,
  permissions: PermissionsResultSchema,
  network_security: NetworkSecurityResultSchema,
  secrets: SecretsResultSchema,
  dependencies: DependenciesResultSchema,
  certificates: CertificatesResultSchema,
  signature: SignatureResultSchema,
  yara: YaraResultSchema,
} as const;

export type ExtractorResults = {
  [K in ExtractorName]: z.infer<(typeof EXTRACTOR_RESULT_SCHEMAS)[K]>;
};
