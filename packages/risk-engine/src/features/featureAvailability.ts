import {
  FEATURE_NAMES,
  type FeatureName,
  type OptionalExtractorName,
} from '../schemas/extractors.js';
import type { Notice } from '../schemas/assessment.js';

export interface FeatureRequirement {
  /** What to install to enable the feature */
  readonly dependency: string;
  /** What the feature contributes to an assessment */
  readonly capability: string;
}

export const FEATURE_REQUIREMENTS: Readonly<Record<FeatureName, FeatureRequirement>> = Object.freeze({
  apktool: { dependency: 'apktool', capability: 'network security config parsing' },
  jadx: { dependency: 'jadx', capability: 'secret scanning of decompiled sources' },
  androguard: { dependency: 'androguard', capability: 'bundled library inspection' },
  apksigtool: { dependency: 'apksigtool', capability: 'APK signature verification' },
  'certificate-parser': { dependency: 'cryptography', capability: 'signing certificate analysis' },
  yara: { dependency: 'yara-python', capability: 'YARA rule scanning' },
});

/** Capability each optional extractor depends on */
export const EXTRACTOR_FEATURES: Readonly<Record<OptionalExtractorName, FeatureName>> = Object.freeze({
  network_security: 'apktool',
  secrets: 'jadx',
  dependencies: 'androguard',
  certificates: 'certificate-parser',
  signature: 'apksigtool',
  yara: 'yara',
});

export interface FeatureStatus extends FeatureRequirement {
  readonly feature: FeatureName;
  readonly available: boolean;
}

/**
 * Snapshot of which optional capabilities a job may rely on.
 * Built once when a pipeline starts and never mutated.
 */
export interface FeatureAvailability {
  readonly features: readonly FeatureStatus[];
  isAvailable(feature: FeatureName): boolean;
  status(feature: FeatureName): FeatureStatus;
}

/**
 * Build availability from declared flags. Undeclared features count as available.
 */
export function createFeatureAvailability(
  declared: Readonly<Partial<Record<FeatureName, boolean>>> = {},
): FeatureAvailability {
  const statuses = FEATURE_NAMES.map((feature) =>
    Object.freeze({
      feature,
      available: declared[feature] ?? true,
      ...FEATURE_REQUIREMENTS[feature],
    }),
  );
  const byFeature = new Map(statuses.map((s) => [s.feature, s]));

  return Object.freeze({
    features: Object.freeze(statuses),
    isAvailable: (feature: FeatureName) => byFeature.get(feature)?.available ?? false,
    status: (feature: FeatureName): FeatureStatus =>
      byFeature.get(feature) ?? { feature, available: false, ...FEATURE_REQUIREMENTS[feature] },
  });
}

export type FeatureProbe = (
  feature: FeatureName,
  requirement: FeatureRequirement,
) => boolean | Promise<boolean>;

/**
 * Check every feature once, concurrently. A check that throws propagates.
 */
export async function probeFeatureAvailability(check: FeatureProbe): Promise<FeatureAvailability> {
  const results = await Promise.all(
    FEATURE_NAMES.map(async (feature) => [feature, await check(feature, FEATURE_REQUIREMENTS[feature])] as const),
  );
  const declared: Partial<Record<FeatureName, boolean>> = {};
  for (const [feature, available] of results) {
    declared[feature] = available;
  }
  return createFeatureAvailability(declared);
}

/**
 * A job may switch off features the service has, never switch one on
 */
export function narrowFeatureAvailability(
  base: FeatureAvailability,
  declared: Readonly<Partial<Record<FeatureName, boolean>>> = {},
): FeatureAvailability {
  const narrowed: Partial<Record<FeatureName, boolean>> = {};
  for (const feature of FEATURE_NAMES) {
    narrowed[feature] = base.isAvailable(feature) && (declared[feature] ?? true);
  }
  return createFeatureAvailability(narrowed);
}

/**
 * Neutral notice for an optional capability that could not be used
 */
export function featureUnavailableNotice(status: FeatureStatus, extractor?: OptionalExtractorName): Notice {
  return Object.freeze({
    code: 'OPTIONAL_FEATURE_UNAVAILABLE',
    message:
      `Optional feature unavailable: \`${status.feature}\` — skipping. ` +
      `Install \`${status.dependency}\` to enable \`${status.capability}\`.`,
    feature: status.feature,
    ...(extractor !== undefined && { extractor }),
  });
}
