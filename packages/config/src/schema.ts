import { z } from 'zod';

/**
 * Log level enumeration
 */
export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Log format enumeration
 */
export const logFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof logFormatSchema>;

/**
 * How the scorer treats metrics whose extractor was unavailable
 *
 * - 'redistribute': exclude them and rescale the remaining weights
 * - 'zero': keep them as zero-valued, weight-bearing terms
 */
export const unavailablePolicySchema = z.enum(['redistribute', 'zero']);
export type UnavailablePolicy = z.infer<typeof unavailablePolicySchema>;

/**
 * API server configuration
 */
export const apiConfigSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(3000),
  host: z.string().default('0.0.0.0'),
  /** When set, /v1/* requires a matching x-droidrisk-key header */
  apiKey: z.string().min(8, 'DROIDRISK_API_KEY must be at least 8 characters').optional(),
  bodyLimitBytes: z.coerce.number().int().min(1024).default(5 * 1024 * 1024),
});
export type ApiConfig = z.infer<typeof apiConfigSchema>;

/**
 * Service-level scoring defaults. Job-level overrides win key by key.
 */
export const scoringDefaultsSchema = z
  .object({
    /** Wall-clock budget for consuming the instrumentation stream */
    dynamicTimeoutMs: z.coerce.number().int().min(100).max(3_600_000).default(60_000),

    /** Lowest score labelled Medium */
    bandMedium: z.coerce.number().int().min(0).max(100).default(40),

    /** Lowest score labelled High */
    bandHigh: z.coerce.number().int().min(0).max(100).default(70),

    unavailablePolicy: unavailablePolicySchema.default('redistribute'),

    /** Weight overrides by metric name (RISK_WEIGHTS) */
    weights: z.record(z.number()).default({}),

    /** Cap overrides by metric name (RISK_CAPS) */
    caps: z.record(z.number()).default({}),
  })
  .refine((s) => s.bandMedium < s.bandHigh, {
    message: 'SCORE_BAND_MEDIUM must be lower than SCORE_BAND_HIGH',
    path: ['bandMedium'],
  });
export type ScoringDefaults = z.infer<typeof scoringDefaultsSchema>;

/**
 * Threat intelligence configuration
 */
export const intelConfigSchema = z.object({
  /** Plain-text feed of malicious domains and IPs, one per line */
  feedPath: z.string().min(1).optional(),
});
export type IntelConfig = z.infer<typeof intelConfigSchema>;

/**
 * Optional analysis capabilities. Names match the engine's feature names.
 */
export const featureNameSchema = z.enum(['apktool', 'jadx', 'androguard', 'apksigtool', 'certificate-parser', 'yara']);
export type FeatureName = z.infer<typeof featureNameSchema>;

/**
 * Capabilities the host lacks. Checked once when a surface starts.
 */
export const featuresConfigSchema = z.object({
  /** DISABLED_FEATURES, comma separated */
  disabled: z.array(featureNameSchema).default([]),
});
export type FeaturesConfig = z.infer<typeof featuresConfigSchema>;

/**
 * Logging configuration
 */
export const loggingConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  format: logFormatSchema.default('pretty'),
});
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;

/**
 * Complete droidrisk configuration schema
 */
export const droidriskConfigSchema = z.object({
  api: apiConfigSchema,
  scoring: scoringDefaultsSchema,
  intel: intelConfigSchema,
  features: featuresConfigSchema.default({}),
  logging: loggingConfigSchema,
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
});
export type DroidriskConfig = z.infer<typeof droidriskConfigSchema>;
