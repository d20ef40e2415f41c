import { readFile } from 'node:fs/promises';
import { createLogger, loadConfig, toScoringOverrides, type DroidriskConfig } from '@droidrisk/config';
import {
  AssessmentJobSchema,
  EMPTY_THREAT_INTEL,
  FeatureNameSchema,
  RiskEngineError,
  assessApplication,
  loadIntelFeed,
  probeFeatureAvailability,
  resolveScoringConfig,
  type FeatureName,
} from '@droidrisk/risk-engine';
import { z } from 'zod';
import { formatAssessment, formatCatalog, type Colors } from './format.js';

/**
 * Where a command writes. Tests pass capturing writers and colorless output.
 */
export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
  colors: Colors;
  env: NodeJS.ProcessEnv;
}

export interface AssessCommandOptions {
  format: string;
  intel?: string;
  without?: string[];
  timeout?: string;
}

const formatSchema = z.enum(['text', 'json']);
const timeoutSchema = z.coerce.number().int().min(1);

function message(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function loadConfigOrReport(io: CliIo): DroidriskConfig | undefined {
  try {
    return loadConfig(io.env);
  } catch (err) {
    io.err(io.colors.red('Configuration Error:'));
    io.err(io.colors.red(`  ${message(err)}`));
    return undefined;
  }
}

/**
 * Read a job file and score it. Returns the process exit code.
 */
export async function runAssess(jobPath: string, options: AssessCommandOptions, io: CliIo): Promise<number> {
  const c = io.colors;
  const config = loadConfigOrReport(io);
  if (!config) return 1;

  const format = formatSchema.safeParse(options.format);
  if (!format.success) {
    io.err(c.red(`Invalid format: '${options.format}'. Must be one of: ${formatSchema.options.join(', ')}`));
    return 1;
  }

  let timeoutMs = config.scoring.dynamicTimeoutMs;
  if (options.timeout !== undefined) {
    const parsedTimeout = timeoutSchema.safeParse(options.timeout);
    if (!parsedTimeout.success) {
      io.err(c.red(`Invalid timeout: '${options.timeout}'. Must be a positive number of milliseconds`));
      return 1;
    }
    timeoutMs = parsedTimeout.data;
  }

  const disabled: Partial<Record<FeatureName, boolean>> = {};
  for (const feature of options.without ?? []) {
    const parsedFeature = FeatureNameSchema.safeParse(feature);
    if (!parsedFeature.success) {
      io.err(c.red(`Unknown feature: '${feature}'. Must be one of: ${FeatureNameSchema.options.join(', ')}`));
      return 1;
    }
    disabled[parsedFeature.data] = false;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(jobPath, 'utf-8'));
  } catch (err) {
    io.err(c.red(`Error reading job file: ${jobPath}`));
    io.err(c.gray(`  ${message(err)}`));
    return 1;
  }

  const job = AssessmentJobSchema.safeParse(raw);
  if (!job.success) {
    io.err(c.red('Invalid job file:'));
    for (const issue of job.error.errors) {
      io.err(c.red(`  - ${issue.path.join('.')}: ${issue.message}`));
    }
    return 1;
  }

  const intelPath = options.intel ?? config.intel.feedPath;
  let intel = EMPTY_THREAT_INTEL;
  if (intelPath !== undefined) {
    try {
      intel = await loadIntelFeed(intelPath);
    } catch (err) {
      io.err(c.red(`Error reading intel feed: ${intelPath}`));
      io.err(c.gray(`  ${message(err)}`));
      return 1;
    }
  }

  try {
    const assessment = await assessApplication(
      { ...job.data, features: { ...job.data.features, ...disabled } },
      {
        defaults: toScoringOverrides(config.scoring),
        features: await probeFeatureAvailability((feature) => !config.features.disabled.includes(feature)),
        intel,
        dynamicTimeoutMs: timeoutMs,
        logger: createLogger(config.logging.level, config.logging.format, 2),
      },
    );

    if (format.data === 'json') {
      io.out(JSON.stringify(assessment, null, 2));
    } else {
      formatAssessment(assessment, c).forEach((line) => io.out(line));
    }
    return 0;
  } catch (err) {
    if (err instanceof RiskEngineError) {
      io.err(c.red(`Assessment failed (${err.code}):`));
      io.err(c.red(`  ${err.message}`));
      return 1;
    }
    throw err;
  }
}

/**
 * Print the metric catalog with the configured weights and caps
 */
export function runCatalog(io: CliIo): number {
  const config = loadConfigOrReport(io);
  if (!config) return 1;

  try {
    const scoring = resolveScoringConfig(toScoringOverrides(config.scoring));
    formatCatalog(scoring, io.colors).forEach((line) => io.out(line));
    return 0;
  } catch (err) {
    if (err instanceof RiskEngineError) {
      io.err(io.colors.red(`  ${err.message}`));
      return 1;
    }
    throw err;
  }
}

/**
 * Validate environment configuration, including scoring overrides and the
 * intel feed.
 */
export async function runCheckConfig(io: CliIo): Promise<number> {
  const c = io.colors;
  io.out(c.bold('\nConfiguration Validation\n'));

  const config = loadConfigOrReport(io);
  if (!config) return 1;

  try {
    resolveScoringConfig(toScoringOverrides(config.scoring));
  } catch (err) {
    io.err(c.red('Configuration Error:'));
    io.err(c.red(`  ${message(err)}`));
    return 1;
  }

  const items = [
    { key: 'API_PORT', value: config.api.port.toString() },
    { key: 'API_HOST', value: config.api.host },
    { key: 'DROIDRISK_API_KEY', value: config.api.apiKey ? '***' : '(not set)' },
    { key: 'DYNAMIC_TIMEOUT_MS', value: config.scoring.dynamicTimeoutMs.toString() },
    { key: 'SCORE_BAND_MEDIUM', value: config.scoring.bandMedium.toString() },
    { key: 'SCORE_BAND_HIGH', value: config.scoring.bandHigh.toString() },
    { key: 'RISK_UNAVAILABLE_POLICY', value: config.scoring.unavailablePolicy },
    { key: 'RISK_WEIGHTS', value: `${Object.keys(config.scoring.weights).length} override(s)` },
    { key: 'RISK_CAPS', value: `${Object.keys(config.scoring.caps).length} override(s)` },
    { key: 'INTEL_FEED_PATH', value: config.intel.feedPath ?? '(not set)' },
    { key: 'DISABLED_FEATURES', value: config.features.disabled.join(',') || '(none)' },
    { key: 'LOG_LEVEL', value: config.logging.level },
    { key: 'LOG_FORMAT', value: config.logging.format },
  ];

  for (const item of items) {
    io.out(`  ${c.cyan(item.key)}: ${item.value}`);
  }

  if (config.intel.feedPath !== undefined) {
    try {
      const intel = await loadIntelFeed(config.intel.feedPath);
      io.out(`\n  ${c.green('✓')} Intel feed loaded: ${intel.hosts.size} host(s)`);
    } catch (err) {
      io.err(c.red(`\nError reading intel feed: ${config.intel.feedPath}`));
      io.err(c.gray(`  ${message(err)}`));
      return 1;
    }
  }

  io.out('');
  io.out(c.green(c.bold('Configuration is valid!')));
  return 0;
}
