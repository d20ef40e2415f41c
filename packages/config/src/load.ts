import { type DroidriskConfig, droidriskConfigSchema } from './schema.js';

/**
 * Parse a JSON object of metric name → number from an env var
 * (RISK_WEIGHTS, RISK_CAPS). Value checks happen in the schema.
 */
function parseJsonRecord(raw: string | undefined, name: string): unknown {
  if (!raw) {
    return undefined;
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error(`${name} must be a JSON object`);
    }
    return parsed;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`${name} is not valid JSON`);
    }
    throw error;
  }
}

/**
 * Split a comma-separated env var, dropping blanks
 */
function parseList(raw: string | undefined): string[] | undefined {
  if (!raw) {
    return undefined;
  }
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Load and validate configuration from environment variables
 *
 * @param env - Environment variables (defaults to process.env)
 * @throws Error listing every invalid setting
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DroidriskConfig {
  const rawConfig = {
    api: {
      port: env.API_PORT,
      host: env.API_HOST,
      apiKey: env.DROIDRISK_API_KEY || undefined,
      bodyLimitBytes: env.API_BODY_LIMIT_BYTES,
    },
    scoring: {
      dynamicTimeoutMs: env.DYNAMIC_TIMEOUT_MS,
      bandMedium: env.SCORE_BAND_MEDIUM,
      bandHigh: env.SCORE_BAND_HIGH,
      unavailablePolicy: env.RISK_UNAVAILABLE_POLICY,
      weights: parseJsonRecord(env.RISK_WEIGHTS, 'RISK_WEIGHTS'),
      caps: parseJsonRecord(env.RISK_CAPS, 'RISK_CAPS'),
    },
    intel: {
      feedPath: env.INTEL_FEED_PATH || undefined,
    },
    features: {
      disabled: parseList(env.DISABLED_FEATURES),
    },
    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
    },
    nodeEnv: env.NODE_ENV,
  };

  const result = droidriskConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed:\n${errors}`);
  }

  return result.data;
}
