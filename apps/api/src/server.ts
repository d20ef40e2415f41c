import Fastify from 'fastify';
import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import { createLogger, toScoringOverrides, type DroidriskConfig } from '@droidrisk/config';
import {
  DEFAULT_METRIC_CATALOG,
  EMPTY_THREAT_INTEL,
  loadIntelFeed,
  probeFeatureAvailability,
  type FeatureAvailability,
  type MetricCatalog,
  type ThreatIntel,
} from '@droidrisk/risk-engine';
import type { Logger } from 'pino';
import { getConfig } from './lib/config.js';
import { errorHandler } from './lib/errors.js';
import { apiKeyAuth } from './middleware/auth.js';
import { assessmentRoutes } from './routes/assessments.js';
import { healthRoutes } from './routes/health.js';
import { metricRoutes } from './routes/metrics.js';

export interface ServerOptions {
  config: DroidriskConfig;
  catalog: MetricCatalog;
  /** Defaults to the feed at INTEL_FEED_PATH, or an empty feed */
  intel: ThreatIntel;
  /** Defaults to every feature not listed in DISABLED_FEATURES */
  features: FeatureAvailability;
  logger: Logger;
}

/**
 * Build and configure the Fastify server.
 * Exported for testing via server.inject().
 */
export async function buildServer(overrides: Partial<ServerOptions> = {}): Promise<FastifyInstance> {
  const config = overrides.config ?? getConfig();
  const catalog = overrides.catalog ?? DEFAULT_METRIC_CATALOG;
  const logger = overrides.logger ?? createLogger(config.logging.level, config.logging.format);
  const intel =
    overrides.intel ??
    (config.intel.feedPath ? await loadIntelFeed(config.intel.feedPath) : EMPTY_THREAT_INTEL);
  const defaults = toScoringOverrides(config.scoring);
  const features =
    overrides.features ??
    (await probeFeatureAvailability((feature) => !config.features.disabled.includes(feature)));

  // Fastify and the engine share one pino instance
  const serverLogger: FastifyBaseLogger = logger;
  const server = Fastify({
    logger: serverLogger,
    bodyLimit: config.api.bodyLimitBytes,
  });

  server.setErrorHandler(errorHandler);

  // Optional API key auth on /v1/* routes
  const auth = apiKeyAuth(config.api.apiKey);
  server.addHook('onRequest', (request, reply, done) => {
    if (request.url.startsWith('/v1/')) {
      auth(request, reply, done);
    } else {
      done();
    }
  });

  // Register routes
  await server.register(healthRoutes);
  await server.register(metricRoutes, { catalog, defaults });
  await server.register(assessmentRoutes, {
    catalog,
    defaults,
    intel,
    dynamicTimeoutMs: config.scoring.dynamicTimeoutMs,
    features,
    logger,
  });

  server.log.debug(
    {
      intelHosts: intel.hosts.size,
      authEnabled: Boolean(config.api.apiKey),
      unavailableFeatures: features.features.filter((f) => !f.available).map((f) => f.feature),
    },
    'Server built',
  );
  return server;
}

/**
 * Start the server
 */
async function start(): Promise<void> {
  const config = getConfig();
  const server = await buildServer({ config });

  await server.listen({ port: config.api.port, host: config.api.host });
  server.log.info({ port: config.api.port, host: config.api.host }, 'droidrisk API started');
}

// Run if main module
const isMain = process.argv[1]?.endsWith('server.js') || process.argv[1]?.endsWith('server.ts');
if (isMain) {
  start().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
