import { resolveScoringConfig, type MetricCatalog, type ScoringOverrides } from '@droidrisk/risk-engine';
import type { FastifyInstance } from 'fastify';

export interface MetricRoutesOptions {
  catalog: MetricCatalog;
  defaults: ScoringOverrides;
}

/**
 * Metric catalog with the weights and caps this service scores with
 */
export async function metricRoutes(fastify: FastifyInstance, opts: MetricRoutesOptions): Promise<void> {
  const config = resolveScoringConfig(opts.defaults, opts.catalog);

  const body = {
    metrics: opts.catalog.specs.map((spec) => ({
      name: spec.name,
      kind: spec.kind,
      source: spec.source,
      origin: spec.origin,
      weight: config.weights.get(spec.name) ?? 0,
      cap: config.caps.get(spec.name) ?? null,
      description: spec.description,
    })),
    bands: config.bands,
    unavailablePolicy: config.unavailablePolicy,
  };

  /**
   * GET /v1/metrics
   */
  fastify.get('/v1/metrics', async (_request, reply) => reply.send(body));
}
