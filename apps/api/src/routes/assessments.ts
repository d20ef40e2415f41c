import {
  AssessmentJobSchema,
  assessApplication,
  type FeatureAvailability,
  type MetricCatalog,
  type ScoringOverrides,
  type ThreatIntel,
} from '@droidrisk/risk-engine';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { formatIssues } from '../lib/errors.js';

export interface AssessmentRoutesOptions {
  catalog: MetricCatalog;
  defaults: ScoringOverrides;
  intel: ThreatIntel;
  dynamicTimeoutMs: number;
  features: FeatureAvailability;
  logger: Logger;
}

/**
 * Synchronous assessment submission
 */
export async function assessmentRoutes(
  fastify: FastifyInstance,
  opts: AssessmentRoutesOptions,
): Promise<void> {
  /**
   * POST /v1/assessments
   *
   * Runs the pipeline on the job in the body. Engine failures are mapped
   * by the server's error handler.
   */
  fastify.post('/v1/assessments', async (request, reply) => {
    const parsed = AssessmentJobSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'invalid_request', issues: formatIssues(parsed.error) });
    }

    const assessment = await assessApplication(parsed.data, {
      catalog: opts.catalog,
      defaults: opts.defaults,
      intel: opts.intel,
      dynamicTimeoutMs: opts.dynamicTimeoutMs,
      features: opts.features,
      logger: opts.logger.child({ reqId: request.id }),
    });

    return reply.status(201).send(assessment);
  });
}
