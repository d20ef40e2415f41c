import { ConfigurationError, MandatoryExtractorMissingError } from '@droidrisk/risk-engine';
import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import type { ZodError } from 'zod';

/**
 * Flatten zod issues into `path: message` strings
 */
export function formatIssues(error: ZodError): string[] {
  return error.errors.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Map engine failures to 422 responses and client errors raised by Fastify
 * (unparseable body, body too large) to their status. Anything else is a 500.
 */
export async function errorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply,
): Promise<FastifyReply> {
  if (error instanceof ConfigurationError) {
    return reply.status(422).send({ error: 'configuration_error', issues: error.issues });
  }

  if (error instanceof MandatoryExtractorMissingError) {
    return reply.status(422).send({
      error: 'mandatory_extractor_missing',
      extractor: error.extractor,
      reason: error.reason,
    });
  }

  if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
    return reply.status(error.statusCode).send({ error: 'invalid_request', issues: [error.message] });
  }

  request.log.error({ err: error }, 'Unhandled request error');
  return reply.status(500).send({ error: 'internal_error' });
}
