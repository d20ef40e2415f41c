import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

export const API_VERSION = '0.1.0';

/**
 * Health check response
 */
interface HealthResponse {
  status: 'ok' | 'degraded' | 'error';
  timestamp: string;
  version: string;
  uptime: number;
}

/**
 * Register health check routes
 */
export async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  const startTime = Date.now();

  const respond = (_request: FastifyRequest, reply: FastifyReply) => {
    const response: HealthResponse = {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: API_VERSION,
      uptime: Math.floor((Date.now() - startTime) / 1000),
    };
    return reply.send(response);
  };

  /**
   * GET /health
   *
   * Liveness check - returns 200 if the service is running
   */
  fastify.get('/health', async (request, reply) => respond(request, reply));

  /**
   * GET /health/ready
   *
   * Readiness check. Scoring holds no external connections, so a live
   * process is a ready one.
   */
  fastify.get('/health/ready', async (request, reply) => respond(request, reply));
}
