import { timingSafeEqual } from 'node:crypto';
import type { FastifyReply, FastifyRequest, HookHandlerDoneFunction } from 'fastify';

export const API_KEY_HEADER = 'x-droidrisk-key';

export type OnRequestHook = (
  request: FastifyRequest,
  reply: FastifyReply,
  done: HookHandlerDoneFunction,
) => void;

/**
 * Optional API key authentication.
 * With no key configured every request passes through. Otherwise requests
 * must carry a matching `x-droidrisk-key` header, compared in constant time.
 */
export function apiKeyAuth(expectedKey: string | undefined): OnRequestHook {
  const expectedBuf = expectedKey ? Buffer.from(expectedKey) : undefined;

  return (request, reply, done) => {
    if (!expectedBuf) {
      done();
      return;
    }

    const providedKeyHeader = request.headers[API_KEY_HEADER];
    if (typeof providedKeyHeader === 'string') {
      const providedBuf = Buffer.from(providedKeyHeader);
      if (providedBuf.length === expectedBuf.length && timingSafeEqual(providedBuf, expectedBuf)) {
        done();
        return;
      }
    }

    request.log.warn({ url: request.url }, 'Rejected request without a valid API key');
    reply.status(401).send({ error: 'unauthorized' });
  };
}
