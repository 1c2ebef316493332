import { FastifyPluginAsync, FastifyRequest, FastifyReply } from 'fastify';
import { UpstreamUnavailableError } from '../../errors.js';
import { buildChatRequest } from '../query.js';

// Same body for every denial reason; the reason only goes to the log
export const AUTH_ERROR_BODY = { message: 'Authentication Error', error: 'Unauthorized' } as const;
export const UPSTREAM_ERROR_BODY = {
  message: 'Upstream Unavailable',
  error: 'Inference service is not available',
} as const;

const queryRoutes: FastifyPluginAsync = async (fastify) => {
  const { gatewayConfig: config, authGuard, upstream, gatewayLogger: logger } = fastify;

  fastify.decorateRequest('callerIdentity', null);

  // Runs before body parsing so that unauthenticated callers learn nothing about payload rules
  fastify.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
    const verdict = authGuard.authorize(request.headers);
    if (!verdict.authorized || verdict.identity === undefined) {
      return reply.code(401).send(AUTH_ERROR_BODY);
    }
    request.callerIdentity = verdict.identity;
  });

  fastify.post('/query', async (request, reply) => {
    const identity = request.callerIdentity;
    const validation = buildChatRequest(request.body, config.models);

    if (!validation.ok) {
      logger.info({ identity, error: validation.error }, 'Rejected invalid query');
      return reply.code(400).send({ message: 'Validation Error', error: validation.error });
    }

    const { request: chat } = validation;
    logger.debug({ identity, model: chat.model }, 'Forwarding query to upstream');

    try {
      const response = await upstream.chat(chat);

      if (response.status >= 400) {
        logger.warn({ identity, status: response.status }, 'Upstream returned error');
      }

      reply.code(response.status);
      if (response.contentType) {
        reply.header('content-type', response.contentType);
      }
      return reply.send(response.body);
    } catch (err) {
      if (err instanceof UpstreamUnavailableError) {
        logger.error({ identity, kind: err.kind, err: err.message }, 'Failed to forward query');
        return reply.code(503).send(UPSTREAM_ERROR_BODY);
      }
      throw err;
    }
  });
};

export default queryRoutes;

declare module 'fastify' {
  interface FastifyRequest {
    callerIdentity: string | null;
  }
}
