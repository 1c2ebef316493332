import { FastifyPluginAsync } from 'fastify';

export const UP_BODY = ':)';
export const ECHO_BODY = 'Server active!';

const healthRoutes: FastifyPluginAsync = async (fastify) => {
  const { upstream, gatewayLogger: logger } = fastify;

  // Liveness: proves the process serves requests, touches nothing else
  fastify.get('/up', async (_request, reply) => {
    return reply.type('text/plain; charset=utf-8').send(UP_BODY);
  });

  fastify.get('/echo', async (_request, reply) => {
    return reply.type('text/plain; charset=utf-8').send(ECHO_BODY);
  });

  // Upstream health: fresh probe on every request
  fastify.get('/health/ollama', async (_request, reply) => {
    const health = await upstream.check();

    if (!health.reachable) {
      logger.warn({ detail: health.detail }, 'Upstream health check failed');
    }

    return reply.code(health.reachable ? 200 : 503).send({
      status: health.reachable ? 'healthy' : 'unhealthy',
      reachable: health.reachable,
      detail: health.detail ?? null,
      checkedAt: health.checkedAt.toISOString(),
    });
  });
};

export default healthRoutes;
