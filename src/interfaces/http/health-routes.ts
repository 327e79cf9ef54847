import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

/**
 * GET /health: liveness probe for the reverse proxy.
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).type('text/plain').send('OK');
  });
}

export default fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});
