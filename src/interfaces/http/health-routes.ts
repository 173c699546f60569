import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

/**
 * Health check — verifies the event store is reachable.
 *
 * GET /webhook/health
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/webhook/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const store = fastify.eventStore.driver;
      try {
        await fastify.eventStore.ping();
        return reply.status(200).send({ status: 'ok', store });
      } catch (err: unknown) {
        fastify.log.error({ err, store }, 'Event store health check failed');
        return reply.status(503).send({ status: 'degraded', store });
      }
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['event-store'],
  fastify: '5.x',
});
