import fp from 'fastify-plugin';
import { z } from 'zod';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { pollEvents } from '../../application/index.js';

/**
 * `since` is taken verbatim as the cursor; a repeated parameter arrives as
 * an array and is rejected.
 */
const feedQuerystringSchema = z.object({
  since: z.string().optional(),
});

/**
 * Polling feed route.
 *
 * GET /webhook/events?since=<cursor> — events newer than the cursor, oldest first
 */
async function feedRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/webhook/events',
    async (request: FastifyRequest<{ Querystring: unknown }>, reply: FastifyReply) => {
      const parsed = feedQuerystringSchema.safeParse(request.query);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      try {
        const events = await pollEvents(fastify.eventStore, { since: parsed.data.since });
        return reply.status(200).send(events);
      } catch (err: unknown) {
        request.log.error({ err, since: parsed.data.since }, 'Failed to retrieve events');
        return reply.status(500).send({ error: 'Internal server error' });
      }
    },
  );
}

export default fp(feedRoutes, {
  name: 'feed-routes',
  dependencies: ['event-store'],
  fastify: '5.x',
});
