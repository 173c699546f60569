import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ingestWebhook } from '../../application/index.js';
import type { IngestResult } from '../../application/index.js';

const EVENT_TYPE_HEADER = 'x-github-event';

function isNonEmptyObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object'
    && value !== null
    && !Array.isArray(value)
    && Object.keys(value).length > 0;
}

/**
 * Registers the webhook ingestion route.
 *
 * POST /webhook/github — event type from the X-GitHub-Event header, JSON body
 */
async function webhookRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.post(
    '/webhook/github',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const header = request.headers[EVENT_TYPE_HEADER];
      const eventType = typeof header === 'string' ? header.toLowerCase() : '';
      const payload = request.body;

      if (!isNonEmptyObject(payload)) {
        return reply.status(400).send({ error: 'No payload received' });
      }

      let result: IngestResult;
      try {
        result = await ingestWebhook(fastify.eventStore, eventType, payload, { log: request.log });
      } catch (err: unknown) {
        request.log.error({ err, eventType }, 'Failed to store event');
        return reply.status(500).send({ error: 'Internal server error' });
      }

      switch (result.kind) {
        case 'unsupported':
          request.log.debug({ eventType }, 'Ignoring unsupported event type');
          return reply.status(200).send({ message: 'Event type not supported or ignored' });

        case 'parse_failure':
          return reply.status(500).send({ error: 'Failed to parse webhook payload' });

        case 'invalid_action':
          request.log.warn({ action: result.action }, 'Rejected event with invalid action');
          return reply.status(400).send({ error: 'Invalid action type' });

        case 'stored':
          return reply.status(200).send({
            message: 'Event stored successfully',
            event: result.event,
          });
      }
    },
  );
}

export default fp(webhookRoutes, {
  name: 'webhook-routes',
  dependencies: ['event-store'],
  fastify: '5.x',
});
