import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  parseTypeBody,
  parseListQuery,
  startEvent,
  finishEvent,
  listEvents,
} from '../../application/index.js';
import { toEventView } from '../../domain/index.js';

export interface EventRoutesOptions {
  /** Deadline applied to the storage calls of each request. */
  storageTimeoutMs: number;
}

/**
 * Registers the event lifecycle routes.
 *
 * GET  /v1        — list events, newest first (offset, limit, type)
 * POST /v1/start  — start an event; returns the active one if it exists
 * POST /v1/finish — finish the active event of a type
 *
 * Validation and domain errors are thrown and rendered by the
 * global error handler.
 */
async function eventRoutes(fastify: FastifyInstance, options: EventRoutesOptions): Promise<void> {
  const deadline = (): AbortSignal => AbortSignal.timeout(options.storageTimeoutMs);

  fastify.get(
    '/v1',
    async (
      request: FastifyRequest<{ Querystring: Record<string, unknown> }>,
      reply: FastifyReply,
    ) => {
      const query = parseListQuery(request.query);
      const rows = await listEvents(fastify.events, query, deadline());
      return reply.status(200).send(rows.map(toEventView));
    },
  );

  fastify.post(
    '/v1/start',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const type = parseTypeBody(request.body);
      const event = await startEvent(fastify.events, type, deadline());
      return reply.status(200).send(toEventView(event));
    },
  );

  fastify.post(
    '/v1/finish',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const type = parseTypeBody(request.body);
      const event = await finishEvent(fastify.events, type, deadline());
      return reply.status(200).send(toEventView(event));
    },
  );
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['event-store'],
  fastify: '5.x',
});
