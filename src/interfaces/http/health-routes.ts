import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

const HEALTH_TIMEOUT_MS = 2000;

/**
 * Health check: pings the event store.
 *
 * GET /v1/health
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      try {
        await fastify.events.ping(AbortSignal.timeout(HEALTH_TIMEOUT_MS));
        return reply.status(200).send({ status: 'ok', store: 'ok' });
      } catch (err: unknown) {
        fastify.log.error({ err }, 'Event store health check failed');
        return reply.status(503).send({ status: 'degraded', store: 'unreachable' });
      }
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['event-store'],
  fastify: '5.x',
});
