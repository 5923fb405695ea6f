import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { EventRepository } from '../domain/index.js';

export interface StorePluginOptions {
  repository: EventRepository;
}

/**
 * Registers an already-constructed EventRepository as `fastify.events`.
 *
 * Used in place of the database plugin when the caller owns the store,
 * e.g. the in-memory repository in tests.
 */
async function storePlugin(fastify: FastifyInstance, options: StorePluginOptions): Promise<void> {
  fastify.decorate('events', options.repository);
}

export default fp(storePlugin, {
  name: 'event-store',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    events: EventRepository;
  }
}
