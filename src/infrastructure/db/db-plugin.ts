import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { createDbClient } from './client.js';
import { ensureSchema } from './migrate.js';
import { createEventRepository } from './event-repository.js';

export interface DbPluginOptions {
  databaseUrl: string;
  poolMax: number;
  statementTimeoutMs: number;
}

/**
 * Fastify plugin that manages the Drizzle/postgres.js connection lifecycle.
 *
 * Ensures the schema exists, then decorates `fastify.events` with the
 * PostgreSQL EventRepository.
 * Closes the connection pool on server shutdown.
 */
async function dbPlugin(fastify: FastifyInstance, options: DbPluginOptions): Promise<void> {
  const { sql, db } = createDbClient(options.databaseUrl, {
    max: options.poolMax,
    statementTimeoutMs: options.statementTimeoutMs,
  });

  try {
    await ensureSchema(sql);
  } catch (err: unknown) {
    await sql.end();
    throw err;
  }
  fastify.log.info('Database schema ready');

  fastify.decorate('events', createEventRepository(db));

  fastify.addHook('onClose', async () => {
    await sql.end();
    fastify.log.info('Database disconnected');
  });
}

export default fp(dbPlugin, {
  name: 'event-store',
  fastify: '5.x',
});

