import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { AppConfig } from './config.js';
import type { EventRepository } from './domain/index.js';
import { dbPlugin, storePlugin } from './infrastructure/index.js';
import { eventRoutes, healthRoutes, handleError } from './interfaces/http/index.js';

export interface BuildServerOptions {
  config: AppConfig;
  /** Use this store instead of connecting to DATABASE_URL. */
  repository?: EventRepository;
  /** Set false to silence request logging (tests). */
  logger?: boolean;
}

/**
 * Builds the Fastify server without listening.
 *
 * Order:
 * 1) Error handler
 * 2) Event store (PostgreSQL, or the injected repository)
 * 3) HTTP routes
 */
export async function buildServer(options: BuildServerOptions): Promise<FastifyInstance> {
  const { config } = options;

  const fastify = Fastify({
    logger: options.logger === false ? false : { level: config.LOG_LEVEL },
  });

  fastify.setErrorHandler(handleError);

  if (options.repository !== undefined) {
    await fastify.register(storePlugin, { repository: options.repository });
  } else {
    await fastify.register(dbPlugin, {
      databaseUrl: config.DATABASE_URL,
      poolMax: config.DB_POOL_MAX,
      statementTimeoutMs: config.STORAGE_TIMEOUT_MS,
    });
  }

  await fastify.register(eventRoutes, { storageTimeoutMs: config.STORAGE_TIMEOUT_MS });
  await fastify.register(healthRoutes);

  return fastify;
}
