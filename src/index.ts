import pino from 'pino';
import { loadConfig } from './config.js';
import { buildServer } from './server.js';

const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

/**
 * Bootstrap: load config → build server → listen → wire shutdown.
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const fastify = await buildServer({ config });

  let closing = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (closing) return;
    closing = true;
    log.info({ signal }, 'Shutdown signal received, closing server');
    void fastify.close().then(
      () => {
        log.info('Server closed');
        process.exit(0);
      },
      (err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await fastify.listen({ host: config.HOST, port: config.PORT });

  fastify.log.info(
    { endpoints: ['GET /v1', 'POST /v1/start', 'POST /v1/finish', 'GET /v1/health'] },
    'Event service ready',
  );
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'Fatal: failed to start server');
  process.exit(1);
});
