import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { EventServiceError, ValidationError } from '../../domain/index.js';
import type { EventErrorCode } from '../../domain/index.js';

const STATUS_MAP: Record<EventErrorCode, number> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  ACTIVE_EVENT_EXISTS: 409,
  STORAGE_ERROR: 500,
};

/** Fastify's own errors (bad JSON, unsupported media type) carry a statusCode. */
function clientStatus(err: FastifyError | Error): number | undefined {
  if ('statusCode' in err && typeof err.statusCode === 'number'
    && err.statusCode >= 400 && err.statusCode < 500) {
    return err.statusCode;
  }
  return undefined;
}

/**
 * Global error handler.
 *
 * Maps the domain error taxonomy to HTTP statuses with a
 * `{ message }` body. 5xx responses never carry internal details.
 */
export function handleError(
  err: FastifyError | Error,
  request: FastifyRequest,
  reply: FastifyReply,
): FastifyReply {
  if (err instanceof ValidationError) {
    return reply.status(400).send({ message: err.message, issues: err.issues });
  }

  if (err instanceof EventServiceError) {
    const status = STATUS_MAP[err.code];
    if (status >= 500) {
      request.log.error({ err }, 'Event store failure');
      return reply.status(status).send({ message: 'Internal server error' });
    }
    return reply.status(status).send({ message: err.message });
  }

  const status = clientStatus(err);
  if (status !== undefined) {
    return reply.status(status).send({ message: err.message });
  }

  request.log.error({ err }, 'Unhandled error');
  return reply.status(500).send({ message: 'Internal server error' });
}
