import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { NotFoundError, UnavailableError, ValidationError } from './errors';

/**
 * Maps domain errors to HTTP responses:
 * - `ValidationError`  -> 422
 * - `NotFoundError`    -> 404
 * - `UnavailableError` -> 503
 * - Fastify client errors (bad JSON, wrong content type) keep their 4xx
 * - anything else      -> 500
 */
export function errorHandler(err: FastifyError, req: FastifyRequest, reply: FastifyReply) {
  if (err instanceof ValidationError) {
    return reply.code(422).send({ error: 'validation_error', detail: err.message, issues: err.issues });
  }

  if (err instanceof NotFoundError) {
    return reply.code(404).send({ error: 'not_found', detail: err.message });
  }

  if (err instanceof UnavailableError) {
    req.log.error({ err, backend: err.backend }, 'Storage backend unavailable');
    return reply.code(503).send({ error: 'unavailable', detail: `${err.backend} storage is unavailable` });
  }

  if (typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500) {
    return reply.code(err.statusCode).send({ error: 'bad_request', detail: err.message });
  }

  req.log.error({ err }, 'Unhandled error');
  return reply.code(500).send({ error: 'internal_error', detail: 'internal server error' });
}
