/**
 * packages/shared/src/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - Both services must answer errors in the same shape, because each one is
 *   also the other's client (the peer client reads `status`, not the body).
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status and .code to structured HTTP response.
 * - Zod validation errors → 400 (safety net if a controller misses).
 * - Fastify 4xx errors (bad JSON, empty JSON body, media type) → same status.
 * - Postgres unique violation → 409.
 * - Unexpected errors → 500 with generic message.
 * - Unknown routes → 404 in the same body shape.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 * - Always use withRequestContext(req) so requestId is included in every log line.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { AppError, type AppErrorCode } from './errors';
import { withRequestContext } from '../logger/with-context';

type ErrorResponseBody = {
  error: {
    code: AppErrorCode;
    message: string;
  };
};

const PG_UNIQUE_VIOLATION = '23505';

const SENSITIVE_META_KEYS = new Set(['phoneNumber', 'phone_number']);

function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function buildResponse(code: AppErrorCode, message: string): ErrorResponseBody {
  return { error: { code, message } };
}

function clientStatusOf(err: Error): number | null {
  if (!('statusCode' in err) || typeof err.statusCode !== 'number') return null;
  return err.statusCode >= 400 && err.statusCode < 500 ? err.statusCode : null;
}

function isUniqueViolation(err: Error): boolean {
  return 'code' in err && err.code === PG_UNIQUE_VIOLATION;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: Error, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return reply.status(err.status).send(buildResponse(err.code, err.message));
    }

    // 2) Validation that escaped a controller
    if (err instanceof ZodError) {
      log.warn('validation_error', { flow: 'http.error', issues: err.issues });

      return reply.status(400).send(buildResponse('VALIDATION_ERROR', 'Invalid request'));
    }

    // 3) Fastify's own client errors (malformed JSON, unsupported media type, ...)
    const clientStatus = clientStatusOf(err);
    if (clientStatus !== null) {
      log.warn('request_rejected', { flow: 'http.error', status: clientStatus, message: err.message });

      return reply.status(clientStatus).send(buildResponse('VALIDATION_ERROR', err.message));
    }

    // 4) A unique constraint the service pre-check did not catch (concurrent writers)
    if (isUniqueViolation(err)) {
      log.warn('unique_violation', { flow: 'http.error', message: err.message });

      return reply.status(409).send(buildResponse('CONFLICT', 'Resource already exists'));
    }

    // 5) Unexpected errors — never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
  });

  app.setNotFoundHandler((req, reply) => {
    withRequestContext(req).warn('route_not_found', { flow: 'http.error' });

    return reply.status(404).send(buildResponse('NOT_FOUND', 'Route not found'));
  });
}
