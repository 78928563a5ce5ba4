/**
 * packages/shared/src/http/request-context.ts
 *
 * WHY:
 * - A request that starts at one service often fans out to its peer
 *   (User -> Company -> User). One stable requestId ties all those log lines together.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 * - Services receive `toFlowContext(req)`; peer clients forward `requestId` as `x-request-id`.
 *
 * RULES:
 * - An inbound x-request-id is trusted only if it is a short non-empty string.
 * - The id is always echoed back on the response.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export const REQUEST_ID_HEADER = 'x-request-id';

const MAX_REQUEST_ID_LENGTH = 128;

export type RequestContext = {
  requestId: string;
};

/**
 * What services see of the request: enough to log and to correlate peer calls.
 */
export type FlowContext = {
  requestId: string;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

export function parseRequestId(raw: unknown): string | null {
  if (typeof raw !== 'string') return null;

  const trimmed = raw.trim();
  if (!trimmed || trimmed.length > MAX_REQUEST_ID_LENGTH) return null;

  return trimmed;
}

export function toFlowContext(req: FastifyRequest): FlowContext {
  return { requestId: req.requestContext.requestId };
}

export function registerRequestContext(app: FastifyInstance) {
  // Decorate first so Fastify knows the shape; the real value is assigned per request.
  app.decorateRequest('requestContext', null as unknown as RequestContext);

  app.addHook('onRequest', (req: FastifyRequest, reply, done) => {
    const requestId = parseRequestId(req.headers[REQUEST_ID_HEADER]) ?? randomUUID();

    req.requestContext = { requestId };
    reply.header(REQUEST_ID_HEADER, requestId);

    done();
  });
}
