/**
 * packages/shared/src/logger/with-context.ts
 *
 * WHY:
 * - Most logs should include requestId so we can trace a full request across both services.
 * - We don't want every handler or service repeating the same fields manually.
 *
 * HOW TO USE:
 * - In a request handler: `withRequestContext(req).info('msg', { flow: '...' })`
 * - In a service: `withFlowContext(ctx).warn('msg', { flow: '...' })`
 */

import type { FastifyRequest } from 'fastify';
import type { FlowContext } from '../http/request-context';
import { logger } from './logger';

export type LogMeta = Record<string, unknown>;

export type ContextLogger = {
  info: (msg: string, meta?: LogMeta) => void;
  warn: (msg: string, meta?: LogMeta) => void;
  error: (msg: string, meta?: LogMeta) => void;
  debug: (msg: string, meta?: LogMeta) => void;
};

function bind(base: LogMeta): ContextLogger {
  return {
    info: (msg, meta = {}) => logger.info(msg, { ...base, ...meta }),
    warn: (msg, meta = {}) => logger.warn(msg, { ...base, ...meta }),
    error: (msg, meta = {}) => logger.error(msg, { ...base, ...meta }),
    debug: (msg, meta = {}) => logger.debug(msg, { ...base, ...meta }),
  };
}

export function withRequestContext(req: FastifyRequest): ContextLogger {
  return bind({
    requestId: req.requestContext?.requestId,
    method: req.method,
    url: req.url,
  });
}

export function withFlowContext(ctx: FlowContext): ContextLogger {
  return bind({ requestId: ctx.requestId });
}
