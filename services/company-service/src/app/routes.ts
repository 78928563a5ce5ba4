/**
 * services/company-service/src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes: core (/health) and module routes.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';

export function registerRoutes(app: FastifyInstance, opts: { config: AppConfig; deps: AppDeps }) {
  app.get('/health', (req) => {
    return {
      ok: true,
      env: opts.config.nodeEnv,
      service: opts.config.serviceName,
      storeDriver: opts.config.storeDriver,
      requestId: req.requestContext.requestId,
    };
  });

  opts.deps.companies.registerRoutes(app);
}
