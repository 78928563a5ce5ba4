import Fastify from 'fastify';

import type { CompanySummary } from '../../src/peers/company/company.types';

/**
 * WHY:
 * - user-service tests need a company-service that answers the two lookups
 *   user-service makes, and lets the test see how often it was called.
 *
 * RULES:
 * - In-process only; reached through createInjectAdapter().
 * - `down` switches every route to 503 without rebuilding the app.
 */
export function createFakeCompanyService(companies: CompanySummary[]) {
  const byId = new Map(companies.map((c) => [c.id, c]));
  const calls: string[] = [];
  const state = { down: false };

  const app = Fastify({ logger: false });

  app.addHook('onRequest', async (req, reply) => {
    calls.push(`${req.method} ${req.url}`);
    if (state.down) {
      return reply.status(503).send({ error: { code: 'INTERNAL', message: 'down' } });
    }
  });

  app.get<{ Querystring: { ids?: string } }>('/api/v1/companies/by-ids', async (req) => {
    const ids = (req.query.ids ?? '').split(',').filter(Boolean).map(Number);
    return [...new Set(ids)]
      .sort((a, b) => a - b)
      .flatMap((id) => {
        const company = byId.get(id);
        return company ? [company] : [];
      });
  });

  app.get<{ Params: { id: string } }>('/api/v1/companies/:id', async (req, reply) => {
    const company = byId.get(Number(req.params.id));
    if (!company) {
      return reply.status(404).send({ error: { code: 'NOT_FOUND', message: 'Company not found' } });
    }
    return company;
  });

  return { app, calls, state };
}
