/**
 * services/company-service/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> server -> routes -> (dev) seed
 * - Makes E2E tests simple (build once, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 */

import { logger } from '@roster/shared/logger/logger';

import { loadDemoCompanies, runDevSeed } from '../db/seed/dev-seed';
import type { AppConfig } from './config';
import { buildDeps, type DepsOverrides } from './di';
import { registerRoutes } from './routes';
import { buildServer } from '@roster/shared/http/server';

export async function buildApp(config: AppConfig, overrides: DepsOverrides = {}) {
  const deps = await buildDeps(config, overrides);
  const app = await buildServer();

  registerRoutes(app, { config, deps });

  // DEV-only seed bootstrap
  if (config.seedOnStart) {
    const flow = 'seed.dev';

    if (config.nodeEnv === 'production') {
      logger.warn('seed.skipped_in_production', { flow });
    } else {
      logger.info('seed.start', { flow });
      const created = await runDevSeed({
        companyStore: deps.companyStore,
        companies: await loadDemoCompanies(),
      });
      logger.info('seed.done', { flow, created });
    }
  }

  await app.ready();

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
