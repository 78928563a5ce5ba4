/**
 * services/company-service/src/db/migrate.ts
 *
 * HOW TO USE:
 * - npm run db:migrate -w @roster/company-service
 *
 * We point directly at the SOURCE migrations folder and run with tsx,
 * so dynamic imports of `.ts` migrations work.
 */

import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { createDb } from '@roster/shared/db/db';
import { runMigrations } from '@roster/shared/db/migrate';
import { logger } from '@roster/shared/logger/logger';

import { buildConfig } from '../app/config';
import type { CompanyDatabase } from './schema';

const migrationsDir = path.join(path.dirname(fileURLToPath(import.meta.url)), 'migrations');

async function main(): Promise<void> {
  const config = buildConfig();
  if (!config.databaseUrl) {
    logger.warn('migrations.skipped', { reason: 'STORE_DRIVER is not postgres' });
    return;
  }

  const db = createDb<CompanyDatabase>(config.databaseUrl);
  try {
    await runMigrations(db, migrationsDir);
  } finally {
    await db.destroy();
  }
}

void main().catch((err: unknown) => {
  logger.error('migrations.failed', { err });
  process.exit(1);
});
