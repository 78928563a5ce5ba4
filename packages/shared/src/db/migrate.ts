/**
 * packages/shared/src/db/migrate.ts
 *
 * WHY:
 * - Both services run their own Kysely migrations the same way.
 * - TS migrations live in each service's `src/db/migrations`; the service entrypoint
 *   (`src/db/migrate.ts`, run with `tsx`) points this runner at that folder.
 *
 * RULES:
 * - A migration module must export `up` (and may export `down`).
 * - Files are applied in file-name order (0001_, 0002_, ...).
 */

import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { readdir } from 'node:fs/promises';

import { Migrator, type Kysely, type Migration, type MigrationProvider } from 'kysely';
import { logger } from '../logger/logger';

type MigrationFn = Migration['up'];

function isMigrationFn(value: unknown): value is MigrationFn {
  return typeof value === 'function';
}

function toMigration(file: string, mod: Record<string, unknown>): Migration {
  const { up, down } = mod;
  if (!isMigrationFn(up)) {
    throw new Error(`Migration ${file} does not export an up() function`);
  }
  return isMigrationFn(down) ? { up, down } : { up };
}

export class SourceFolderMigrationProvider implements MigrationProvider {
  constructor(private readonly migrationsDir: string) {}

  async getMigrations(): Promise<Record<string, Migration>> {
    const files = (await readdir(this.migrationsDir)).filter((f) => f.endsWith('.ts')).sort();

    logger.info('migrations.found', { count: files.length, files });

    const migrations: Record<string, Migration> = {};

    for (const file of files) {
      const url = pathToFileURL(path.join(this.migrationsDir, file)).href;

      // tsx allows importing TS here
      const mod: Record<string, unknown> = await import(url);

      migrations[file.replace(/\.ts$/, '')] = toMigration(file, mod);
    }

    return migrations;
  }
}

export async function runMigrations<DB>(db: Kysely<DB>, migrationsDir: string): Promise<void> {
  const migrator = new Migrator({ db, provider: new SourceFolderMigrationProvider(migrationsDir) });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('migration.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('migration.error', { migration: r.migrationName });
  });

  if (error) {
    throw error instanceof Error ? error : new Error(`Migration failed: ${String(error)}`);
  }

  logger.info('migrations.up_to_date');
}
