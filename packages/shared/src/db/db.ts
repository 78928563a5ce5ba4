/**
 * packages/shared/src/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection for either service.
 * - Each service owns its own database and its own table types (src/db/schema.ts);
 *   this factory only knows how to build the pool + dialect.
 *
 * HOW TO USE:
 * - const db = createDb<UserDatabase>(config.databaseUrl)
 * - DAL functions accept the service's `DbExecutor` alias (db or trx).
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

// numeric -> string and bigint -> string are pg's defaults; ids fit in a JS number,
// so parse int8 as number once for the whole process.
const PG_INT8_OID = 20;
pg.types.setTypeParser(PG_INT8_OID, (value: string) => Number(value));

export function createDb<DB>(databaseUrl: string): Kysely<DB> {
  const pool = new pg.Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
  });
}
