/**
 * src/db/migrations/0001_create_app_user.ts
 *
 * - company_id is a weak reference into company-service's database:
 *   no foreign key, nullable, indexed for lookups by company.
 * - phone_number is optional but unique when present.
 */

import type { Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('app_user')
    .addColumn('id', 'bigserial', (col) => col.primaryKey())
    .addColumn('first_name', 'varchar(255)', (col) => col.notNull())
    .addColumn('last_name', 'varchar(255)', (col) => col.notNull())
    .addColumn('phone_number', 'varchar(50)', (col) => col.unique())
    .addColumn('company_id', 'bigint')
    .execute();

  await db.schema.createIndex('app_user_company_id_idx').on('app_user').column('company_id').execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('app_user').ifExists().execute();
}
