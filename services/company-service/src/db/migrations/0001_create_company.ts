/**
 * src/db/migrations/0001_create_company.ts
 *
 * - company_employee holds the authoritative employee list; employee_id is a weak
 *   reference into user-service's database (no foreign key).
 * - Rows go with their company (on delete cascade).
 */

import { sql, type Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('company')
    .addColumn('id', 'bigserial', (col) => col.primaryKey())
    .addColumn('company_name', 'varchar(255)', (col) => col.notNull())
    .addColumn('budget', sql`numeric(19, 4)`)
    .execute();

  await db.schema
    .createTable('company_employee')
    .addColumn('company_id', 'bigint', (col) =>
      col.notNull().references('company.id').onDelete('cascade'),
    )
    .addColumn('employee_id', 'bigint', (col) => col.notNull())
    .addColumn('position', 'integer', (col) => col.notNull())
    .addPrimaryKeyConstraint('company_employee_pk', ['company_id', 'employee_id'])
    .execute();

  await db.schema
    .createIndex('company_employee_employee_id_idx')
    .on('company_employee')
    .column('employee_id')
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('company_employee').ifExists().execute();
  await db.schema.dropTable('company').ifExists().execute();
}
