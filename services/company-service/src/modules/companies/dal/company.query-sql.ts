/**
 * services/company-service/src/modules/companies/dal/company.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for companies.
 * - A company row and its employee list come back in ONE query: the ordered
 *   employee ids are aggregated as a JSON array per company.
 *
 * RULES:
 * - No AppError.
 * - No transactions started here.
 */

import { jsonArrayFrom } from 'kysely/helpers/postgres';

import { offsetOf, type PageQuery } from '@roster/shared/paging/page';

import type { DbExecutor } from '../../../db/schema';
import type { CompanySortField } from '../company.types';

const SORT_COLUMNS = {
  id: 'company.id',
  companyName: 'company.company_name',
  budget: 'company.budget',
} as const satisfies Record<CompanySortField, string>;

function selectCompanyWithEmployees(db: DbExecutor) {
  return db
    .selectFrom('company')
    .selectAll('company')
    .select((eb) => [
      jsonArrayFrom(
        eb
          .selectFrom('company_employee')
          .select('company_employee.employee_id')
          .whereRef('company_employee.company_id', '=', 'company.id')
          .orderBy('company_employee.position', 'asc'),
      ).as('employees'),
    ]);
}

export type CompanyWithEmployeesRow = Awaited<
  ReturnType<ReturnType<typeof selectCompanyWithEmployees>['executeTakeFirstOrThrow']>
>;

export async function selectCompanyByIdSql(
  db: DbExecutor,
  id: number,
): Promise<CompanyWithEmployeesRow | undefined> {
  return selectCompanyWithEmployees(db).where('company.id', '=', id).executeTakeFirst();
}

/**
 * One query for the whole batch. Caller guarantees a non-empty, distinct id list.
 */
export async function selectCompaniesByIdsSql(
  db: DbExecutor,
  ids: readonly number[],
): Promise<CompanyWithEmployeesRow[]> {
  return selectCompanyWithEmployees(db)
    .where('company.id', 'in', ids)
    .orderBy('company.id', 'asc')
    .execute();
}

export async function selectCompanyPageSql(
  db: DbExecutor,
  query: PageQuery<CompanySortField>,
): Promise<CompanyWithEmployeesRow[]> {
  let q = selectCompanyWithEmployees(db).orderBy(
    SORT_COLUMNS[query.sort.field],
    query.sort.direction,
  );

  if (query.sort.field !== 'id') {
    q = q.orderBy('company.id', 'asc');
  }

  return q.limit(query.size).offset(offsetOf(query)).execute();
}

export async function countCompaniesSql(db: DbExecutor): Promise<number> {
  const row = await db
    .selectFrom('company')
    .select((eb) => eb.fn.countAll<number>().as('total'))
    .executeTakeFirst();

  return Number(row?.total ?? 0);
}

export async function companyExistsSql(db: DbExecutor, id: number): Promise<boolean> {
  const row = await db
    .selectFrom('company')
    .select('id')
    .where('id', '=', id)
    .executeTakeFirst();

  return row !== undefined;
}
