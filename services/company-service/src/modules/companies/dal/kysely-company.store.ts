/**
 * services/company-service/src/modules/companies/dal/kysely-company.store.ts
 *
 * WHY:
 * - Postgres-backed CompanyStore (STORE_DRIVER=postgres).
 * - A save touches two tables, so it runs in one transaction.
 */

import type { PageQuery, PageSlice } from '@roster/shared/paging/page';

import type { DbExecutor } from '../../../db/schema';
import type { CompanyStore } from '../company.store';
import type { Company, CompanyDraft, CompanyId, CompanySortField } from '../company.types';
import {
  companyExistsSql,
  countCompaniesSql,
  selectCompaniesByIdsSql,
  selectCompanyByIdSql,
  selectCompanyPageSql,
  type CompanyWithEmployeesRow,
} from './company.query-sql';
import { CompanyRepo } from './company.repo';

export function toCompany(row: CompanyWithEmployeesRow): Company {
  return {
    id: row.id,
    companyName: row.company_name,
    budget: row.budget === null ? null : Number(row.budget),
    employeeIds: row.employees.map((e) => e.employee_id),
  };
}

export class KyselyCompanyStore implements CompanyStore {
  private readonly repo: CompanyRepo;

  constructor(private readonly db: DbExecutor) {
    this.repo = new CompanyRepo(db);
  }

  async get(id: CompanyId): Promise<Company | undefined> {
    const row = await selectCompanyByIdSql(this.db, id);
    return row ? toCompany(row) : undefined;
  }

  async getBatch(ids: readonly CompanyId[]): Promise<Company[]> {
    const distinct = [...new Set(ids)];
    if (distinct.length === 0) return [];

    const rows = await selectCompaniesByIdsSql(this.db, distinct);
    return rows.map(toCompany);
  }

  async getPage(query: PageQuery<CompanySortField>): Promise<PageSlice<Company>> {
    const [rows, totalElements] = await Promise.all([
      selectCompanyPageSql(this.db, query),
      countCompaniesSql(this.db),
    ]);

    return { items: rows.map(toCompany), totalElements };
  }

  async save(company: CompanyDraft): Promise<Company> {
    const columns = { company_name: company.companyName, budget: company.budget };
    const employeeIds = [...new Set(company.employeeIds)];

    return this.db.transaction().execute(async (trx) => {
      const repo = this.repo.withDb(trx);

      let id: CompanyId;
      if (company.id === undefined) {
        id = (await repo.insertCompany(columns)).id;
      } else {
        const updated = await repo.updateCompany(company.id, columns);
        if (!updated) {
          throw new Error(`Company ${company.id} disappeared before it could be updated`);
        }
        id = company.id;
      }

      await repo.replaceEmployees(id, employeeIds);

      return { id, companyName: company.companyName, budget: company.budget, employeeIds };
    });
  }

  delete(id: CompanyId): Promise<boolean> {
    return this.repo.deleteCompany(id);
  }

  existsById(id: CompanyId): Promise<boolean> {
    return companyExistsSql(this.db, id);
  }
}
