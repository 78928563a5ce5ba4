/**
 * services/company-service/src/modules/companies/dal/company.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for companies and their employee rows.
 *
 * RULES:
 * - No transactions started here (the store owns the tx for a save).
 * - No AppError.
 * - Supports withDb() for transaction binding.
 */

import type { DbExecutor } from '../../../db/schema';

type CompanyColumns = {
  company_name: string;
  budget: number | null;
};

export class CompanyRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): CompanyRepo {
    return new CompanyRepo(db);
  }

  async insertCompany(values: CompanyColumns): Promise<{ id: number }> {
    return this.db
      .insertInto('company')
      .values(values)
      .returning('id')
      .executeTakeFirstOrThrow();
  }

  async updateCompany(id: number, values: CompanyColumns): Promise<boolean> {
    const result = await this.db
      .updateTable('company')
      .set(values)
      .where('id', '=', id)
      .executeTakeFirst();

    return result.numUpdatedRows > 0n;
  }

  /**
   * Rewrites the employee list: positions follow array order.
   */
  async replaceEmployees(companyId: number, employeeIds: readonly number[]): Promise<void> {
    await this.db.deleteFrom('company_employee').where('company_id', '=', companyId).execute();

    if (employeeIds.length === 0) return;

    await this.db
      .insertInto('company_employee')
      .values(
        employeeIds.map((employeeId, position) => ({
          company_id: companyId,
          employee_id: employeeId,
          position,
        })),
      )
      .execute();
  }

  async deleteCompany(id: number): Promise<boolean> {
    const result = await this.db.deleteFrom('company').where('id', '=', id).executeTakeFirst();
    return result.numDeletedRows > 0n;
  }
}
