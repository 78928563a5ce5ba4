/**
 * services/company-service/src/db/schema.ts
 *
 * WHY:
 * - Kysely table types for the company-service database.
 * - Kept in step with src/db/migrations by hand.
 *
 * NOTES:
 * - pg returns numeric as a string; the store converts budget to a number.
 * - company_employee.position keeps the employee list in insertion order.
 */

import type { ColumnType, Generated, Kysely, Selectable } from 'kysely';

type Numeric = ColumnType<string, number | string, number | string>;

export interface CompanyTable {
  id: Generated<number>;
  company_name: string;
  budget: Numeric | null;
}

export interface CompanyEmployeeTable {
  company_id: number;
  employee_id: number;
  position: number;
}

export interface CompanyDatabase {
  company: CompanyTable;
  company_employee: CompanyEmployeeTable;
}

/**
 * DbExecutor is the only DB "capability" DAL functions accept.
 * Works for both the main DB and a transaction.
 */
export type DbExecutor = Kysely<CompanyDatabase>;

export type CompanyRow = Selectable<CompanyTable>;
