/**
 * services/company-service/src/modules/companies/helpers/company-views.ts
 *
 * Response shaping for companies. Pure functions; no IO.
 */

import type { Resolve } from '@roster/shared/enrichment/enrich';

import type { UserSummary } from '../../../peers/user/user.types';
import type { Company, CompanySummary, CompanyView } from '../company.types';

export function toCompanySummary(company: Company): CompanySummary {
  return {
    id: company.id,
    companyName: company.companyName,
    budget: company.budget,
  };
}

/**
 * Employees in employeeIds order; ids that did not resolve are left out.
 */
export function toCompanyView(company: Company, resolve: Resolve<UserSummary>): CompanyView {
  const employees: UserSummary[] = [];
  for (const id of company.employeeIds) {
    const employee = resolve(id);
    if (employee) employees.push(employee);
  }

  return {
    ...toCompanySummary(company),
    employeeIds: [...company.employeeIds],
    employees,
  };
}
