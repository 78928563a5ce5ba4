/**
 * services/company-service/src/modules/companies/company.types.ts
 *
 * RULES:
 * - employeeIds is the authoritative membership list, in the order employees were added.
 *   user-service's User.companyId mirrors it on a best-effort basis.
 */

import type { UserId, UserSummary } from '../../peers/user/user.types';

export type CompanyId = number;

export type Company = {
  id: CompanyId;
  companyName: string;
  budget: number | null;
  employeeIds: UserId[];
};

export type CompanyDraft = Omit<Company, 'id'> & { id?: CompanyId };

export const COMPANY_SORT_FIELDS = ['id', 'companyName', 'budget'] as const;

export type CompanySortField = (typeof COMPANY_SORT_FIELDS)[number];

/**
 * What peers get from /companies/by-ids: no employee list.
 */
export type CompanySummary = {
  id: CompanyId;
  companyName: string;
  budget: number | null;
};

/**
 * Enriched read model. `employees` follows employeeIds order; ids user-service
 * did not return (deleted users, or user-service down) are simply absent.
 */
export type CompanyView = CompanySummary & {
  employeeIds: UserId[];
  employees: UserSummary[];
};
