/**
 * services/user-service/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - The store shapes DB rows into these types (keeps DB shapes isolated).
 *
 * RULES:
 * - companyId is a weak reference to a company owned by company-service.
 *   It is a best-effort cache: company-service's employee list is authoritative.
 */

import type { CompanyId, CompanySummary } from '../../peers/company/company.types';

export type UserId = number;

export type User = {
  id: UserId;
  firstName: string;
  lastName: string;
  phoneNumber: string | null;
  companyId: CompanyId | null;
};

/**
 * A user that may not have been saved yet (no id until the store assigns one).
 */
export type UserDraft = Omit<User, 'id'> & { id?: UserId };

export const USER_SORT_FIELDS = ['id', 'firstName', 'lastName', 'phoneNumber', 'companyId'] as const;

export type UserSortField = (typeof USER_SORT_FIELDS)[number];

/**
 * What peers get from /users/by-ids: flat, no nested company, so a bulk lookup
 * from company-service never calls back into company-service.
 */
export type UserSummary = {
  id: UserId;
  firstName: string;
  lastName: string;
  phoneNumber: string | null;
  companyId: CompanyId | null;
};

/**
 * Enriched read model. `company` is resolved at read time and never persisted;
 * null when the user has no company, the company is gone, or company-service is down.
 */
export type UserView = UserSummary & {
  company: CompanySummary | null;
};
