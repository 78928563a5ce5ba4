/**
 * services/user-service/src/modules/users/helpers/user-views.ts
 *
 * Response shaping for users. Pure functions; no IO.
 */

import type { CompanySummary } from '../../../peers/company/company.types';
import type { User, UserSummary, UserView } from '../user.types';

export function toUserSummary(user: User): UserSummary {
  return {
    id: user.id,
    firstName: user.firstName,
    lastName: user.lastName,
    phoneNumber: user.phoneNumber,
    companyId: user.companyId,
  };
}

export function toUserView(user: User, company: CompanySummary | null): UserView {
  return { ...toUserSummary(user), company };
}
