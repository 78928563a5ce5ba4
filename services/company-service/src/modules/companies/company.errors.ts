/**
 * services/company-service/src/modules/companies/company.errors.ts
 *
 * WHY:
 * - Companies module owns its domain semantics.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 */

import { AppError, type AppErrorMeta } from '@roster/shared/http/errors';

export const CompanyErrors = {
  companyNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Company not found', meta);
  },
} as const;
