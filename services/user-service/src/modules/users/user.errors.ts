/**
 * services/user-service/src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its domain semantics.
 * - Prevents shared/http/errors.ts from becoming a giant god-file.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - A company that cannot be confirmed during a write is NOT_FOUND, whether
 *   company-service said 404 or could not be reached (the write is aborted either way).
 */

import { AppError, type AppErrorMeta } from '@roster/shared/http/errors';

export const UserErrors = {
  userNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found', meta);
  },

  companyNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Referenced company not found', meta);
  },

  phoneNumberTaken(meta?: AppErrorMeta) {
    return AppError.conflict('Phone number is already in use', meta);
  },
} as const;
