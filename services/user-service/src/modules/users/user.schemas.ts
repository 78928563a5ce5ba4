/**
 * services/user-service/src/modules/users/user.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Users module.
 * - Prevents invalid payloads from reaching services.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Names are trimmed before length checks.
 * - companyId: omitted = unchanged (update) / none (create); null = clear.
 */

import { z } from 'zod';

import { pageQuerySchema } from '@roster/shared/paging/page';
import { USER_SORT_FIELDS } from './user.types';

function nameSchema(field: string) {
  return z
    .string()
    .trim()
    .min(3, `${field} must be between 3 and 50 characters`)
    .max(50, `${field} must be between 3 and 50 characters`);
}

const phoneNumberSchema = z
  .string()
  .trim()
  .min(1, 'phoneNumber cannot be blank')
  .max(11, 'The phone number must not exceed 11 characters');

const companyRefSchema = z.number().int().positive('Company ID must be positive').nullable();

export const createUserSchema = z.object({
  firstName: nameSchema('firstName'),
  lastName: nameSchema('lastName'),
  phoneNumber: phoneNumberSchema.nullable().optional(),
  companyId: companyRefSchema.optional(),
});

export type CreateUserInput = z.infer<typeof createUserSchema>;

export const updateUserSchema = z.object({
  firstName: nameSchema('firstName').optional(),
  lastName: nameSchema('lastName').optional(),
  phoneNumber: phoneNumberSchema.nullable().optional(),
  companyId: companyRefSchema.optional(),
});

export type UpdateUserInput = z.infer<typeof updateUserSchema>;

/**
 * PUT /users/:id/company accepts `{ "companyId": n | null }`, a bare JSON number or null,
 * or no body at all (= null).
 */
export const setUserCompanySchema = z
  .union([z.object({ companyId: companyRefSchema }), companyRefSchema, z.undefined()])
  .transform((body): number | null =>
    typeof body === 'object' && body !== null ? body.companyId : (body ?? null),
  );

export const listUsersQuerySchema = pageQuerySchema(USER_SORT_FIELDS);
