/**
 * services/company-service/src/peers/user/user.types.ts
 *
 * WHY:
 * - The slice of a User this service is allowed to know about.
 * - Parsing a full user view through this schema drops its nested company.
 */

import { z } from 'zod';

export type UserId = number;

export const UserSummarySchema = z.object({
  id: z.number().int().positive(),
  firstName: z.string(),
  lastName: z.string(),
  phoneNumber: z.string().nullable(),
  companyId: z.number().int().positive().nullable(),
});

export type UserSummary = z.infer<typeof UserSummarySchema>;
