/**
 * services/user-service/src/peers/company/company.types.ts
 *
 * WHY:
 * - The slice of a Company this service is allowed to know about.
 * - The schema is the contract check on company-service's responses:
 *   unknown keys (e.g. the employee list of a full company view) are stripped.
 */

import { z } from 'zod';

export type CompanyId = number;

export const CompanySummarySchema = z.object({
  id: z.number().int().positive(),
  companyName: z.string(),
  budget: z.number().nullable(),
});

export type CompanySummary = z.infer<typeof CompanySummarySchema>;
