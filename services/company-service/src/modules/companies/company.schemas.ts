/**
 * services/company-service/src/modules/companies/company.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Companies module.
 *
 * RULES:
 * - Employee lists are never accepted from create/update bodies
 *   (only the employee routes change membership).
 */

import { z } from 'zod';

import { positiveIdSchema } from '@roster/shared/http/params';
import { pageQuerySchema } from '@roster/shared/paging/page';

import { COMPANY_SORT_FIELDS } from './company.types';

const companyNameSchema = z
  .string()
  .trim()
  .min(1, 'companyName cannot be blank')
  .max(255, 'companyName must not exceed 255 characters');

// Fits the numeric(19,4) column: below 10^15, at most 4 decimal places.
const budgetSchema = z
  .number()
  .finite()
  .nonnegative('budget must not be negative')
  .lt(1e15, 'budget must be below 1000000000000000')
  .multipleOf(0.0001, 'budget allows at most 4 decimal places')
  .nullable();

export const createCompanySchema = z.object({
  companyName: companyNameSchema,
  budget: budgetSchema.optional(),
});

export type CreateCompanyInput = z.infer<typeof createCompanySchema>;

export const updateCompanySchema = z.object({
  companyName: companyNameSchema.optional(),
  budget: budgetSchema.optional(),
});

export type UpdateCompanyInput = z.infer<typeof updateCompanySchema>;

export const employeeParamsSchema = z.object({
  id: positiveIdSchema,
  employeeId: positiveIdSchema,
});

export const listCompaniesQuerySchema = pageQuerySchema(COMPANY_SORT_FIELDS);
