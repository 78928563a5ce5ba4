/**
 * services/company-service/src/db/seed/dev-seed.ts
 *
 * DEV-ONLY seed bootstrap.
 *
 * Creates the demo companies listed in demo-companies.json, without employees.
 *
 * Idempotent: does nothing when any company already exists, so it is safe to run
 * on every start. Works against whichever CompanyStore DI picked.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';

import { logger } from '@roster/shared/logger/logger';

import type { CompanyStore } from '../../modules/companies/company.store';

const DemoCompaniesSchema = z.array(
  z.object({
    companyName: z.string().min(1),
    budget: z.number().nonnegative().nullable(),
  }),
);

export type DemoCompany = z.infer<typeof DemoCompaniesSchema>[number];

const DEMO_COMPANIES_FILE = new URL('./demo-companies.json', import.meta.url);

export async function loadDemoCompanies(): Promise<DemoCompany[]> {
  const raw: unknown = JSON.parse(await readFile(DEMO_COMPANIES_FILE, 'utf8'));
  return DemoCompaniesSchema.parse(raw);
}

export async function runDevSeed(opts: {
  companyStore: CompanyStore;
  companies: readonly DemoCompany[];
}): Promise<number> {
  const flow = 'seed.dev';

  const existing = await opts.companyStore.getPage({
    page: 0,
    size: 1,
    sort: { field: 'id', direction: 'asc' },
  });

  if (existing.totalElements > 0) {
    logger.info('seed.skipped_not_empty', { flow, existing: existing.totalElements });
    return 0;
  }

  for (const demo of opts.companies) {
    const company = await opts.companyStore.save({ ...demo, employeeIds: [] });
    logger.info('seed.company.created', { flow, companyId: company.id, companyName: company.companyName });
  }

  return opts.companies.length;
}
