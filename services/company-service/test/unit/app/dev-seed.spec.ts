import { describe, it, expect } from 'vitest';

import { loadDemoCompanies, runDevSeed } from '../../../src/db/seed/dev-seed';
import { InMemCompanyStore } from '../../../src/modules/companies/dal/inmem-company.store';

describe('dev seed', () => {
  it('loads the demo companies file', async () => {
    const companies = await loadDemoCompanies();

    expect(companies).toHaveLength(5);
    expect(companies[0]).toEqual({ companyName: 'Northwind Traders', budget: 250000 });
  });

  it('is idempotent', async () => {
    const companyStore = new InMemCompanyStore();
    const companies = [
      { companyName: 'Seed One', budget: 10 },
      { companyName: 'Seed Two', budget: null },
    ];

    expect(await runDevSeed({ companyStore, companies })).toBe(2);
    expect(await runDevSeed({ companyStore, companies })).toBe(0);

    const page = await companyStore.getPage({ page: 0, size: 10, sort: { field: 'id', direction: 'asc' } });
    expect(page.items).toEqual([
      { id: 1, companyName: 'Seed One', budget: 10, employeeIds: [] },
      { id: 2, companyName: 'Seed Two', budget: null, employeeIds: [] },
    ]);
  });
});
