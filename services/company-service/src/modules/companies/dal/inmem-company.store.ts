/**
 * services/company-service/src/modules/companies/dal/inmem-company.store.ts
 *
 * WHY:
 * - In-memory CompanyStore for tests and STORE_DRIVER=memory.
 * - Same contract as KyselyCompanyStore (nulls last ascending, first descending).
 */

import { offsetOf, type PageQuery, type PageSlice } from '@roster/shared/paging/page';

import type { CompanyStore } from '../company.store';
import type { Company, CompanyDraft, CompanyId, CompanySortField } from '../company.types';

function compareNullable(a: string | number | null, b: string | number | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a < b ? -1 : 1;
}

function copy(company: Company): Company {
  return { ...company, employeeIds: [...company.employeeIds] };
}

export class InMemCompanyStore implements CompanyStore {
  private readonly companies = new Map<CompanyId, Company>();
  private nextId = 1;

  async get(id: CompanyId): Promise<Company | undefined> {
    const company = this.companies.get(id);
    return company ? copy(company) : undefined;
  }

  async getBatch(ids: readonly CompanyId[]): Promise<Company[]> {
    const found: Company[] = [];
    for (const id of new Set(ids)) {
      const company = this.companies.get(id);
      if (company) found.push(copy(company));
    }
    return found.sort((a, b) => a.id - b.id);
  }

  async getPage(query: PageQuery<CompanySortField>): Promise<PageSlice<Company>> {
    const { field, direction } = query.sort;
    const sign = direction === 'asc' ? 1 : -1;

    const sorted = [...this.companies.values()].sort(
      (a, b) => sign * compareNullable(a[field], b[field]) || a.id - b.id,
    );

    const start = offsetOf(query);
    return {
      items: sorted.slice(start, start + query.size).map(copy),
      totalElements: sorted.length,
    };
  }

  async save(draft: CompanyDraft): Promise<Company> {
    if (draft.id !== undefined && !this.companies.has(draft.id)) {
      throw new Error(`Company ${draft.id} disappeared before it could be updated`);
    }

    const id = draft.id ?? this.nextId++;
    const company: Company = {
      id,
      companyName: draft.companyName,
      budget: draft.budget,
      employeeIds: [...new Set(draft.employeeIds)],
    };
    this.companies.set(id, company);
    return copy(company);
  }

  async delete(id: CompanyId): Promise<boolean> {
    return this.companies.delete(id);
  }

  async existsById(id: CompanyId): Promise<boolean> {
    return this.companies.has(id);
  }
}
