/**
 * services/company-service/src/modules/companies/company.store.ts
 *
 * CONTRACT:
 * - get: undefined when absent.
 * - getBatch: ONE round trip for an unordered id collection; misses omitted;
 *   duplicates collapse; an empty input makes no query. Ordered by id.
 * - save: inserts when `id` is absent, otherwise overwrites the company and its
 *   whole employee list atomically.
 * - delete: false when there was nothing to delete.
 */

import type { PageQuery, PageSlice } from '@roster/shared/paging/page';

import type { Company, CompanyDraft, CompanyId, CompanySortField } from './company.types';

export interface CompanyStore {
  get(id: CompanyId): Promise<Company | undefined>;
  getBatch(ids: readonly CompanyId[]): Promise<Company[]>;
  getPage(query: PageQuery<CompanySortField>): Promise<PageSlice<Company>>;
  save(company: CompanyDraft): Promise<Company>;
  delete(id: CompanyId): Promise<boolean>;
  existsById(id: CompanyId): Promise<boolean>;
}
