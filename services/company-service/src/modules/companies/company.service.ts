/**
 * services/company-service/src/modules/companies/company.service.ts
 *
 * WHY:
 * - Orchestrates company reads (with employee enrichment) and the association
 *   mutations that keep user-service's User.companyId in step with employeeIds.
 *
 * HOW IT WORKS (mutations):
 * 1) Load the company (hard: 404 if absent).
 * 2) Change and persist the local list. This commit is final.
 * 3) Push the inverse side to user-service, best effort. A failed push is logged
 *    (`*.notify_failed`) and never undoes step 2.
 *
 * RULES:
 * - No HTTP here; controllers pass a FlowContext.
 * - Reads never fail because user-service is down: employees come back empty instead.
 * - Only an actual change to employeeIds triggers a push.
 * - A clear is pushed only to users whose companyId still names this company:
 *   a user moved to another company keeps that link.
 * - User lookups go through by-ids, whose summaries never call back into this service.
 */

import { enrichMany } from '@roster/shared/enrichment/enrich';
import type { FlowContext } from '@roster/shared/http/request-context';
import { withFlowContext, type ContextLogger } from '@roster/shared/logger/with-context';
import { toPage, type Page, type PageQuery } from '@roster/shared/paging/page';
import { describeFailure } from '@roster/shared/peer/peer-result';

import type { UserClient } from '../../peers/user/user.client';
import type { UserId } from '../../peers/user/user.types';
import { CompanyErrors } from './company.errors';
import type { CreateCompanyInput, UpdateCompanyInput } from './company.schemas';
import type { CompanyStore } from './company.store';
import type {
  Company,
  CompanyId,
  CompanySortField,
  CompanySummary,
  CompanyView,
} from './company.types';
import { toCompanySummary, toCompanyView } from './helpers/company-views';

export class CompanyService {
  constructor(
    private readonly deps: {
      companyStore: CompanyStore;
      userClient: UserClient;
    },
  ) {}

  async listCompanies(
    ctx: FlowContext,
    query: PageQuery<CompanySortField>,
  ): Promise<Page<CompanyView>> {
    const slice = await this.deps.companyStore.getPage(query);
    const items = await this.enrich(ctx, slice.items, 'companies.list');

    return toPage({ items, totalElements: slice.totalElements }, query);
  }

  async getCompany(ctx: FlowContext, id: CompanyId): Promise<CompanyView> {
    const company = await this.requireCompany(id);
    return this.enrichOne(ctx, company, 'companies.get');
  }

  async getCompaniesByIds(ids: readonly CompanyId[]): Promise<CompanySummary[]> {
    const companies = await this.deps.companyStore.getBatch(ids);
    return companies.map(toCompanySummary);
  }

  async createCompany(ctx: FlowContext, input: CreateCompanyInput): Promise<CompanyView> {
    const company = await this.deps.companyStore.save({
      companyName: input.companyName,
      budget: input.budget ?? null,
      employeeIds: [],
    });

    withFlowContext(ctx).info('companies.create.success', {
      flow: 'companies.create',
      companyId: company.id,
    });

    // A new company has no employees, so there is nothing to look up.
    return toCompanyView(company, () => null);
  }

  async updateCompany(
    ctx: FlowContext,
    id: CompanyId,
    input: UpdateCompanyInput,
  ): Promise<CompanyView> {
    const current = await this.requireCompany(id);

    const saved = await this.deps.companyStore.save({
      ...current,
      companyName: input.companyName ?? current.companyName,
      budget: input.budget === undefined ? current.budget : input.budget,
    });

    withFlowContext(ctx).info('companies.update.success', {
      flow: 'companies.update',
      companyId: id,
    });

    return this.enrichOne(ctx, saved, 'companies.update');
  }

  /**
   * Clears the companyId of every employee still linked here (one push each, in
   * list order), then deletes. A failed push is logged and skipped; the delete
   * still happens.
   */
  async deleteCompany(ctx: FlowContext, id: CompanyId): Promise<void> {
    const log = withFlowContext(ctx);
    const company = await this.requireCompany(id);

    const notifyFailures = await this.clearLinks(ctx, log, 'companies.delete', id, company.employeeIds);

    const deleted = await this.deps.companyStore.delete(id);
    if (!deleted) {
      throw CompanyErrors.companyNotFound({ companyId: id });
    }

    log.info('companies.delete.success', {
      flow: 'companies.delete',
      companyId: id,
      employeeCount: company.employeeIds.length,
      notifyFailures,
    });
  }

  async addEmployee(ctx: FlowContext, id: CompanyId, employeeId: UserId): Promise<CompanyView> {
    const log = withFlowContext(ctx);
    const flow = 'companies.add_employee';
    const company = await this.requireCompany(id);

    // Soft existence check: user-service being down must not block the add.
    const lookup = await this.deps.userClient.fetchById(ctx, employeeId);
    if (!lookup.ok) {
      log.warn(`${flow}.user_unconfirmed`, {
        flow,
        companyId: id,
        employeeId,
        ...describeFailure(lookup),
      });
    }

    if (company.employeeIds.includes(employeeId)) {
      log.info(`${flow}.already_member`, { flow, companyId: id, employeeId });
      return this.enrichOne(ctx, company, flow);
    }

    const saved = await this.deps.companyStore.save({
      ...company,
      employeeIds: [...company.employeeIds, employeeId],
    });

    log.info(`${flow}.success`, { flow, companyId: id, employeeId });
    await this.notify(ctx, log, flow, employeeId, id);

    return this.enrichOne(ctx, saved, flow);
  }

  async removeEmployee(ctx: FlowContext, id: CompanyId, employeeId: UserId): Promise<CompanyView> {
    const log = withFlowContext(ctx);
    const flow = 'companies.remove_employee';
    const company = await this.requireCompany(id);

    if (!company.employeeIds.includes(employeeId)) {
      log.warn(`${flow}.not_member`, { flow, companyId: id, employeeId });
      return this.enrichOne(ctx, company, flow);
    }

    const saved = await this.deps.companyStore.save({
      ...company,
      employeeIds: company.employeeIds.filter((e) => e !== employeeId),
    });

    log.info(`${flow}.success`, { flow, companyId: id, employeeId });
    await this.clearLinks(ctx, log, flow, id, [employeeId]);

    return this.enrichOne(ctx, saved, flow);
  }

  private async requireCompany(id: CompanyId): Promise<Company> {
    const company = await this.deps.companyStore.get(id);
    if (!company) {
      throw CompanyErrors.companyNotFound({ companyId: id });
    }
    return company;
  }

  private async enrich(ctx: FlowContext, companies: readonly Company[], flow: string) {
    const enriched = await enrichMany({
      entities: companies,
      refsOf: (c) => c.employeeIds,
      fetchByIds: (ids) => this.deps.userClient.fetchByIds(ctx, ids),
      idOf: (u) => u.id,
      attach: toCompanyView,
      log: withFlowContext(ctx),
      flow,
    });

    return enriched.items;
  }

  private async enrichOne(ctx: FlowContext, company: Company, flow: string): Promise<CompanyView> {
    const [view] = await this.enrich(ctx, [company], flow);
    return view ?? toCompanyView(company, () => null);
  }

  /**
   * Pushes `companyId: null` to each employee whose companyId is still `companyId`.
   * Users who moved elsewhere, or are already unlinked or gone, are skipped.
   * If the lookup fails nothing is pushed. Returns how many clears failed or went unconfirmed.
   */
  private async clearLinks(
    ctx: FlowContext,
    log: ContextLogger,
    flow: string,
    companyId: CompanyId,
    employeeIds: readonly UserId[],
  ): Promise<number> {
    if (employeeIds.length === 0) return 0;

    const lookup = await this.deps.userClient.fetchByIds(ctx, employeeIds);
    if (!lookup.ok) {
      log.error(`${flow}.clear_unconfirmed`, {
        flow,
        companyId,
        employeeIds,
        ...describeFailure(lookup),
      });
      return employeeIds.length;
    }

    const linked = new Set(lookup.value.filter((u) => u.companyId === companyId).map((u) => u.id));
    const skipped = employeeIds.filter((e) => !linked.has(e));
    if (skipped.length > 0) {
      log.info(`${flow}.clear_skipped`, { flow, companyId, employeeIds: skipped });
    }

    let failures = 0;
    for (const employeeId of employeeIds) {
      if (!linked.has(employeeId)) continue;
      const ok = await this.notify(ctx, log, flow, employeeId, null);
      if (!ok) failures += 1;
    }
    return failures;
  }

  /**
   * Best-effort push of one user's companyId. Returns whether user-service accepted it.
   */
  private async notify(
    ctx: FlowContext,
    log: ContextLogger,
    flow: string,
    employeeId: UserId,
    companyId: CompanyId | null,
  ): Promise<boolean> {
    const result = await this.deps.userClient.notifyAssociationChange(ctx, employeeId, companyId);
    if (result.ok) return true;

    log.error(`${flow}.notify_failed`, {
      flow,
      employeeId,
      companyId,
      ...describeFailure(result),
    });
    return false;
  }
}
