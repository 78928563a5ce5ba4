/**
 * services/user-service/src/modules/users/user.service.ts
 *
 * WHY:
 * - Orchestrates user reads (with company enrichment) and user writes
 *   (with hard company validation).
 *
 * RULES:
 * - No HTTP here; controllers pass a FlowContext.
 * - Reads never fail because company-service is down: the company is null instead.
 * - Writes that reference a company abort unless company-service confirms it exists.
 * - Users never notify company-service. Company.employeeIds is the authoritative list;
 *   User.companyId is a cache that company-service keeps in sync.
 */

import type { FlowContext } from '@roster/shared/http/request-context';
import { enrichMany, enrichOne } from '@roster/shared/enrichment/enrich';
import { withFlowContext } from '@roster/shared/logger/with-context';
import { describeFailure } from '@roster/shared/peer/peer-result';
import { toPage, type Page, type PageQuery } from '@roster/shared/paging/page';

import type { CompanyClient } from '../../peers/company/company.client';
import type { CompanyId, CompanySummary } from '../../peers/company/company.types';
import { toUserSummary, toUserView } from './helpers/user-views';
import { UserErrors } from './user.errors';
import type { CreateUserInput, UpdateUserInput } from './user.schemas';
import type { UserStore } from './user.store';
import type { User, UserId, UserSortField, UserSummary, UserView } from './user.types';

export class UserService {
  constructor(
    private readonly deps: {
      userStore: UserStore;
      companyClient: CompanyClient;
    },
  ) {}

  async listUsers(ctx: FlowContext, query: PageQuery<UserSortField>): Promise<Page<UserView>> {
    const slice = await this.deps.userStore.getPage(query);

    const enriched = await enrichMany({
      entities: slice.items,
      refsOf: (u) => [u.companyId],
      fetchByIds: (ids) => this.deps.companyClient.fetchByIds(ctx, ids),
      idOf: (c) => c.id,
      attach: (u, resolve) => toUserView(u, resolve(u.companyId)),
      log: withFlowContext(ctx),
      flow: 'users.list',
    });

    return toPage({ items: enriched.items, totalElements: slice.totalElements }, query);
  }

  async getUser(ctx: FlowContext, id: UserId): Promise<UserView> {
    const user = await this.requireUser(id);

    const enriched = await enrichOne({
      entity: user,
      ref: user.companyId,
      fetchById: (companyId) => this.deps.companyClient.fetchById(ctx, companyId),
      attach: toUserView,
      log: withFlowContext(ctx),
      flow: 'users.get',
    });

    return enriched.value;
  }

  async getUsersByIds(ids: readonly UserId[]): Promise<UserSummary[]> {
    const users = await this.deps.userStore.getBatch(ids);
    return users.map(toUserSummary);
  }

  async createUser(ctx: FlowContext, input: CreateUserInput): Promise<UserView> {
    const log = withFlowContext(ctx);
    const phoneNumber = input.phoneNumber ?? null;
    const companyId = input.companyId ?? null;

    await this.assertPhoneNumberFree(phoneNumber, undefined);
    const company = companyId === null ? null : await this.requireCompany(ctx, companyId);

    const user = await this.deps.userStore.save({
      firstName: input.firstName,
      lastName: input.lastName,
      phoneNumber,
      companyId,
    });

    log.info('users.create.success', { flow: 'users.create', userId: user.id, companyId });

    return toUserView(user, company);
  }

  async updateUser(ctx: FlowContext, id: UserId, input: UpdateUserInput): Promise<UserView> {
    const log = withFlowContext(ctx);
    const current = await this.requireUser(id);

    const next: User = {
      id: current.id,
      firstName: input.firstName ?? current.firstName,
      lastName: input.lastName ?? current.lastName,
      phoneNumber: input.phoneNumber === undefined ? current.phoneNumber : input.phoneNumber,
      companyId: input.companyId === undefined ? current.companyId : input.companyId,
    };

    if (next.phoneNumber !== current.phoneNumber) {
      await this.assertPhoneNumberFree(next.phoneNumber, id);
    }

    // Only a changed, non-null company is re-validated; an unchanged one is decorated softly.
    const companyChanged = next.companyId !== current.companyId;
    const validated =
      companyChanged && next.companyId !== null
        ? await this.requireCompany(ctx, next.companyId)
        : null;

    const saved = await this.deps.userStore.save(next);

    log.info('users.update.success', {
      flow: 'users.update',
      userId: id,
      companyChanged,
      companyId: saved.companyId,
    });

    if (validated !== null || saved.companyId === null) {
      return toUserView(saved, validated);
    }

    const enriched = await enrichOne({
      entity: saved,
      ref: saved.companyId,
      fetchById: (companyId) => this.deps.companyClient.fetchById(ctx, companyId),
      attach: toUserView,
      log,
      flow: 'users.update',
    });

    return enriched.value;
  }

  async deleteUser(ctx: FlowContext, id: UserId): Promise<void> {
    const deleted = await this.deps.userStore.delete(id);
    if (!deleted) {
      throw UserErrors.userNotFound({ userId: id });
    }

    // No peer notification: a company still listing this id drops it on its next read.
    withFlowContext(ctx).info('users.delete.success', { flow: 'users.delete', userId: id });
  }

  /**
   * Inverse-side update pushed by company-service when an employee is added or removed.
   */
  async setUserCompany(ctx: FlowContext, id: UserId, companyId: CompanyId | null): Promise<void> {
    const current = await this.requireUser(id);

    if (companyId !== null) {
      await this.requireCompany(ctx, companyId);
    }

    if (current.companyId !== companyId) {
      await this.deps.userStore.save({ ...current, companyId });
    }

    withFlowContext(ctx).info('users.set_company.success', {
      flow: 'users.set_company',
      userId: id,
      previousCompanyId: current.companyId,
      companyId,
    });
  }

  private async requireUser(id: UserId): Promise<User> {
    const user = await this.deps.userStore.get(id);
    if (!user) {
      throw UserErrors.userNotFound({ userId: id });
    }
    return user;
  }

  /**
   * Hard dependency: anything short of a confirmed company aborts the write.
   */
  private async requireCompany(ctx: FlowContext, companyId: CompanyId): Promise<CompanySummary> {
    const result = await this.deps.companyClient.fetchById(ctx, companyId);
    if (result.ok) return result.value;

    withFlowContext(ctx).warn('users.company_validation.failed', {
      flow: 'users.company_validation',
      companyId,
      ...describeFailure(result),
    });

    throw UserErrors.companyNotFound({ companyId, reason: result.reason });
  }

  private async assertPhoneNumberFree(
    phoneNumber: string | null,
    ownerId: UserId | undefined,
  ): Promise<void> {
    if (phoneNumber === null) return;

    const holder = await this.deps.userStore.findByPhoneNumber(phoneNumber);
    if (holder && holder.id !== ownerId) {
      throw UserErrors.phoneNumberTaken({ phoneNumber, holderId: holder.id });
    }
  }
}
