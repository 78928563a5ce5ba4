/**
 * services/company-service/src/peers/user/user.client.ts
 *
 * WHY:
 * - Everything company-service needs from user-service, behind one interface:
 *   lookups for enrichment and membership checks, and the association push that
 *   keeps User.companyId in sync.
 * - Services depend on UserClient, never on HTTP; tests pass a fake.
 *
 * RULES:
 * - Never throws: failures come back as PeerResult.
 * - fetchByIds sends one request with the distinct ids; an empty list makes no request.
 * - fetchById goes through by-ids too: the single-user route would enrich the user by
 *   calling back into company-service.
 * - notifyAssociationChange is best effort; the caller logs a failure and moves on.
 */

import { z } from 'zod';

import type { FlowContext } from '@roster/shared/http/request-context';
import { API_PREFIX } from '@roster/shared/http/validate';
import type { PeerHttpClient } from '@roster/shared/peer/peer-http';
import { peerFailure, peerOk, type PeerResult } from '@roster/shared/peer/peer-result';

import { UserSummarySchema, type UserId, type UserSummary } from './user.types';

const UserSummaryListSchema = z.array(UserSummarySchema);

export interface UserClient {
  fetchById(ctx: FlowContext, id: UserId): Promise<PeerResult<UserSummary>>;
  fetchByIds(ctx: FlowContext, ids: readonly UserId[]): Promise<PeerResult<UserSummary[]>>;
  notifyAssociationChange(
    ctx: FlowContext,
    userId: UserId,
    companyId: number | null,
  ): Promise<PeerResult<void>>;
}

export class HttpUserClient implements UserClient {
  constructor(private readonly http: PeerHttpClient) {}

  async fetchById(ctx: FlowContext, id: UserId): Promise<PeerResult<UserSummary>> {
    const result = await this.fetchByIds(ctx, [id]);
    if (!result.ok) return result;

    const found = result.value.find((u) => u.id === id);
    return found ? peerOk(found) : peerFailure('NOT_FOUND', 'Peer resource not found');
  }

  async fetchByIds(ctx: FlowContext, ids: readonly UserId[]): Promise<PeerResult<UserSummary[]>> {
    const distinct = [...new Set(ids)];
    if (distinct.length === 0) return peerOk([]);

    return this.http.get(
      ctx,
      `${API_PREFIX}/users/by-ids?ids=${distinct.join(',')}`,
      UserSummaryListSchema,
    );
  }

  notifyAssociationChange(
    ctx: FlowContext,
    userId: UserId,
    companyId: number | null,
  ): Promise<PeerResult<void>> {
    return this.http.put(ctx, `${API_PREFIX}/users/${userId}/company`, { companyId });
  }
}
