/**
 * services/user-service/src/peers/company/company.client.ts
 *
 * WHY:
 * - Everything user-service needs from company-service, behind one interface:
 *   single lookup (validation + single-user enrichment) and bulk lookup (page enrichment).
 * - Services depend on CompanyClient, never on HTTP; tests pass a fake.
 *
 * RULES:
 * - Never throws: failures come back as PeerResult (see @roster/shared/peer/peer-result).
 * - fetchByIds sends one request with the distinct ids; an empty list makes no request.
 */

import { z } from 'zod';

import type { FlowContext } from '@roster/shared/http/request-context';
import { API_PREFIX } from '@roster/shared/http/validate';
import type { PeerHttpClient } from '@roster/shared/peer/peer-http';
import { peerOk, type PeerResult } from '@roster/shared/peer/peer-result';

import { CompanySummarySchema, type CompanyId, type CompanySummary } from './company.types';

const CompanySummaryListSchema = z.array(CompanySummarySchema);

export interface CompanyClient {
  fetchById(ctx: FlowContext, id: CompanyId): Promise<PeerResult<CompanySummary>>;
  fetchByIds(ctx: FlowContext, ids: readonly CompanyId[]): Promise<PeerResult<CompanySummary[]>>;
}

export class HttpCompanyClient implements CompanyClient {
  constructor(private readonly http: PeerHttpClient) {}

  fetchById(ctx: FlowContext, id: CompanyId): Promise<PeerResult<CompanySummary>> {
    return this.http.get(ctx, `${API_PREFIX}/companies/${id}`, CompanySummarySchema);
  }

  async fetchByIds(
    ctx: FlowContext,
    ids: readonly CompanyId[],
  ): Promise<PeerResult<CompanySummary[]>> {
    const distinct = [...new Set(ids)];
    if (distinct.length === 0) return peerOk([]);

    return this.http.get(
      ctx,
      `${API_PREFIX}/companies/by-ids?ids=${distinct.join(',')}`,
      CompanySummaryListSchema,
    );
  }
}
