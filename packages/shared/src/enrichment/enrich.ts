/**
 * packages/shared/src/enrichment/enrich.ts
 *
 * WHY:
 * - Both services decorate their own entities with data owned by the peer:
 *   a user gets its company summary (1 -> 1), a company gets its employees (1 -> many).
 * - The shape of that work is identical on both sides, so it lives here once.
 *
 * HOW IT WORKS (bulk):
 * 1) Collect the DISTINCT non-null foreign ids across the whole batch.
 * 2) Issue exactly ONE fetchByIds call with that set (never one call per entity).
 * 3) Index the returned summaries by id.
 * 4) Attach to every entity, in the original order and count; unresolved ids resolve to null.
 *
 * RULES:
 * - Enrichment never fails the read. A failed peer call yields status UNAVAILABLE
 *   and every entity is returned undecorated.
 * - Ids the peer did not return are logged (warn) and dropped, never an error.
 * - A null foreign id means no peer call at all.
 */

import type { ContextLogger } from '../logger/with-context';
import { describeFailure, type PeerResult } from '../peer/peer-result';

export type EntityId = number;

/**
 * COMPLETE: every referenced id resolved (or nothing was referenced).
 * PARTIAL: the peer answered but some ids were missing.
 * UNAVAILABLE: the peer call failed; nothing was attached.
 */
export type EnrichmentStatus = 'COMPLETE' | 'PARTIAL' | 'UNAVAILABLE';

export type Enriched<R> = {
  value: R;
  status: EnrichmentStatus;
  missingIds: EntityId[];
};

export type EnrichedMany<R> = {
  items: R[];
  status: EnrichmentStatus;
  missingIds: EntityId[];
};

export type Resolve<S> = (id: EntityId | null) => S | null;

export function collectDistinctIds<E>(
  entities: readonly E[],
  refsOf: (entity: E) => readonly (EntityId | null)[],
): EntityId[] {
  const seen = new Set<EntityId>();

  for (const entity of entities) {
    for (const ref of refsOf(entity)) {
      if (ref !== null) seen.add(ref);
    }
  }

  return [...seen];
}

export async function enrichMany<E, S, R>(params: {
  entities: readonly E[];
  refsOf: (entity: E) => readonly (EntityId | null)[];
  fetchByIds: (ids: EntityId[]) => Promise<PeerResult<S[]>>;
  idOf: (summary: S) => EntityId;
  attach: (entity: E, resolve: Resolve<S>) => R;
  log: ContextLogger;
  flow: string;
}): Promise<EnrichedMany<R>> {
  const { entities, log, flow } = params;

  const ids = collectDistinctIds(entities, params.refsOf);
  const attachAll = (resolve: Resolve<S>) => entities.map((e) => params.attach(e, resolve));

  if (ids.length === 0) {
    return { items: attachAll(() => null), status: 'COMPLETE', missingIds: [] };
  }

  const result = await params.fetchByIds(ids);

  if (!result.ok) {
    log.error(`${flow}.enrich.unavailable`, {
      flow,
      requestedCount: ids.length,
      ...describeFailure(result),
    });

    return { items: attachAll(() => null), status: 'UNAVAILABLE', missingIds: [] };
  }

  const byId = new Map<EntityId, S>();
  for (const summary of result.value) {
    byId.set(params.idOf(summary), summary);
  }

  const missingIds = ids.filter((id) => !byId.has(id));
  if (missingIds.length > 0) {
    log.warn(`${flow}.enrich.missing_ids`, { flow, missingIds });
  }

  return {
    items: attachAll((id) => (id === null ? null : (byId.get(id) ?? null))),
    status: missingIds.length > 0 ? 'PARTIAL' : 'COMPLETE',
    missingIds,
  };
}

export async function enrichOne<E, S, R>(params: {
  entity: E;
  ref: EntityId | null;
  fetchById: (id: EntityId) => Promise<PeerResult<S>>;
  attach: (entity: E, summary: S | null) => R;
  log: ContextLogger;
  flow: string;
}): Promise<Enriched<R>> {
  const { entity, ref, log, flow } = params;

  if (ref === null) {
    return { value: params.attach(entity, null), status: 'COMPLETE', missingIds: [] };
  }

  const result = await params.fetchById(ref);

  if (result.ok) {
    return { value: params.attach(entity, result.value), status: 'COMPLETE', missingIds: [] };
  }

  if (result.reason === 'NOT_FOUND') {
    log.warn(`${flow}.enrich.missing_ids`, { flow, missingIds: [ref] });
    return { value: params.attach(entity, null), status: 'PARTIAL', missingIds: [ref] };
  }

  log.error(`${flow}.enrich.unavailable`, { flow, ref, ...describeFailure(result) });
  return { value: params.attach(entity, null), status: 'UNAVAILABLE', missingIds: [] };
}
