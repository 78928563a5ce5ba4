import { describe, it, expect, vi } from 'vitest';

import {
  collectDistinctIds,
  enrichMany,
  enrichOne,
  type EntityId,
} from '../../src/enrichment/enrich';
import { peerFailure, peerOk, type PeerResult } from '../../src/peer/peer-result';

type Person = { id: number; companyId: number | null };
type Org = { id: number; employeeIds: number[] };
type OrgSummary = { id: number; name: string };
type PersonSummary = { id: number; firstName: string };

function makeLog() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

const people: Person[] = [
  { id: 1, companyId: 10 },
  { id: 2, companyId: 20 },
  { id: 3, companyId: 10 },
  { id: 4, companyId: null },
];

function orgs(ids: number[]): OrgSummary[] {
  return ids.map((id) => ({ id, name: `Org ${id}` }));
}

describe('collectDistinctIds', () => {
  it('drops nulls and duplicates, keeping first-seen order', () => {
    expect(collectDistinctIds(people, (p) => [p.companyId])).toEqual([10, 20]);
  });

  it('flattens one-to-many references', () => {
    const batch: Org[] = [
      { id: 1, employeeIds: [5, 6] },
      { id: 2, employeeIds: [6, 7] },
      { id: 3, employeeIds: [] },
    ];
    expect(collectDistinctIds(batch, (o) => o.employeeIds)).toEqual([5, 6, 7]);
  });
});

describe('enrichMany', () => {
  it('issues exactly one batch call with the distinct non-null ids', async () => {
    const log = makeLog();
    const fetchByIds = vi.fn(
      async (ids: EntityId[]): Promise<PeerResult<OrgSummary[]>> => peerOk(orgs(ids)),
    );

    const out = await enrichMany({
      entities: people,
      refsOf: (p) => [p.companyId],
      fetchByIds,
      idOf: (s) => s.id,
      attach: (p, resolve) => ({ id: p.id, company: resolve(p.companyId) }),
      log,
      flow: 'users.list',
    });

    expect(fetchByIds).toHaveBeenCalledTimes(1);
    expect(fetchByIds).toHaveBeenCalledWith([10, 20]);
    expect(out.status).toBe('COMPLETE');
    expect(out.items).toEqual([
      { id: 1, company: { id: 10, name: 'Org 10' } },
      { id: 2, company: { id: 20, name: 'Org 20' } },
      { id: 3, company: { id: 10, name: 'Org 10' } },
      { id: 4, company: null },
    ]);
  });

  it('leaves unresolved references empty and reports them as missing', async () => {
    const log = makeLog();

    const out = await enrichMany({
      entities: people,
      refsOf: (p) => [p.companyId],
      fetchByIds: async (): Promise<PeerResult<OrgSummary[]>> => peerOk(orgs([10])),
      idOf: (s) => s.id,
      attach: (p, resolve) => ({ id: p.id, company: resolve(p.companyId) }),
      log,
      flow: 'users.list',
    });

    expect(out.status).toBe('PARTIAL');
    expect(out.missingIds).toEqual([20]);
    expect(out.items.map((i) => i.company?.id ?? null)).toEqual([10, null, 10, null]);
    expect(log.warn).toHaveBeenCalledWith('users.list.enrich.missing_ids', {
      flow: 'users.list',
      missingIds: [20],
    });
  });

  it('returns every entity undecorated when the batch call fails', async () => {
    const log = makeLog();

    const out = await enrichMany({
      entities: people,
      refsOf: (p) => [p.companyId],
      fetchByIds: async (): Promise<PeerResult<OrgSummary[]>> =>
        peerFailure('UNAVAILABLE', 'Peer unreachable'),
      idOf: (s) => s.id,
      attach: (p, resolve) => ({ id: p.id, company: resolve(p.companyId) }),
      log,
      flow: 'users.list',
    });

    expect(out.status).toBe('UNAVAILABLE');
    expect(out.items).toHaveLength(4);
    expect(out.items.every((i) => i.company === null)).toBe(true);
    expect(log.error).toHaveBeenCalledTimes(1);
  });

  it('makes no peer call when nothing is referenced', async () => {
    const fetchByIds = vi.fn(
      async (ids: EntityId[]): Promise<PeerResult<OrgSummary[]>> => peerOk(orgs(ids)),
    );

    const out = await enrichMany({
      entities: [{ id: 9, companyId: null }],
      refsOf: (p: Person) => [p.companyId],
      fetchByIds,
      idOf: (s) => s.id,
      attach: (p, resolve) => ({ id: p.id, company: resolve(p.companyId) }),
      log: makeLog(),
      flow: 'users.list',
    });

    expect(fetchByIds).not.toHaveBeenCalled();
    expect(out.items).toEqual([{ id: 9, company: null }]);
    expect(out.status).toBe('COMPLETE');
  });

  it('resolves one-to-many references in list order and drops misses', async () => {
    const fetchByIds = vi.fn(
      async (): Promise<PeerResult<PersonSummary[]>> =>
        peerOk([
          { id: 7, firstName: 'Gail' },
          { id: 5, firstName: 'Eve' },
        ]),
    );

    const out = await enrichMany({
      entities: [
        { id: 1, employeeIds: [5, 6] },
        { id: 2, employeeIds: [7, 5] },
      ],
      refsOf: (o: Org) => o.employeeIds,
      fetchByIds,
      idOf: (s) => s.id,
      attach: (o, resolve) => ({
        id: o.id,
        employees: o.employeeIds.map(resolve).filter((e): e is PersonSummary => e !== null),
      }),
      log: makeLog(),
      flow: 'companies.list',
    });

    expect(fetchByIds).toHaveBeenCalledWith([5, 6, 7]);
    expect(out.items).toEqual([
      { id: 1, employees: [{ id: 5, firstName: 'Eve' }] },
      {
        id: 2,
        employees: [
          { id: 7, firstName: 'Gail' },
          { id: 5, firstName: 'Eve' },
        ],
      },
    ]);
    expect(out.missingIds).toEqual([6]);
  });
});

describe('enrichOne', () => {
  const attach = (p: Person, company: OrgSummary | null) => ({ id: p.id, company });

  it('skips the peer call for a null reference', async () => {
    const fetchById = vi.fn(async (): Promise<PeerResult<OrgSummary>> => peerOk(orgs([1])[0]));

    const out = await enrichOne({
      entity: { id: 4, companyId: null },
      ref: null,
      fetchById,
      attach,
      log: makeLog(),
      flow: 'users.get',
    });

    expect(fetchById).not.toHaveBeenCalled();
    expect(out).toEqual({ value: { id: 4, company: null }, status: 'COMPLETE', missingIds: [] });
  });

  it('attaches the summary on success', async () => {
    const out = await enrichOne({
      entity: { id: 1, companyId: 10 },
      ref: 10,
      fetchById: async (id): Promise<PeerResult<OrgSummary>> => peerOk({ id, name: 'Acme' }),
      attach,
      log: makeLog(),
      flow: 'users.get',
    });

    expect(out.value).toEqual({ id: 1, company: { id: 10, name: 'Acme' } });
    expect(out.status).toBe('COMPLETE');
  });

  it('treats a dangling reference as a miss', async () => {
    const out = await enrichOne({
      entity: { id: 1, companyId: 99 },
      ref: 99,
      fetchById: async (): Promise<PeerResult<OrgSummary>> =>
        peerFailure('NOT_FOUND', 'Peer resource not found', 404),
      attach,
      log: makeLog(),
      flow: 'users.get',
    });

    expect(out).toEqual({ value: { id: 1, company: null }, status: 'PARTIAL', missingIds: [99] });
  });

  it('degrades instead of failing when the peer is down', async () => {
    const log = makeLog();

    const out = await enrichOne({
      entity: { id: 5, companyId: 99 },
      ref: 99,
      fetchById: async (): Promise<PeerResult<OrgSummary>> =>
        peerFailure('UNAVAILABLE', 'Peer unreachable'),
      attach,
      log,
      flow: 'users.get',
    });

    expect(out).toEqual({ value: { id: 5, company: null }, status: 'UNAVAILABLE', missingIds: [] });
    expect(log.error).toHaveBeenCalledWith('users.get.enrich.unavailable', {
      flow: 'users.get',
      ref: 99,
      reason: 'UNAVAILABLE',
      peerStatus: null,
      peerMessage: 'Peer unreachable',
    });
  });
});
