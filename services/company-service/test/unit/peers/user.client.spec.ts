import { describe, it, expect, afterAll } from 'vitest';

import { createPeerHttp, PeerHttpClient } from '@roster/shared/peer/peer-http';
import { createInjectAdapter, createUnreachableAdapter } from '@roster/shared/testing/inject-adapter';

import { HttpUserClient } from '../../../src/peers/user/user.client';
import { createFakeUserService } from '../../helpers/fake-user-service';

const fake = createFakeUserService([
  { id: 42, firstName: 'Ada', lastName: 'Lovelace', phoneNumber: null, companyId: null },
]);

const ctx = { requestId: 'req-user-client' };

function client(adapter = createInjectAdapter(() => fake.app)) {
  return new HttpUserClient(
    new PeerHttpClient(createPeerHttp({ baseUrl: 'http://user-service.test', adapter }), 'user-service'),
  );
}

afterAll(async () => {
  await fake.app.close();
});

describe('HttpUserClient', () => {
  it('fetchByIds returns summaries for the ids that exist', async () => {
    expect(await client().fetchByIds(ctx, [7, 42])).toEqual({
      ok: true,
      value: [{ id: 42, firstName: 'Ada', lastName: 'Lovelace', phoneNumber: null, companyId: null }],
    });
  });

  it('fetchById asks by-ids for the one user, so user-service never calls back', async () => {
    fake.calls.length = 0;

    expect(await client().fetchById(ctx, 42)).toEqual({
      ok: true,
      value: { id: 42, firstName: 'Ada', lastName: 'Lovelace', phoneNumber: null, companyId: null },
    });
    expect(await client().fetchById(ctx, 7)).toEqual({
      ok: false,
      reason: 'NOT_FOUND',
      status: null,
      message: 'Peer resource not found',
    });
    expect(fake.calls).toEqual(['GET /api/v1/users/by-ids?ids=42', 'GET /api/v1/users/by-ids?ids=7']);
  });

  it('fetchByIds makes no request for an empty list', async () => {
    fake.calls.length = 0;

    expect(await client().fetchByIds(ctx, [])).toEqual({ ok: true, value: [] });
    expect(fake.calls).toEqual([]);
  });

  it('fetchByIds sends one request with the distinct ids', async () => {
    fake.calls.length = 0;

    await client().fetchByIds(ctx, [42, 7, 42]);

    expect(fake.calls).toEqual(['GET /api/v1/users/by-ids?ids=42,7']);
  });

  it('notifyAssociationChange PUTs {companyId} with the request id', async () => {
    fake.pushes.length = 0;

    expect(await client().notifyAssociationChange(ctx, 42, 3)).toEqual({ ok: true, value: undefined });
    expect(await client().notifyAssociationChange(ctx, 42, null)).toEqual({ ok: true, value: undefined });

    expect(fake.pushes).toEqual([
      { userId: 42, body: { companyId: 3 }, requestId: 'req-user-client' },
      { userId: 42, body: { companyId: null }, requestId: 'req-user-client' },
    ]);
  });

  it('notifyAssociationChange reports a failure instead of throwing', async () => {
    const res = await client(createUnreachableAdapter('refused')).notifyAssociationChange(ctx, 42, 3);

    expect(res).toEqual({
      ok: false,
      reason: 'UNAVAILABLE',
      status: null,
      message: 'Peer unreachable (ERR_NETWORK): connect ECONNREFUSED',
    });
  });
});
