import { describe, it, expect, afterAll } from 'vitest';

import { createPeerHttp, PeerHttpClient } from '@roster/shared/peer/peer-http';
import { createInjectAdapter, createUnreachableAdapter } from '@roster/shared/testing/inject-adapter';

import { HttpCompanyClient } from '../../../src/peers/company/company.client';
import { createFakeCompanyService } from '../../helpers/fake-company-service';

const fake = createFakeCompanyService([
  { id: 1, companyName: 'Acme', budget: 1000 },
  { id: 3, companyName: 'Initech', budget: 12.5 },
]);

const ctx = { requestId: 'req-company-client' };

function client(adapter = createInjectAdapter(() => fake.app)) {
  return new HttpCompanyClient(
    new PeerHttpClient(createPeerHttp({ baseUrl: 'http://company-service.test', adapter }), 'company-service'),
  );
}

afterAll(async () => {
  await fake.app.close();
});

describe('HttpCompanyClient', () => {
  it('fetchById returns the summary', async () => {
    expect(await client().fetchById(ctx, 1)).toEqual({
      ok: true,
      value: { id: 1, companyName: 'Acme', budget: 1000 },
    });
  });

  it('fetchById reports NOT_FOUND for a missing company', async () => {
    const res = await client().fetchById(ctx, 2);
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.reason).toBe('NOT_FOUND');
  });

  it('fetchByIds sends one request with the distinct ids', async () => {
    fake.calls.length = 0;

    const res = await client().fetchByIds(ctx, [3, 1, 3, 2]);

    expect(fake.calls).toEqual(['GET /api/v1/companies/by-ids?ids=3,1,2']);
    expect(res).toEqual({
      ok: true,
      value: [
        { id: 1, companyName: 'Acme', budget: 1000 },
        { id: 3, companyName: 'Initech', budget: 12.5 },
      ],
    });
  });

  it('fetchByIds of nothing makes no request', async () => {
    fake.calls.length = 0;

    expect(await client().fetchByIds(ctx, [])).toEqual({ ok: true, value: [] });
    expect(fake.calls).toEqual([]);
  });

  it('reports UNAVAILABLE when company-service cannot be reached', async () => {
    const res = await client(createUnreachableAdapter('timeout')).fetchByIds(ctx, [1]);
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.reason).toBe('UNAVAILABLE');
  });
});
