import { describe, it, expect } from 'vitest';

import { InMemUserStore } from '../../../src/modules/users/dal/inmem-user.store';

async function seeded() {
  const store = new InMemUserStore();
  await store.save({ firstName: 'Carol', lastName: 'Zed', phoneNumber: '300', companyId: 2 });
  await store.save({ firstName: 'Alice', lastName: 'Young', phoneNumber: null, companyId: null });
  await store.save({ firstName: 'Bob', lastName: 'Xu', phoneNumber: '100', companyId: 1 });
  return store;
}

describe('InMemUserStore', () => {
  it('assigns increasing ids on insert', async () => {
    const store = await seeded();
    const page = await store.getPage({ page: 0, size: 10, sort: { field: 'id', direction: 'asc' } });
    expect(page.items.map((u) => u.id)).toEqual([1, 2, 3]);
  });

  it('getBatch collapses duplicates, skips misses, and orders by id', async () => {
    const store = await seeded();
    const users = await store.getBatch([3, 42, 1, 3]);
    expect(users.map((u) => u.id)).toEqual([1, 3]);
  });

  it('getBatch of nothing is nothing', async () => {
    const store = await seeded();
    expect(await store.getBatch([])).toEqual([]);
  });

  it('sorts by a field with nulls last ascending and first descending', async () => {
    const store = await seeded();

    const asc = await store.getPage({ page: 0, size: 10, sort: { field: 'companyId', direction: 'asc' } });
    expect(asc.items.map((u) => u.id)).toEqual([3, 1, 2]);

    const desc = await store.getPage({ page: 0, size: 10, sort: { field: 'companyId', direction: 'desc' } });
    expect(desc.items.map((u) => u.id)).toEqual([2, 1, 3]);
  });

  it('slices pages and reports the total', async () => {
    const store = await seeded();
    const page = await store.getPage({ page: 1, size: 2, sort: { field: 'firstName', direction: 'asc' } });

    expect(page.totalElements).toBe(3);
    expect(page.items.map((u) => u.firstName)).toEqual(['Carol']);
  });

  it('updates in place and refuses to update a missing user', async () => {
    const store = await seeded();

    const updated = await store.save({ id: 2, firstName: 'Alicia', lastName: 'Young', phoneNumber: null, companyId: 1 });
    expect(updated).toEqual({ id: 2, firstName: 'Alicia', lastName: 'Young', phoneNumber: null, companyId: 1 });

    await expect(
      store.save({ id: 9, firstName: 'Nobody', lastName: 'Here', phoneNumber: null, companyId: null }),
    ).rejects.toThrow('User 9 disappeared before it could be updated');
  });

  it('enforces phone number uniqueness like the database constraint', async () => {
    const store = await seeded();

    await expect(
      store.save({ firstName: 'Dan', lastName: 'Dup', phoneNumber: '100', companyId: null }),
    ).rejects.toMatchObject({ code: '23505' });
  });

  it('returns copies, not live references', async () => {
    const store = await seeded();
    const user = await store.get(1);
    if (!user) throw new Error('expected user 1');

    user.firstName = 'Mutated';

    expect((await store.get(1))?.firstName).toBe('Carol');
  });

  it('delete reports whether anything was removed', async () => {
    const store = await seeded();
    expect(await store.delete(1)).toBe(true);
    expect(await store.delete(1)).toBe(false);
    expect(await store.existsById(1)).toBe(false);
    expect(await store.findByPhoneNumber('300')).toBeUndefined();
  });
});
