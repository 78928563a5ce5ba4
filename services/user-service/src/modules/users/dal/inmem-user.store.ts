/**
 * services/user-service/src/modules/users/dal/inmem-user.store.ts
 *
 * WHY:
 * - In-memory UserStore for tests and STORE_DRIVER=memory.
 * - Same contract as KyselyUserStore, including phone uniqueness and
 *   Postgres-like null ordering (nulls last ascending, first descending).
 */

import type { PageQuery, PageSlice } from '@roster/shared/paging/page';
import { offsetOf } from '@roster/shared/paging/page';

import type { UserStore } from '../user.store';
import type { User, UserDraft, UserId, UserSortField } from '../user.types';

function compareNullable(a: string | number | null, b: string | number | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a < b ? -1 : 1;
}

export class InMemUserStore implements UserStore {
  private readonly users = new Map<UserId, User>();
  private nextId = 1;

  async get(id: UserId): Promise<User | undefined> {
    const user = this.users.get(id);
    return user ? { ...user } : undefined;
  }

  async getBatch(ids: readonly UserId[]): Promise<User[]> {
    const found: User[] = [];
    for (const id of new Set(ids)) {
      const user = this.users.get(id);
      if (user) found.push({ ...user });
    }
    return found.sort((a, b) => a.id - b.id);
  }

  async getPage(query: PageQuery<UserSortField>): Promise<PageSlice<User>> {
    const { field, direction } = query.sort;
    const sign = direction === 'asc' ? 1 : -1;

    const sorted = [...this.users.values()].sort(
      (a, b) => sign * compareNullable(a[field], b[field]) || a.id - b.id,
    );

    const start = offsetOf(query);
    return {
      items: sorted.slice(start, start + query.size).map((u) => ({ ...u })),
      totalElements: sorted.length,
    };
  }

  async findByPhoneNumber(phoneNumber: string): Promise<User | undefined> {
    for (const user of this.users.values()) {
      if (user.phoneNumber === phoneNumber) return { ...user };
    }
    return undefined;
  }

  async save(draft: UserDraft): Promise<User> {
    if (draft.id !== undefined && !this.users.has(draft.id)) {
      throw new Error(`User ${draft.id} disappeared before it could be updated`);
    }

    if (draft.phoneNumber !== null) {
      const holder = await this.findByPhoneNumber(draft.phoneNumber);
      if (holder && holder.id !== draft.id) {
        throw Object.assign(new Error('duplicate key value violates unique constraint'), {
          code: '23505',
        });
      }
    }

    const id = draft.id ?? this.nextId++;
    const user: User = { ...draft, id };
    this.users.set(id, user);
    return { ...user };
  }

  async delete(id: UserId): Promise<boolean> {
    return this.users.delete(id);
  }

  async existsById(id: UserId): Promise<boolean> {
    return this.users.has(id);
  }
}
