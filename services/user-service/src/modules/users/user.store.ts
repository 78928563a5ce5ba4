/**
 * services/user-service/src/modules/users/user.store.ts
 *
 * WHY:
 * - The service depends on this abstraction so tests (and STORE_DRIVER=memory)
 *   can use an in-memory implementation.
 *
 * CONTRACT:
 * - get: undefined when absent (the service decides that is a 404).
 * - getBatch: ONE round trip for an unordered id collection; ids not found are
 *   silently omitted; duplicates collapse; an empty input makes no query. Ordered by id.
 * - save: inserts when `id` is absent (id assigned by the store), otherwise overwrites.
 * - delete: false when there was nothing to delete.
 */

import type { PageQuery, PageSlice } from '@roster/shared/paging/page';
import type { User, UserDraft, UserId, UserSortField } from './user.types';

export interface UserStore {
  get(id: UserId): Promise<User | undefined>;
  getBatch(ids: readonly UserId[]): Promise<User[]>;
  getPage(query: PageQuery<UserSortField>): Promise<PageSlice<User>>;
  findByPhoneNumber(phoneNumber: string): Promise<User | undefined>;
  save(user: UserDraft): Promise<User>;
  delete(id: UserId): Promise<boolean>;
  existsById(id: UserId): Promise<boolean>;
}
