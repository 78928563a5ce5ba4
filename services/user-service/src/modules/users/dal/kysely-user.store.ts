/**
 * services/user-service/src/modules/users/dal/kysely-user.store.ts
 *
 * WHY:
 * - Postgres-backed UserStore (STORE_DRIVER=postgres).
 * - Composes the read queries and UserRepo; maps snake_case rows to domain types.
 */

import type { PageQuery, PageSlice } from '@roster/shared/paging/page';

import type { DbExecutor, UserRow } from '../../../db/schema';
import type { UserStore } from '../user.store';
import type { User, UserDraft, UserId, UserSortField } from '../user.types';
import {
  countUsersSql,
  selectUserByIdSql,
  selectUserByPhoneNumberSql,
  selectUserPageSql,
  selectUsersByIdsSql,
  userExistsSql,
} from './user.query-sql';
import { UserRepo } from './user.repo';

export function toUser(row: UserRow): User {
  return {
    id: row.id,
    firstName: row.first_name,
    lastName: row.last_name,
    phoneNumber: row.phone_number,
    companyId: row.company_id,
  };
}

function toColumns(user: UserDraft) {
  return {
    first_name: user.firstName,
    last_name: user.lastName,
    phone_number: user.phoneNumber,
    company_id: user.companyId,
  };
}

export class KyselyUserStore implements UserStore {
  private readonly repo: UserRepo;

  constructor(private readonly db: DbExecutor) {
    this.repo = new UserRepo(db);
  }

  async get(id: UserId): Promise<User | undefined> {
    const row = await selectUserByIdSql(this.db, id);
    return row ? toUser(row) : undefined;
  }

  async getBatch(ids: readonly UserId[]): Promise<User[]> {
    const distinct = [...new Set(ids)];
    if (distinct.length === 0) return [];

    const rows = await selectUsersByIdsSql(this.db, distinct);
    return rows.map(toUser);
  }

  async getPage(query: PageQuery<UserSortField>): Promise<PageSlice<User>> {
    const [rows, totalElements] = await Promise.all([
      selectUserPageSql(this.db, query),
      countUsersSql(this.db),
    ]);

    return { items: rows.map(toUser), totalElements };
  }

  async findByPhoneNumber(phoneNumber: string): Promise<User | undefined> {
    const row = await selectUserByPhoneNumberSql(this.db, phoneNumber);
    return row ? toUser(row) : undefined;
  }

  async save(user: UserDraft): Promise<User> {
    if (user.id === undefined) {
      return toUser(await this.repo.insertUser(toColumns(user)));
    }

    const row = await this.repo.updateUser(user.id, toColumns(user));
    if (!row) {
      throw new Error(`User ${user.id} disappeared before it could be updated`);
    }
    return toUser(row);
  }

  delete(id: UserId): Promise<boolean> {
    return this.repo.deleteUser(id);
  }

  existsById(id: UserId): Promise<boolean> {
    return userExistsSql(this.db, id);
  }
}
