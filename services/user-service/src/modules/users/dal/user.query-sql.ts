/**
 * services/user-service/src/modules/users/dal/user.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for users.
 *
 * RULES:
 * - No AppError.
 * - No transactions started here.
 * - Returns raw rows; mapping to domain types happens in the store.
 */

import type { PageQuery } from '@roster/shared/paging/page';
import { offsetOf } from '@roster/shared/paging/page';

import type { DbExecutor, UserRow } from '../../../db/schema';
import type { UserSortField } from '../user.types';

const SORT_COLUMNS = {
  id: 'id',
  firstName: 'first_name',
  lastName: 'last_name',
  phoneNumber: 'phone_number',
  companyId: 'company_id',
} as const satisfies Record<UserSortField, keyof UserRow>;

export async function selectUserByIdSql(db: DbExecutor, id: number): Promise<UserRow | undefined> {
  return db.selectFrom('app_user').selectAll().where('id', '=', id).executeTakeFirst();
}

/**
 * One query for the whole batch. Caller guarantees a non-empty, distinct id list.
 */
export async function selectUsersByIdsSql(
  db: DbExecutor,
  ids: readonly number[],
): Promise<UserRow[]> {
  return db
    .selectFrom('app_user')
    .selectAll()
    .where('id', 'in', ids)
    .orderBy('id', 'asc')
    .execute();
}

export async function selectUserByPhoneNumberSql(
  db: DbExecutor,
  phoneNumber: string,
): Promise<UserRow | undefined> {
  return db
    .selectFrom('app_user')
    .selectAll()
    .where('phone_number', '=', phoneNumber)
    .executeTakeFirst();
}

export async function selectUserPageSql(
  db: DbExecutor,
  query: PageQuery<UserSortField>,
): Promise<UserRow[]> {
  let q = db
    .selectFrom('app_user')
    .selectAll()
    .orderBy(SORT_COLUMNS[query.sort.field], query.sort.direction);

  if (query.sort.field !== 'id') {
    q = q.orderBy('id', 'asc');
  }

  return q.limit(query.size).offset(offsetOf(query)).execute();
}

export async function countUsersSql(db: DbExecutor): Promise<number> {
  const row = await db
    .selectFrom('app_user')
    .select((eb) => eb.fn.countAll<number>().as('total'))
    .executeTakeFirst();

  return Number(row?.total ?? 0);
}

export async function userExistsSql(db: DbExecutor, id: number): Promise<boolean> {
  const row = await db
    .selectFrom('app_user')
    .select('id')
    .where('id', '=', id)
    .executeTakeFirst();

  return row !== undefined;
}
