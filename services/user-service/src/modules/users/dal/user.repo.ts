/**
 * services/user-service/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users (mutations).
 *
 * RULES:
 * - No transactions started here (caller owns tx).
 * - No AppError.
 * - Supports withDb() for transaction binding.
 */

import type { DbExecutor, NewUserRow, UserRow, UserRowPatch } from '../../../db/schema';

export class UserRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): UserRepo {
    return new UserRepo(db);
  }

  /**
   * Phone number uniqueness is enforced by a DB constraint (23505 on conflict).
   */
  async insertUser(values: NewUserRow): Promise<UserRow> {
    return this.db.insertInto('app_user').values(values).returningAll().executeTakeFirstOrThrow();
  }

  async updateUser(id: number, patch: UserRowPatch): Promise<UserRow | undefined> {
    return this.db
      .updateTable('app_user')
      .set(patch)
      .where('id', '=', id)
      .returningAll()
      .executeTakeFirst();
  }

  async deleteUser(id: number): Promise<boolean> {
    const result = await this.db.deleteFrom('app_user').where('id', '=', id).executeTakeFirst();
    return result.numDeletedRows > 0n;
  }
}
