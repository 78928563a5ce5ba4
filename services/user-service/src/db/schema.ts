/**
 * services/user-service/src/db/schema.ts
 *
 * WHY:
 * - Kysely table types for the user-service database.
 * - Kept in step with src/db/migrations by hand (one table).
 *
 * RULES:
 * - snake_case stays here and in dal/; domain types use camelCase.
 */

import type { Generated, Insertable, Kysely, Selectable, Updateable } from 'kysely';

export interface AppUserTable {
  id: Generated<number>;
  first_name: string;
  last_name: string;
  phone_number: string | null;
  company_id: number | null;
}

export interface UserDatabase {
  app_user: AppUserTable;
}

/**
 * DbExecutor is the only DB "capability" DAL functions accept.
 * Works for both the main DB and a transaction.
 */
export type DbExecutor = Kysely<UserDatabase>;

export type UserRow = Selectable<AppUserTable>;
export type NewUserRow = Insertable<AppUserTable>;
export type UserRowPatch = Updateable<AppUserTable>;
