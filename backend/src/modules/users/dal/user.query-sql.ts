/**
 * backend/src/modules/users/dal/user.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for users.
 * - "Active" = deleted_at IS NULL. Every lookup by email is active-only, matching the
 *   partial unique index.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { UsersTable } from '../../../shared/db/schema';

export type UserRow = Selectable<UsersTable>;

export async function selectActiveUserByEmailSql(
  db: DbExecutor,
  email: string,
): Promise<UserRow | undefined> {
  return db
    .selectFrom('users')
    .selectAll()
    .where('email', '=', email.toLowerCase())
    .where('deleted_at', 'is', null)
    .executeTakeFirst();
}

export async function selectActiveUserByNicknameSql(
  db: DbExecutor,
  nickname: string,
): Promise<UserRow | undefined> {
  return db
    .selectFrom('users')
    .selectAll()
    .where('nickname', '=', nickname)
    .where('deleted_at', 'is', null)
    .executeTakeFirst();
}

export async function selectUserByIdSql(
  db: DbExecutor,
  userId: number,
): Promise<UserRow | undefined> {
  return db.selectFrom('users').selectAll().where('id', '=', userId).executeTakeFirst();
}

export async function selectActivePasswordHashSql(
  db: DbExecutor,
  where: { email: string } | { userId: number },
): Promise<{ id: number; nickname: string; password_hash: string } | undefined> {
  let query = db
    .selectFrom('users')
    .select(['id', 'nickname', 'password_hash'])
    .where('deleted_at', 'is', null);

  query =
    'email' in where
      ? query.where('email', '=', where.email.toLowerCase())
      : query.where('id', '=', where.userId);

  return query.executeTakeFirst();
}
