/**
 * backend/src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into User domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 * - "Active" lookups ignore withdrawn rows; getUserById does not (audits, scripts).
 */

import type { DbExecutor } from '../../../shared/db/db';
import {
  selectActivePasswordHashSql,
  selectActiveUserByEmailSql,
  selectActiveUserByNicknameSql,
  selectUserByIdSql,
  type UserRow,
} from '../dal/user.query-sql';
import type { LoginCredentials, PublicProfile, User } from '../user.types';

export function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    nickname: row.nickname,
    profileImageUrl: row.profile_image_url ?? null,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    deletedAt: row.deleted_at ?? null,
  };
}

export function toPublicProfile(user: User): PublicProfile {
  return {
    id: user.id,
    nickname: user.nickname,
    profileImageUrl: user.profileImageUrl,
    createdAt: user.createdAt,
  };
}

export async function getActiveUserByEmail(
  db: DbExecutor,
  email: string,
): Promise<User | undefined> {
  const row = await selectActiveUserByEmailSql(db, email);
  return row ? toUser(row) : undefined;
}

export async function getActiveUserByNickname(
  db: DbExecutor,
  nickname: string,
): Promise<User | undefined> {
  const row = await selectActiveUserByNicknameSql(db, nickname);
  return row ? toUser(row) : undefined;
}

export async function getUserById(db: DbExecutor, userId: number): Promise<User | undefined> {
  const row = await selectUserByIdSql(db, userId);
  return row ? toUser(row) : undefined;
}

export async function getActiveUserById(
  db: DbExecutor,
  userId: number,
): Promise<User | undefined> {
  const user = await getUserById(db, userId);
  return user && user.deletedAt === null ? user : undefined;
}

export async function getLoginCredentialsByEmail(
  db: DbExecutor,
  email: string,
): Promise<LoginCredentials | undefined> {
  const row = await selectActivePasswordHashSql(db, { email });
  return row ? { userId: row.id, nickname: row.nickname, passwordHash: row.password_hash } : undefined;
}

export async function getActivePasswordHash(
  db: DbExecutor,
  userId: number,
): Promise<string | undefined> {
  const row = await selectActivePasswordHashSql(db, { userId });
  return row?.password_hash;
}
