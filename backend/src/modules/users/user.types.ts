/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - An identity is active while deletedAt is null. Withdrawn rows stay (anonymized) so
 *   posts and comments keep a valid author id.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 * - passwordHash never appears on User; it has its own narrow read.
 */

export type UserId = number;

export type User = {
  id: UserId;
  email: string;
  nickname: string;
  profileImageUrl: string | null;

  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
};

/** What other members may see. No email. */
export type PublicProfile = {
  id: UserId;
  nickname: string;
  profileImageUrl: string | null;
  createdAt: Date;
};

/** The fields PATCH /v1/users/me may change; absent keys are left untouched. */
export type UserProfilePatch = {
  email?: string;
  nickname?: string;
  profileImageUrl?: string | null;
};

export type LoginCredentials = {
  userId: UserId;
  nickname: string;
  passwordHash: string;
};
