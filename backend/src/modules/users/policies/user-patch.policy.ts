/**
 * backend/src/modules/users/policies/user-patch.policy.ts
 *
 * WHY:
 * - Partial updates name their columns from a fixed allow-list. A request key can only
 *   select one of these entries; it never becomes a column identifier itself.
 *
 * RULES:
 * - Pure. No DB, no AppError.
 * - Emails are lower-cased here, the same way registration stores them.
 */

import type { UsersTable } from '../../../shared/db/schema';
import type { UserProfilePatch } from '../user.types';

export const USER_PATCHABLE_COLUMNS = ['email', 'nickname', 'profile_image_url'] as const;

export type UserPatchableColumn = (typeof USER_PATCHABLE_COLUMNS)[number];

export type UserColumnPatch = Partial<Pick<UsersTable, UserPatchableColumn>>;

export function buildUserColumnPatch(input: UserProfilePatch): UserColumnPatch {
  const patch: UserColumnPatch = {};

  if (input.email !== undefined) patch.email = input.email.toLowerCase();
  if (input.nickname !== undefined) patch.nickname = input.nickname;
  if (input.profileImageUrl !== undefined) patch.profile_image_url = input.profileImageUrl;

  return patch;
}

export function isEmptyPatch(patch: UserColumnPatch): boolean {
  return USER_PATCHABLE_COLUMNS.every((column) => patch[column] === undefined);
}
