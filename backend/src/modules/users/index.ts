/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /queries or /dal.
 *
 * RULES:
 * - Only export stable contracts needed by other modules (auth, accounts, posts).
 */

export {
  getActiveUserByEmail,
  getActiveUserById,
  getActiveUserByNickname,
  getActivePasswordHash,
  getLoginCredentialsByEmail,
  getUserById,
} from './queries/user.queries';
export { UserRepo } from './dal/user.repo';
export { UserErrors } from './user.errors';
export { toOwnProfileResponse } from './user.presenter';
export type { User, PublicProfile } from './user.types';
