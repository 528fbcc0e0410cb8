/**
 * backend/src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its domain-specific error semantics.
 * - Maps the partial unique indexes back to a message the client can act on.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Constraint names must match migrations/0001_users.ts.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const USERS_EMAIL_ACTIVE_UNIQUE = 'users_email_active_unique';
export const USERS_NICKNAME_ACTIVE_UNIQUE = 'users_nickname_active_unique';

export const UserErrors = {
  notFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found.', meta);
  },

  emailTaken(meta?: AppErrorMeta) {
    return AppError.conflict('Email is already in use.', meta);
  },

  nicknameTaken(meta?: AppErrorMeta) {
    return AppError.conflict('Nickname is already in use.', meta);
  },

  /** Re-authentication for a sensitive action failed. */
  passwordIncorrect(meta?: AppErrorMeta) {
    return AppError.unauthenticated('Password is incorrect.', meta);
  },

  nothingToUpdate(meta?: AppErrorMeta) {
    return AppError.validationError('No fields to update.', meta);
  },

  /** onUniqueViolation hook for units that insert or update users. */
  fromUniqueViolation(constraint: string | null): AppError {
    if (constraint === USERS_EMAIL_ACTIVE_UNIQUE) return UserErrors.emailTaken();
    if (constraint === USERS_NICKNAME_ACTIVE_UNIQUE) return UserErrors.nicknameTaken();
    return AppError.conflict('Resource already exists.', { constraint });
  },
} as const;
