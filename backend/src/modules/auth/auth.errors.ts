/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Security-safe: messages never reveal whether an email exists, or why a refresh secret
 *   was refused (unknown, expired and replayed all read the same).
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, tokens, or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AuthErrors = {
  /** Login: wrong email or password. Intentionally vague. */
  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.unauthenticated('Invalid email or password.', meta);
  },

  /** Refresh: INVALID, EXPIRED and REUSED collapse into this one response. */
  refreshRejected(meta?: AppErrorMeta) {
    return AppError.unauthenticated('Invalid or expired credentials.', meta);
  },
} as const;
