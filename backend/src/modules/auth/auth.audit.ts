/**
 * src/modules/auth/auth.audit.ts
 *
 * WHY:
 * - Typed audit helpers for the Auth module.
 * - Keeps audit metadata consistent per domain action.
 *
 * RULES:
 * - Each function maps one domain action to one audit write.
 * - No DB access (delegates to AuditWriter).
 * - Never include passwords, hashes, or tokens in metadata.
 *
 * AUDIT PATTERN:
 * - Success audits are written inside the unit that issues the credentials.
 * - Failed logins are written on the pool executor, outside any unit.
 * - Reuse detection is written inside the unit that revokes everything, so the trail and
 *   the revocation commit together.
 * - Password reset: skipped outcomes go to the pool; `sent` commits with the new hash.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';

export function auditLoginSuccess(
  writer: AuditWriter,
  data: { userId: number; credentialKind: string },
): Promise<void> {
  return writer.append('auth.login.success', {
    userId: data.userId,
    credentialKind: data.credentialKind,
  });
}

export function auditLoginFailed(
  writer: AuditWriter,
  data: { email: string; reason: 'user_not_found' | 'wrong_password' },
): Promise<void> {
  return writer.append('auth.login.failed', {
    email: data.email,
    reason: data.reason,
  });
}

export function auditLogout(
  writer: AuditWriter,
  data: { revokedRefreshToken: boolean; revokedSession: boolean },
): Promise<void> {
  return writer.append('auth.logout', data);
}

export function auditRefreshReuseDetected(
  writer: AuditWriter,
  data: { userId: number; revokedRefreshTokens: number; revokedSessions: number },
): Promise<void> {
  return writer.append('auth.refresh.reuse_detected', data);
}

export type PasswordResetOutcome = 'rate_limited' | 'user_not_found' | 'sent';

export function auditPasswordResetRequested(
  writer: AuditWriter,
  data:
    | { outcome: Exclude<PasswordResetOutcome, 'sent'> }
    | { outcome: 'sent'; revokedRefreshTokens: number; revokedSessions: number },
): Promise<void> {
  return writer.append('auth.password_reset.requested', data);
}
