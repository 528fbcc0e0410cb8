/**
 * backend/src/modules/users/user.audit.ts
 *
 * Typed audit helpers for the Users module. Written inside the unit that made the change.
 * Field names only for profile updates; the values may be personal data.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';

export function auditUserRegistered(
  writer: AuditWriter,
  data: { userId: number; email: string },
): Promise<void> {
  return writer.append('user.registered', { userId: data.userId, email: data.email });
}

export function auditProfileUpdated(
  writer: AuditWriter,
  data: { userId: number; fields: string[] },
): Promise<void> {
  return writer.append('user.profile_updated', { userId: data.userId, fields: data.fields });
}

export function auditPasswordChanged(
  writer: AuditWriter,
  data: { userId: number; revokedRefreshTokens: number; revokedSessions: number },
): Promise<void> {
  return writer.append('user.password_changed', data);
}
