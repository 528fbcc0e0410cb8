/**
 * src/shared/audit/audit.types.ts
 *
 * WHY:
 * - Central audit event types (security trail stored in DB).
 * - AuditContext groups the request-level fields that repeat on every event.
 * - AuditAction is a closed union: a typo in an action name is a compile error.
 *
 * RULES:
 * - Metadata is a plain object (repo serializes to JSON for DB).
 * - Never import module types here (shared must stay module-agnostic).
 * - Never put passwords, hashes, raw tokens or session ids in metadata.
 */

export type AuditAction =
  // Auth
  | 'auth.login.success'
  | 'auth.login.failed'
  | 'auth.logout'
  | 'auth.refresh.reuse_detected'
  | 'auth.password_reset.requested'
  // Users / accounts
  | 'user.registered'
  | 'user.profile_updated'
  | 'user.password_changed'
  | 'user.withdrawn';

export type AuditMetadata = Record<string, unknown>;

/**
 * Request-level context shared by every audit event of one request.
 * userId is null until the identity is known (e.g. failed login).
 */
export type AuditContext = {
  userId: number | null;
  requestId: string | null;
  ip: string | null;
  userAgent: string | null;
};

/** Full audit event shape for DB insertion (AuditRepo only). */
export type AuditEventInsert = AuditContext & {
  action: AuditAction;
  metadata?: AuditMetadata;
};
