/**
 * backend/src/shared/security/request-integrity.ts
 *
 * Double-submit anti-forgery check. The server keeps no state: a request passes when the
 * token in the cookie equals the token the client copied into the header.
 *
 * Both values are reduced to SHA-256 digests before timingSafeEqual, so the comparison has
 * a fixed length and never exits early on the first differing byte.
 */

import { createHash, timingSafeEqual } from 'node:crypto';

export const STATE_CHANGING_METHODS: ReadonlySet<string> = new Set([
  'POST',
  'PUT',
  'PATCH',
  'DELETE',
]);

export type IntegrityCheck = { ok: true } | { ok: false; reason: 'MISSING' | 'MISMATCH' };

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

export function constantTimeEquals(a: string, b: string): boolean {
  return timingSafeEqual(digest(a), digest(b));
}

export function checkRequestIntegrity(
  cookieToken: string | null | undefined,
  headerToken: string | null | undefined,
  method: string,
): IntegrityCheck {
  if (!STATE_CHANGING_METHODS.has(method.toUpperCase())) return { ok: true };

  if (!cookieToken || !headerToken) return { ok: false, reason: 'MISSING' };

  return constantTimeEquals(cookieToken, headerToken)
    ? { ok: true }
    : { ok: false, reason: 'MISMATCH' };
}
