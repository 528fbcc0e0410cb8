/**
 * backend/src/shared/security/token.ts
 *
 * WHY:
 * - Opaque secrets (renewal secrets, session ids, anti-forgery tokens) come from one
 *   generator so their strength cannot drift between call sites.
 *
 * HOW TO USE:
 * - const secret = generateSecureToken()   // 32 bytes = 256 bits of entropy
 * - Hand the raw value to the client, store only its hash.
 */

import { randomBytes } from 'node:crypto';

export const SECURE_TOKEN_BYTES = 32;

export function generateSecureToken(bytes: number = SECURE_TOKEN_BYTES): string {
  // URL-safe base64 (no + / =)
  return randomBytes(bytes).toString('base64url');
}
