/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require an identity" logic.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB, services, or transactions.
 * - Throws AppError so error-handler maps it consistently.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';
import type { CredentialKind } from '../../modules/auth/credentials/credential-validator';

export type RequiredIdentity = Readonly<{
  userId: number;
  credentialKind: CredentialKind;
}>;

/**
 * Controller guard: no identity → 401 UNAUTHENTICATED "Authentication required".
 * Ownership checks (403) need the resource, so they live in services.
 */
export function requireIdentity(req: FastifyRequest): RequiredIdentity {
  const ctx = req.authContext;
  if (!ctx || ctx.userId === null || ctx.credentialKind === null) {
    throw AppError.unauthenticated('Authentication required');
  }

  return { userId: ctx.userId, credentialKind: ctx.credentialKind };
}
