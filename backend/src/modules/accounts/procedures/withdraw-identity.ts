/**
 * backend/src/modules/accounts/procedures/withdraw-identity.ts
 *
 * WHY:
 * - The ONE withdrawal procedure. The self-service endpoint and the admin script both call
 *   it, so an account can never be half-withdrawn by one path and fully by the other.
 *
 * STEPS (all in the caller's unit):
 * 1. Anonymize email / nickname, clear the avatar, set deleted_at (active rows only).
 * 2. Revoke every refresh secret and session; drop rotation tombstones.
 * 3. Append the audit event.
 * Posts and comments are not touched.
 *
 * RULES:
 * - Takes a TxExecutor. Never opens a unit itself.
 * - Throws UserErrors.notFound() when the identity is missing or already withdrawn; the
 *   unit rolls back with nothing changed.
 */

import type { TxExecutor } from '../../../shared/db/db';
import type { AuditWriter } from '../../../shared/audit/audit.writer';

import { CredentialRepo, type TokenIssuer } from '../../auth';
import { UserErrors, UserRepo } from '../../users';

import { auditUserWithdrawn, type WithdrawalInitiator } from '../account.audit';
import { buildAnonymizedIdentity } from '../policies/anonymize.policy';

export type WithdrawIdentityResult = {
  userId: number;
  withdrawnAt: Date;
  revokedRefreshTokens: number;
  revokedSessions: number;
};

export async function withdrawIdentity(
  trx: TxExecutor,
  userId: number,
  deps: {
    tokenIssuer: TokenIssuer;
    audit: AuditWriter;
    now?: Date;
    anonymizationSuffix?: string;
  },
  meta: { initiatedBy: WithdrawalInitiator; reason: string | null },
): Promise<WithdrawIdentityResult> {
  const withdrawnAt = deps.now ?? new Date();
  const replacement = buildAnonymizedIdentity(deps.anonymizationSuffix);

  const withdrawn = await new UserRepo(trx).anonymizeAndSoftDelete(userId, {
    ...replacement,
    deletedAt: withdrawnAt,
  });
  if (!withdrawn) throw UserErrors.notFound({ userId });

  const revoked = await deps.tokenIssuer.revokeAll(trx, userId);
  await new CredentialRepo(trx).deleteTombstonesForUser(userId);

  await auditUserWithdrawn(deps.audit, {
    userId,
    initiatedBy: meta.initiatedBy,
    reason: meta.reason,
    revokedRefreshTokens: revoked.refreshTokens,
    revokedSessions: revoked.sessions,
  });

  return {
    userId,
    withdrawnAt,
    revokedRefreshTokens: revoked.refreshTokens,
    revokedSessions: revoked.sessions,
  };
}
