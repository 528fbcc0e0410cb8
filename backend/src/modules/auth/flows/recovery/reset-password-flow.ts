/**
 * backend/src/modules/auth/flows/recovery/reset-password-flow.ts
 *
 * WHY:
 * - Deep module for "I forgot my password": mail a temporary password to the address.
 * - The answer must not reveal whether the address is registered.
 *
 * RULES:
 * - Always returns void (controller answers 200 regardless).
 * - Exactly one bcrypt hash on every path that reaches the lookup, so known and unknown
 *   addresses cost the same.
 * - The mail is enqueued BEFORE the stored hash changes. If the transport rejects, the old
 *   password still works.
 * - Replacing the hash and revoking every credential of the user is one unit.
 * - The per-address limit is silent (audited, no 429).
 */

import type { DbExecutor } from '../../../../shared/db/db';
import { withReadRetry, type TransactionCoordinator } from '../../../../shared/db/transaction';
import type { Logger } from '../../../../shared/logger/logger';
import type { AuditRepo } from '../../../../shared/audit/audit.repo';
import { AuditWriter } from '../../../../shared/audit/audit.writer';
import type { Queue } from '../../../../shared/messaging/queue';
import type { PasswordVerifier } from '../../../../shared/security/password-verifier';
import type { RateLimiter } from '../../../../shared/security/rate-limit';
import type { TokenHasher } from '../../../../shared/security/token-hasher';
import { generateTemporaryPassword } from '../../../../shared/security/temporary-password';

import { UserRepo, getActiveUserByEmail } from '../../../users';

import { auditPasswordResetRequested } from '../../auth.audit';
import type { TokenIssuer } from '../../credentials/token-issuer';
import type { ResetPasswordParams } from '../../auth.types';

export async function resetPasswordFlow(
  deps: {
    db: DbExecutor;
    coordinator: TransactionCoordinator;
    passwordVerifier: PasswordVerifier;
    tokenIssuer: TokenIssuer;
    tokenHasher: TokenHasher;
    rateLimiter: RateLimiter;
    queue: Queue;
    auditRepo: AuditRepo;
    logger: Logger;
  },
  params: ResetPasswordParams,
): Promise<void> {
  const email = params.email.toLowerCase();

  const audit = new AuditWriter(deps.auditRepo, {
    requestId: params.requestId,
    ip: params.ip,
    userAgent: params.userAgent,
  });

  // ── 1. Silent per-address limit ──────────────────────────
  if (!deps.rateLimiter.allow(deps.tokenHasher.hash(email), 'recovery_email')) {
    await auditPasswordResetRequested(audit, { outcome: 'rate_limited' });
    deps.logger.warn('auth.password_reset.rate_limited', {
      flow: 'auth.password_reset',
      requestId: params.requestId,
    });
    return;
  }

  // ── 2. Find user; hash either way ────────────────────────
  const user = await withReadRetry(() => getActiveUserByEmail(deps.db, email), {
    label: 'auth.password_reset.lookup',
    logger: deps.logger,
  });

  const temporaryPassword = generateTemporaryPassword();
  const passwordHash = await deps.passwordVerifier.hash(temporaryPassword);

  if (!user) {
    await auditPasswordResetRequested(audit, { outcome: 'user_not_found' });
    deps.logger.info('auth.password_reset.skipped', {
      flow: 'auth.password_reset',
      requestId: params.requestId,
      reason: 'user_not_found',
    });
    return;
  }

  // ── 3. Hand the mail to the transport ────────────────────
  await deps.queue.enqueue({
    type: 'users.temporary-password-email',
    userId: user.id,
    email: user.email,
    nickname: user.nickname,
    temporaryPassword,
  });

  // ── 4. Replace the hash, revoke everything, audit ────────
  await deps.coordinator.runAtomic(
    async (trx) => {
      // A withdrawal that landed after the lookup leaves nothing to reset.
      const updated = await new UserRepo(trx).updatePasswordHash(user.id, passwordHash);
      if (!updated) return;

      const revoked = await deps.tokenIssuer.revokeAll(trx, user.id);

      await auditPasswordResetRequested(
        new AuditWriter(deps.auditRepo.withDb(trx), {
          userId: user.id,
          requestId: params.requestId,
          ip: params.ip,
          userAgent: params.userAgent,
        }),
        {
          outcome: 'sent',
          revokedRefreshTokens: revoked.refreshTokens,
          revokedSessions: revoked.sessions,
        },
      );
    },
    { label: 'auth.password_reset', deadlineAt: params.deadlineAt },
  );

  deps.logger.info('auth.password_reset.sent', {
    flow: 'auth.password_reset',
    requestId: params.requestId,
    userId: user.id,
  });
}
