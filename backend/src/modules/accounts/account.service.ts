/**
 * backend/src/modules/accounts/account.service.ts
 *
 * WHY:
 * - Account lifecycle: self-service withdrawal and the administrative cleanup path.
 *
 * RULES:
 * - Both paths run withdrawIdentity() inside one atomic unit.
 * - The self path re-checks the password first (outside the unit, bcrypt is slow).
 * - The admin path has no password and records who asked via `reason`.
 */

import type { DbExecutor } from '../../shared/db/db';
import { withReadRetry, type TransactionCoordinator } from '../../shared/db/transaction';
import type { RequestMeta } from '../../shared/http/request-meta';
import type { Logger } from '../../shared/logger/logger';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import { AuditWriter } from '../../shared/audit/audit.writer';
import type { PasswordVerifier } from '../../shared/security/password-verifier';

import type { TokenIssuer } from '../auth';
import { getActivePasswordHash, UserErrors } from '../users';

import { withdrawIdentity, type WithdrawIdentityResult } from './procedures/withdraw-identity';

export type WithdrawParams = RequestMeta & {
  userId: number;
  password: string;
};

export class AccountService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      coordinator: TransactionCoordinator;
      passwordVerifier: PasswordVerifier;
      tokenIssuer: TokenIssuer;
      auditRepo: AuditRepo;
      logger: Logger;
    },
  ) {}

  async withdraw(params: WithdrawParams): Promise<WithdrawIdentityResult> {
    const storedHash = await withReadRetry(
      () => getActivePasswordHash(this.deps.db, params.userId),
      { label: 'accounts.withdraw.lookup', logger: this.deps.logger },
    );

    const passwordValid = await this.deps.passwordVerifier.verify(
      params.password,
      storedHash ?? null,
    );
    if (!passwordValid) throw UserErrors.passwordIncorrect();

    const result = await this.deps.coordinator.runAtomic(
      (trx) =>
        withdrawIdentity(
          trx,
          params.userId,
          {
            tokenIssuer: this.deps.tokenIssuer,
            audit: new AuditWriter(this.deps.auditRepo.withDb(trx), {
              userId: params.userId,
              requestId: params.requestId,
              ip: params.ip,
              userAgent: params.userAgent,
            }),
          },
          { initiatedBy: 'self', reason: null },
        ),
      { label: 'accounts.withdraw', deadlineAt: params.deadlineAt },
    );

    this.deps.logger.info('accounts.withdraw.success', {
      flow: 'accounts.withdraw',
      requestId: params.requestId,
      userId: params.userId,
    });
    return result;
  }

  async forceWithdraw(userId: number, reason: string): Promise<WithdrawIdentityResult> {
    const result = await this.deps.coordinator.runAtomic(
      (trx) =>
        withdrawIdentity(
          trx,
          userId,
          {
            tokenIssuer: this.deps.tokenIssuer,
            audit: new AuditWriter(this.deps.auditRepo.withDb(trx), { userId }),
          },
          { initiatedBy: 'admin', reason },
        ),
      { label: 'accounts.force_withdraw' },
    );

    this.deps.logger.warn('accounts.force_withdraw.success', {
      flow: 'accounts.force_withdraw',
      userId,
      reason,
    });
    return result;
  }
}
