/**
 * backend/src/modules/auth/flows/login/execute-login-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - Login is where enumeration by timing would happen, so the ordering here matters:
 *   the password comparison runs exactly once on every path, against the dummy hash when
 *   the email is unknown.
 *
 * RULES:
 * - No HTTP concerns here (controller handles cookies and the body).
 * - No raw SQL here (use queries/repos).
 * - bcrypt runs BEFORE the unit opens; a slow hash must not hold a pooled connection.
 * - Two-phase audit: success inside the unit, failure on the pool (nothing to roll back).
 */

import type { DbExecutor } from '../../../../shared/db/db';
import { withReadRetry, type TransactionCoordinator } from '../../../../shared/db/transaction';
import type { Logger } from '../../../../shared/logger/logger';
import type { AuditRepo } from '../../../../shared/audit/audit.repo';
import { AuditWriter } from '../../../../shared/audit/audit.writer';
import type { PasswordVerifier } from '../../../../shared/security/password-verifier';

import { getLoginCredentialsByEmail } from '../../../users';

import { AuthErrors } from '../../auth.errors';
import { auditLoginFailed, auditLoginSuccess } from '../../auth.audit';
import type { LoginParams, LoginResult } from '../../auth.types';
import type { CredentialIssuer } from '../../credentials/credential-issuer';

// ── PII-safe helpers ─────────────────────────────────────────
function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1) : '';
}

export async function executeLoginFlow(
  deps: {
    db: DbExecutor;
    coordinator: TransactionCoordinator;
    passwordVerifier: PasswordVerifier;
    credentialIssuer: CredentialIssuer;
    auditRepo: AuditRepo;
    logger: Logger;
  },
  params: LoginParams,
): Promise<LoginResult> {
  const email = params.email.toLowerCase();
  const auditContext = {
    requestId: params.requestId,
    ip: params.ip,
    userAgent: params.userAgent,
  };

  deps.logger.info('auth.login.start', {
    flow: 'auth.login',
    requestId: params.requestId,
    emailDomain: emailDomain(email),
  });

  const account = await withReadRetry(() => getLoginCredentialsByEmail(deps.db, email), {
    label: 'auth.login.lookup',
    logger: deps.logger,
  });

  const passwordValid = await deps.passwordVerifier.verify(
    params.password,
    account?.passwordHash ?? null,
  );

  if (!account || !passwordValid) {
    const reason = account ? 'wrong_password' : 'user_not_found';

    await auditLoginFailed(
      new AuditWriter(deps.auditRepo, { ...auditContext, userId: account?.userId ?? null }),
      { email, reason },
    );
    deps.logger.warn('auth.login.failed', {
      flow: 'auth.login',
      requestId: params.requestId,
      reason,
    });

    throw AuthErrors.invalidCredentials();
  }

  const credentials = await deps.coordinator.runAtomic(
    async (trx) => {
      const issued = await deps.credentialIssuer.issue(trx, account.userId);

      await auditLoginSuccess(
        new AuditWriter(deps.auditRepo.withDb(trx), { ...auditContext, userId: account.userId }),
        { userId: account.userId, credentialKind: issued.kind },
      );

      return issued;
    },
    { label: 'auth.login', deadlineAt: params.deadlineAt },
  );

  deps.logger.info('auth.login.success', {
    flow: 'auth.login',
    requestId: params.requestId,
    userId: account.userId,
    credentialKind: credentials.kind,
  });

  return {
    user: { id: account.userId, nickname: account.nickname },
    credentials,
  };
}
