/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Orchestrates login, logout, refresh-secret rotation and "who am I".
 * - Account recovery (temporary password by mail, masked email by nickname) lives here too:
 *   it replaces credentials, so it follows the same revocation rules.
 *
 * RULES:
 * - No raw DB access outside queries/DAL.
 * - Every credential mutation runs through TransactionCoordinator.runAtomic.
 * - Never store/log raw passwords or tokens.
 * - Rotation failures all surface as the same UNAUTHENTICATED; the real outcome is logged
 *   and, for reuse, audited.
 *
 * REUSE:
 * - rotate() returns REUSED from inside the unit, so the revoke-all it performed commits.
 *   Only after COMMIT does the service throw.
 */

import type { DbExecutor } from '../../shared/db/db';
import { withReadRetry, type TransactionCoordinator } from '../../shared/db/transaction';
import type { Logger } from '../../shared/logger/logger';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import { AuditWriter } from '../../shared/audit/audit.writer';
import type { Queue } from '../../shared/messaging/queue';
import type { PasswordVerifier } from '../../shared/security/password-verifier';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { SessionStore } from '../../shared/session/session.store';

import { AppError } from '../../shared/http/errors';

import { getActiveUserById, type User } from '../users';

import { AuthErrors } from './auth.errors';
import { auditLogout, auditRefreshReuseDetected } from './auth.audit';
import type {
  FindEmailParams,
  LoginParams,
  LoginResult,
  LogoutParams,
  RefreshParams,
  ResetPasswordParams,
} from './auth.types';
import type { CredentialIssuer } from './credentials/credential-issuer';
import type { TokenPair } from './credentials/credential.types';
import type { TokenIssuer } from './credentials/token-issuer';
import { executeLoginFlow } from './flows/login/execute-login-flow';
import { findEmailFlow } from './flows/recovery/find-email-flow';
import { resetPasswordFlow } from './flows/recovery/reset-password-flow';

export class AuthService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      coordinator: TransactionCoordinator;
      passwordVerifier: PasswordVerifier;
      credentialIssuer: CredentialIssuer;
      tokenIssuer: TokenIssuer;
      sessionStore: SessionStore;
      tokenHasher: TokenHasher;
      rateLimiter: RateLimiter;
      queue: Queue;
      auditRepo: AuditRepo;
      logger: Logger;
    },
  ) {}

  login(params: LoginParams): Promise<LoginResult> {
    return executeLoginFlow(
      {
        db: this.deps.db,
        coordinator: this.deps.coordinator,
        passwordVerifier: this.deps.passwordVerifier,
        credentialIssuer: this.deps.credentialIssuer,
        auditRepo: this.deps.auditRepo,
        logger: this.deps.logger,
      },
      params,
    );
  }

  /** Revokes whatever credential the client presented. Safe to call repeatedly. */
  async logout(params: LogoutParams): Promise<void> {
    const { refreshToken, sessionId } = params;

    await this.deps.coordinator.runAtomic(
      async (trx) => {
        const revokedRefreshToken = refreshToken
          ? await this.deps.tokenIssuer.revoke(trx, refreshToken)
          : false;

        const revokedSession = sessionId
          ? await this.deps.sessionStore.destroy(trx, sessionId)
          : false;

        if (params.userId !== null) {
          await auditLogout(
            new AuditWriter(this.deps.auditRepo.withDb(trx), {
              userId: params.userId,
              requestId: params.requestId,
              ip: params.ip,
              userAgent: params.userAgent,
            }),
            { revokedRefreshToken, revokedSession },
          );
        }
      },
      { label: 'auth.logout', deadlineAt: params.deadlineAt },
    );
  }

  async refresh(params: RefreshParams): Promise<TokenPair> {
    const { refreshToken } = params;
    if (!refreshToken) throw AuthErrors.refreshRejected({ outcome: 'MISSING' });

    const result = await this.deps.coordinator.runAtomic(
      async (trx) => {
        const rotation = await this.deps.tokenIssuer.rotate(trx, refreshToken);

        if (rotation.outcome === 'REUSED') {
          await auditRefreshReuseDetected(
            new AuditWriter(this.deps.auditRepo.withDb(trx), {
              userId: rotation.userId,
              requestId: params.requestId,
              ip: params.ip,
              userAgent: params.userAgent,
            }),
            {
              userId: rotation.userId,
              revokedRefreshTokens: rotation.revokedRefreshTokens,
              revokedSessions: rotation.revokedSessions,
            },
          );
        }

        return rotation;
      },
      { label: 'auth.refresh', deadlineAt: params.deadlineAt },
    );

    if (result.outcome === 'ROTATED') {
      this.deps.logger.info('auth.refresh.rotated', {
        flow: 'auth.refresh',
        requestId: params.requestId,
        userId: result.userId,
      });
      return result.credentials;
    }

    const logMeta = {
      flow: 'auth.refresh',
      requestId: params.requestId,
      outcome: result.outcome,
      userId: result.outcome === 'INVALID' ? null : result.userId,
    };
    if (result.outcome === 'REUSED') this.deps.logger.warn('auth.refresh.reuse_detected', logMeta);
    else this.deps.logger.info('auth.refresh.rejected', logMeta);

    throw AuthErrors.refreshRejected({ outcome: result.outcome });
  }

  async me(userId: number): Promise<User> {
    const user = await withReadRetry(() => getActiveUserById(this.deps.db, userId), {
      label: 'auth.me',
      logger: this.deps.logger,
    });
    // A stateless access token can outlive its account by up to one access TTL.
    if (!user) throw AppError.unauthenticated();
    return user;
  }

  resetPassword(params: ResetPasswordParams): Promise<void> {
    return resetPasswordFlow(
      {
        db: this.deps.db,
        coordinator: this.deps.coordinator,
        passwordVerifier: this.deps.passwordVerifier,
        tokenIssuer: this.deps.tokenIssuer,
        tokenHasher: this.deps.tokenHasher,
        rateLimiter: this.deps.rateLimiter,
        queue: this.deps.queue,
        auditRepo: this.deps.auditRepo,
        logger: this.deps.logger,
      },
      params,
    );
  }

  findEmail(params: FindEmailParams): Promise<{ email: string }> {
    return findEmailFlow({ db: this.deps.db, logger: this.deps.logger }, params);
  }
}
