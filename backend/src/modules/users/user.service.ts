/**
 * backend/src/modules/users/user.service.ts
 *
 * WHY:
 * - Registration, profile reads, partial profile updates and password change.
 *
 * RULES:
 * - Every write goes through TransactionCoordinator.runAtomic; repos are built from the
 *   unit's TxExecutor.
 * - bcrypt work happens before a unit opens.
 * - Email / nickname uniqueness is left to the partial unique indexes; a violation comes
 *   back as CONFLICT via UserErrors.fromUniqueViolation.
 *
 * PASSWORD CHANGE:
 * - Updating the hash, revoking every existing credential and issuing the replacement
 *   commit as one unit. The caller ends up with the only valid credential.
 */

import type { DbExecutor } from '../../shared/db/db';
import { withReadRetry, type TransactionCoordinator } from '../../shared/db/transaction';
import { AppError } from '../../shared/http/errors';
import type { RequestMeta } from '../../shared/http/request-meta';
import type { Logger } from '../../shared/logger/logger';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import { AuditWriter } from '../../shared/audit/audit.writer';
import type { PasswordVerifier } from '../../shared/security/password-verifier';

import type { CredentialIssuer, IssuedCredentials, TokenIssuer } from '../auth';

import { UserRepo } from './dal/user.repo';
import { UserErrors } from './user.errors';
import { auditPasswordChanged, auditProfileUpdated, auditUserRegistered } from './user.audit';
import { buildUserColumnPatch, isEmptyPatch } from './policies/user-patch.policy';
import {
  getActivePasswordHash,
  getActiveUserById,
  toPublicProfile,
  toUser,
} from './queries/user.queries';
import type { PublicProfile, User, UserProfilePatch } from './user.types';

export type RegisterParams = RequestMeta & {
  email: string;
  password: string;
  nickname: string;
};

export type ChangePasswordParams = RequestMeta & {
  userId: number;
  currentPassword: string;
  newPassword: string;
};

export class UserService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      coordinator: TransactionCoordinator;
      passwordVerifier: PasswordVerifier;
      credentialIssuer: CredentialIssuer;
      tokenIssuer: TokenIssuer;
      auditRepo: AuditRepo;
      logger: Logger;
    },
  ) {}

  private audit(trx: DbExecutor, meta: RequestMeta, userId: number): AuditWriter {
    return new AuditWriter(this.deps.auditRepo.withDb(trx), {
      userId,
      requestId: meta.requestId,
      ip: meta.ip,
      userAgent: meta.userAgent,
    });
  }

  async register(params: RegisterParams): Promise<User> {
    const passwordHash = await this.deps.passwordVerifier.hash(params.password);

    const user = await this.deps.coordinator.runAtomic(
      async (trx) => {
        const row = await new UserRepo(trx).insertUser({
          email: params.email,
          nickname: params.nickname,
          passwordHash,
        });
        await auditUserRegistered(this.audit(trx, params, row.id), {
          userId: row.id,
          email: row.email,
        });
        return toUser(row);
      },
      {
        label: 'users.register',
        deadlineAt: params.deadlineAt,
        onUniqueViolation: UserErrors.fromUniqueViolation,
      },
    );

    this.deps.logger.info('users.register.success', {
      flow: 'users.register',
      requestId: params.requestId,
      userId: user.id,
    });
    return user;
  }

  async getMe(userId: number): Promise<User> {
    const user = await this.readActive(userId, 'users.get_me');
    if (!user) throw AppError.unauthenticated();
    return user;
  }

  async getPublicProfile(userId: number): Promise<PublicProfile> {
    const user = await this.readActive(userId, 'users.get_profile');
    if (!user) throw UserErrors.notFound();
    return toPublicProfile(user);
  }

  async updateProfile(userId: number, input: UserProfilePatch, meta: RequestMeta): Promise<User> {
    const patch = buildUserColumnPatch(input);
    if (isEmptyPatch(patch)) throw UserErrors.nothingToUpdate();

    return this.deps.coordinator.runAtomic(
      async (trx) => {
        const row = await new UserRepo(trx).updateFields(userId, patch);
        if (!row) throw UserErrors.notFound();

        await auditProfileUpdated(this.audit(trx, meta, userId), {
          userId,
          fields: Object.keys(patch),
        });
        return toUser(row);
      },
      {
        label: 'users.update_profile',
        deadlineAt: meta.deadlineAt,
        onUniqueViolation: UserErrors.fromUniqueViolation,
      },
    );
  }

  async changePassword(params: ChangePasswordParams): Promise<IssuedCredentials> {
    const { userId } = params;

    const storedHash = await withReadRetry(() => getActivePasswordHash(this.deps.db, userId), {
      label: 'users.change_password.lookup',
      logger: this.deps.logger,
    });

    const currentValid = await this.deps.passwordVerifier.verify(
      params.currentPassword,
      storedHash ?? null,
    );
    if (!currentValid) throw UserErrors.passwordIncorrect();

    const newHash = await this.deps.passwordVerifier.hash(params.newPassword);

    const credentials = await this.deps.coordinator.runAtomic(
      async (trx) => {
        const updated = await new UserRepo(trx).updatePasswordHash(userId, newHash);
        if (!updated) throw UserErrors.notFound();

        const revoked = await this.deps.tokenIssuer.revokeAll(trx, userId);
        const issued = await this.deps.credentialIssuer.issue(trx, userId);

        await auditPasswordChanged(this.audit(trx, params, userId), {
          userId,
          revokedRefreshTokens: revoked.refreshTokens,
          revokedSessions: revoked.sessions,
        });
        return issued;
      },
      { label: 'users.change_password', deadlineAt: params.deadlineAt },
    );

    this.deps.logger.info('users.change_password.success', {
      flow: 'users.change_password',
      requestId: params.requestId,
      userId,
    });
    return credentials;
  }

  private readActive(userId: number, label: string): Promise<User | undefined> {
    return withReadRetry(() => getActiveUserById(this.deps.db, userId), {
      label,
      logger: this.deps.logger,
    });
  }
}
