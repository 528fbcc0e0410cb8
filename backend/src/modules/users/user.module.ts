/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { TransactionCoordinator } from '../../shared/db/transaction';
import type { Logger } from '../../shared/logger/logger';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { PasswordVerifier } from '../../shared/security/password-verifier';
import type { PasswordPolicy } from '../../shared/security/password-policy';

import type { CredentialCookieSettings, CredentialIssuer, TokenIssuer } from '../auth';

import { UserService } from './user.service';
import { UserController } from './user.controller';
import { registerUserRoutes } from './user.routes';
import { buildUserSchemas } from './user.schemas';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: {
  db: DbExecutor;
  coordinator: TransactionCoordinator;
  logger: Logger;
  auditRepo: AuditRepo;
  passwordVerifier: PasswordVerifier;
  passwordPolicy: PasswordPolicy;
  credentialIssuer: CredentialIssuer;
  tokenIssuer: TokenIssuer;
  cookies: CredentialCookieSettings;
}) {
  const userService = new UserService({
    db: deps.db,
    coordinator: deps.coordinator,
    passwordVerifier: deps.passwordVerifier,
    credentialIssuer: deps.credentialIssuer,
    tokenIssuer: deps.tokenIssuer,
    auditRepo: deps.auditRepo,
    logger: deps.logger,
  });

  const controller = new UserController(
    userService,
    buildUserSchemas(deps.passwordPolicy),
    deps.cookies,
  );

  return {
    userService,
    registerRoutes(app: FastifyInstance) {
      registerUserRoutes(app, controller);
    },
  };
}
