/**
 * backend/src/modules/accounts/account.module.ts
 *
 * WHY:
 * - Encapsulates Accounts module wiring. accountService is also exposed for the admin
 *   script (src/scripts/withdraw-account.ts).
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { TransactionCoordinator } from '../../shared/db/transaction';
import type { Logger } from '../../shared/logger/logger';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { PasswordVerifier } from '../../shared/security/password-verifier';

import type { TokenIssuer } from '../auth';

import { AccountService } from './account.service';
import { AccountController } from './account.controller';
import { registerAccountRoutes } from './account.routes';

export type AccountModule = ReturnType<typeof createAccountModule>;

export function createAccountModule(deps: {
  db: DbExecutor;
  coordinator: TransactionCoordinator;
  logger: Logger;
  auditRepo: AuditRepo;
  passwordVerifier: PasswordVerifier;
  tokenIssuer: TokenIssuer;
  cookieSecure: boolean;
}) {
  const accountService = new AccountService({
    db: deps.db,
    coordinator: deps.coordinator,
    passwordVerifier: deps.passwordVerifier,
    tokenIssuer: deps.tokenIssuer,
    auditRepo: deps.auditRepo,
    logger: deps.logger,
  });

  const controller = new AccountController(accountService, deps.cookieSecure);

  return {
    accountService,
    registerRoutes(app: FastifyInstance) {
      registerAccountRoutes(app, controller);
    },
  };
}
