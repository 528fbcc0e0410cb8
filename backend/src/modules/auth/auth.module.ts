/**
 * src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring.
 * - DI creates infra and picks the credential mode; the module composes domain units.
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
import type { Queue } from '../../shared/messaging/queue';
import type { PasswordVerifier } from '../../shared/security/password-verifier';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { SessionStore } from '../../shared/session/session.store';

import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';
import type { CredentialIssuer } from './credentials/credential-issuer';
import type { TokenIssuer } from './credentials/token-issuer';
import type { CredentialCookieSettings } from './helpers/write-credentials';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: {
  db: DbExecutor;
  coordinator: TransactionCoordinator;
  logger: Logger;
  auditRepo: AuditRepo;
  passwordVerifier: PasswordVerifier;
  credentialIssuer: CredentialIssuer;
  tokenIssuer: TokenIssuer;
  sessionStore: SessionStore;
  tokenHasher: TokenHasher;
  rateLimiter: RateLimiter;
  queue: Queue;
  cookies: CredentialCookieSettings;
}) {
  const authService = new AuthService({
    db: deps.db,
    coordinator: deps.coordinator,
    passwordVerifier: deps.passwordVerifier,
    credentialIssuer: deps.credentialIssuer,
    tokenIssuer: deps.tokenIssuer,
    sessionStore: deps.sessionStore,
    tokenHasher: deps.tokenHasher,
    rateLimiter: deps.rateLimiter,
    queue: deps.queue,
    auditRepo: deps.auditRepo,
    logger: deps.logger,
  });

  const controller = new AuthController(authService, deps.cookies);

  return {
    authService,
    registerRoutes(app: FastifyInstance) {
      registerAuthRoutes(app, controller);
    },
  };
}
