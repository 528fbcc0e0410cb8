/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db pool, limiter) and shares them safely.
 * - Picks the credential mode: the validator/issuer pair is chosen here and nowhere else.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. disable rate limits) belong HERE, not inside the
 *   classes themselves.
 * - Tests may override the db (in-process Postgres), the password hasher (counting fake) and
 *   the mail queue.
 */

import type { AppConfig } from './config';
import { createDb, type Db } from '../shared/db/db';
import { TransactionCoordinator } from '../shared/db/transaction';
import { RateLimiter } from '../shared/security/rate-limit';
import type { TokenHasher } from '../shared/security/token-hasher';
import { Sha256TokenHasher } from '../shared/security/sha256-token-hasher';
import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';
import { PasswordVerifier } from '../shared/security/password-verifier';
import { logger, type Logger } from '../shared/logger/logger';
import { AuditRepo } from '../shared/audit/audit.repo';
import type { Queue } from '../shared/messaging/queue';
import { InMemQueue } from '../shared/messaging/inmem-queue';
import { SessionStore } from '../shared/session/session.store';

import { AccessTokenSigner } from '../modules/auth/credentials/access-token';
import { TokenIssuer } from '../modules/auth/credentials/token-issuer';
import {
  SessionLookupValidator,
  StatelessAccessValidator,
  type CredentialValidator,
} from '../modules/auth/credentials/credential-validator';
import {
  SessionCredentialIssuer,
  TokenCredentialIssuer,
  type CredentialIssuer,
} from '../modules/auth/credentials/credential-issuer';
import { purgeExpiredCredentials } from '../modules/auth/maintenance/purge-expired-credentials';
import type { CredentialCookieSettings } from '../modules/auth/helpers/write-credentials';

import { createAuthModule, type AuthModule } from '../modules/auth/auth.module';
import { createUserModule, type UserModule } from '../modules/users/user.module';
import { createAccountModule, type AccountModule } from '../modules/accounts/account.module';
import { createPostModule, type PostModule } from '../modules/posts/post.module';

export type AppDeps = {
  db: Db;
  logger: Logger;
  coordinator: TransactionCoordinator;
  rateLimiter: RateLimiter;
  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;
  passwordVerifier: PasswordVerifier;
  auditRepo: AuditRepo;
  queue: Queue;
  sessionStore: SessionStore;
  tokenIssuer: TokenIssuer;
  credentialValidator: CredentialValidator;
  credentialIssuer: CredentialIssuer;

  // modules
  auth: AuthModule;
  users: UserModule;
  accounts: AccountModule;
  posts: PostModule;

  // maintenance
  purgeExpiredCredentials: (now?: Date) => ReturnType<typeof purgeExpiredCredentials>;

  // lifecycle
  close: () => Promise<void>;
};

export type DepsOverrides = {
  db?: Db;
  passwordHasher?: PasswordHasher;
  queue?: Queue;
};

export async function buildDeps(
  config: AppConfig,
  overrides: DepsOverrides = {},
): Promise<AppDeps> {
  const db =
    overrides.db ?? createDb({ databaseUrl: config.databaseUrl, poolMax: config.dbPoolMax });

  const coordinator = new TransactionCoordinator(db, {
    defaultTimeoutMs: config.requestTimeoutMs,
    logger,
  });

  const tokenHasher: TokenHasher = new Sha256TokenHasher();
  const passwordHasher: PasswordHasher =
    overrides.passwordHasher ?? new BcryptPasswordHasher({ cost: config.bcryptCost });
  // Precomputes the dummy hash with the real cost factor (timing parity for unknown users).
  const passwordVerifier = await PasswordVerifier.create(passwordHasher);

  // Composition root decides when rate limiting is disabled.
  // The RateLimiter class itself has no knowledge of environments.
  const rateLimiter = new RateLimiter({
    capacity: config.rateLimit.capacity,
    classes: config.rateLimit.classes,
    disabled: !config.rateLimit.enabled,
  });

  // In-memory until a mail transport adapter exists; flows only see the Queue interface.
  const queue: Queue = overrides.queue ?? new InMemQueue();

  // shared repos / stores
  const auditRepo = new AuditRepo(db);
  const sessionStore = new SessionStore({
    db,
    tokenHasher,
    ttlSeconds: config.credentials.sessionTtlSeconds,
  });

  const tokenIssuer = new TokenIssuer({
    signer: new AccessTokenSigner({
      secret: config.credentials.accessTokenSecret,
      issuer: config.credentials.accessTokenIssuer,
      ttlSeconds: config.credentials.accessTokenTtlSeconds,
    }),
    tokenHasher,
    sessionStore,
    refreshTtlSeconds: config.credentials.refreshTokenTtlSeconds,
  });

  const { credentialValidator, credentialIssuer } =
    config.credentials.mode === 'session'
      ? {
          credentialValidator: new SessionLookupValidator({ sessionStore, coordinator, logger }),
          credentialIssuer: new SessionCredentialIssuer(sessionStore),
        }
      : {
          credentialValidator: new StatelessAccessValidator(tokenIssuer),
          credentialIssuer: new TokenCredentialIssuer(tokenIssuer),
        };

  const cookies: CredentialCookieSettings = {
    secure: config.credentials.cookieSecure,
    refreshTtlSeconds: config.credentials.refreshTokenTtlSeconds,
    sessionTtlSeconds: config.credentials.sessionTtlSeconds,
  };

  // modules (no HTTP / no business logic here)
  const auth = createAuthModule({
    db,
    coordinator,
    logger,
    auditRepo,
    passwordVerifier,
    credentialIssuer,
    tokenIssuer,
    sessionStore,
    tokenHasher,
    rateLimiter,
    queue,
    cookies,
  });
  const users = createUserModule({
    db,
    coordinator,
    logger,
    auditRepo,
    passwordVerifier,
    passwordPolicy: config.passwordPolicy,
    credentialIssuer,
    tokenIssuer,
    cookies,
  });
  const accounts = createAccountModule({
    db,
    coordinator,
    logger,
    auditRepo,
    passwordVerifier,
    tokenIssuer,
    cookieSecure: config.credentials.cookieSecure,
  });
  const posts = createPostModule({ db, coordinator, logger });

  const purge = (now?: Date) => purgeExpiredCredentials({ coordinator, sessionStore, logger }, now);

  let purgeTimer: ReturnType<typeof setInterval> | undefined;
  if (config.tokenCleanupIntervalSeconds > 0) {
    purgeTimer = setInterval(() => {
      purge().catch((err: unknown) => {
        logger.error('auth.purge_expired.failed', { flow: 'auth.purge_expired', err });
      });
    }, config.tokenCleanupIntervalSeconds * 1000);
    purgeTimer.unref();
  }

  return {
    db,
    logger,
    coordinator,
    rateLimiter,
    tokenHasher,
    passwordHasher,
    passwordVerifier,
    auditRepo,
    queue,
    sessionStore,
    tokenIssuer,
    credentialValidator,
    credentialIssuer,
    auth,
    users,
    accounts,
    posts,
    purgeExpiredCredentials: purge,
    close: async () => {
      if (purgeTimer) clearInterval(purgeTimer);
      await db.destroy();
    },
  };
}
