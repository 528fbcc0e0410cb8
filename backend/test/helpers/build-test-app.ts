import { buildApp } from '../../src/app/build-app';
import type { AppConfig } from '../../src/app/config';
import { DEFAULT_LIMITER_CLASSES } from '../../src/shared/security/rate-limit.classes';
import type { PasswordHasher } from '../../src/shared/security/password-hasher';
import { InMemQueue } from '../../src/shared/messaging/inmem-queue';
import { createTestDb } from './test-db';

export const TEST_ACCESS_SECRET = 'test-secret-test-secret-test-secret-0001';

export type TestAppOptions = {
  credentials?: Partial<AppConfig['credentials']>;
  rateLimit?: Partial<AppConfig['rateLimit']>;
  passwordHasher?: PasswordHasher;
  requestTimeoutMs?: number;
};

export function buildTestConfig(opts: TestAppOptions = {}): AppConfig {
  return {
    nodeEnv: 'test',
    port: 0,
    databaseUrl: 'pglite://memory',
    dbPoolMax: 1,

    logLevel: 'error',
    serviceName: 'forum-core-backend-test',

    // Lowest cost bcrypt accepts: keeps the suite fast, hashes stay real.
    bcryptCost: 4,

    credentials: {
      mode: 'token',
      accessTokenSecret: TEST_ACCESS_SECRET,
      accessTokenIssuer: 'forum-core-test',
      accessTokenTtlSeconds: 1800,
      refreshTokenTtlSeconds: 7 * 86_400,
      sessionTtlSeconds: 86_400,
      cookieSecure: false,
      ...opts.credentials,
    },

    rateLimit: {
      enabled: false, // OFF by default; rate-limit specs turn it on
      capacity: 1000,
      trustedProxies: [],
      classes: DEFAULT_LIMITER_CLASSES,
      ...opts.rateLimit,
    },

    passwordPolicy: {
      minLength: 8,
      maxLength: 20,
      requiredClasses: ['lower', 'upper', 'digit', 'special'],
    },

    requestTimeoutMs: opts.requestTimeoutMs ?? 10_000,
    tokenCleanupIntervalSeconds: 0,
  };
}

/**
 * WHY:
 * - Build a Fastify app for E2E-style tests using app.inject().
 * - Keeps tests clean: build once, inject, close.
 *
 * RULES:
 * - Every call gets its own in-process database.
 * - Rate limiting is OFF unless the test enables it.
 * - `queue` is the app's mail queue; drain() it to see what was sent.
 */
export async function buildTestApp(opts: TestAppOptions = {}) {
  const config = buildTestConfig(opts);
  const db = await createTestDb();
  const queue = new InMemQueue();
  const built = await buildApp(config, { db, passwordHasher: opts.passwordHasher, queue });

  return {
    app: built.app,
    deps: built.deps,
    queue,
    config,
    close: built.close,
  };
}

export type TestApp = Awaited<ReturnType<typeof buildTestApp>>;
