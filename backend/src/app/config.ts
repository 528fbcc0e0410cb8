/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), so comparisons in di.ts
 *   are exhaustive and invalid values ('prod', 'staging') fail at startup.
 * - Boolean flags are parsed from 'true' | 'false' literally. z.coerce.boolean() would
 *   turn the string 'false' into true.
 */

import 'dotenv/config';
import { z } from 'zod';

import {
  DEFAULT_LIMITER_CLASSES,
  LIMITER_CLASSES,
  type LimiterClass,
  type LimiterClassTable,
} from '../shared/security/rate-limit.classes';
import {
  PASSWORD_CHARACTER_CLASSES,
  type PasswordCharacterClass,
  type PasswordPolicy,
} from '../shared/security/password-policy';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const BooleanFlag = z
  .enum(['true', 'false'])
  .transform((v) => v === 'true');

const CommaList = z
  .string()
  .default('')
  .transform((raw) =>
    raw
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0),
  );

const LimiterOverrideSchema = z.record(
  z.enum(LIMITER_CLASSES),
  z.object({
    windowSeconds: z.number().int().min(1).max(86_400),
    maxRequests: z.number().int().min(1).max(100_000),
  }),
);

const RateLimitOverridesSchema = z
  .string()
  .default('')
  .transform((raw, ctx) => {
    if (!raw.trim()) return {};
    try {
      const value: unknown = JSON.parse(raw);
      return value;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'RATE_LIMIT_OVERRIDES must be JSON' });
      return z.NEVER;
    }
  })
  .pipe(LimiterOverrideSchema);

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().default(3000),

  DATABASE_URL: z.string().min(1),
  DB_POOL_MAX: z.coerce.number().int().min(1).max(500).default(10),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('forum-core-backend'),

  BCRYPT_COST: z.coerce.number().int().min(10).max(15).default(12),

  // Credentials
  ACCESS_TOKEN_SECRET: z.string().min(32),
  ACCESS_TOKEN_ISSUER: z.string().default('forum-core'),
  ACCESS_TOKEN_TTL_SECONDS: z.coerce.number().int().min(60).max(86_400).default(1800),
  REFRESH_TOKEN_TTL_SECONDS: z.coerce
    .number()
    .int()
    .min(3600)
    .max(60 * 86_400)
    .default(7 * 86_400),
  SESSION_TTL_SECONDS: z.coerce.number().int().min(300).max(604_800).default(86_400),
  CREDENTIAL_MODE: z.enum(['token', 'session']).default('token'),
  COOKIE_SECURE: BooleanFlag.default('false'),

  // Rate limiting
  TRUSTED_PROXIES: CommaList,
  RATE_LIMIT_ENABLED: BooleanFlag.default('true'),
  RATE_LIMIT_CAPACITY: z.coerce.number().int().min(1).max(1_000_000).default(10_000),
  RATE_LIMIT_OVERRIDES: RateLimitOverridesSchema,

  // Password policy
  PASSWORD_MIN_LENGTH: z.coerce.number().int().min(6).max(128).default(8),
  PASSWORD_MAX_LENGTH: z.coerce.number().int().min(8).max(128).default(20),
  PASSWORD_REQUIRED_CLASSES: z
    .string()
    .default(PASSWORD_CHARACTER_CLASSES.join(','))
    .transform((raw) => raw.split(',').map((s) => s.trim()).filter((s) => s.length > 0))
    .pipe(z.array(z.enum(PASSWORD_CHARACTER_CLASSES))),

  // Deadlines / maintenance
  REQUEST_TIMEOUT_MS: z.coerce.number().int().min(100).max(120_000).default(10_000),
  TOKEN_CLEANUP_INTERVAL_SECONDS: z.coerce.number().int().min(0).max(86_400).default(3600),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type CredentialMode = 'token' | 'session';

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string;
  dbPoolMax: number;

  logLevel: string;
  serviceName: string;

  bcryptCost: number;

  credentials: {
    mode: CredentialMode;
    accessTokenSecret: string;
    accessTokenIssuer: string;
    accessTokenTtlSeconds: number;
    refreshTokenTtlSeconds: number;
    sessionTtlSeconds: number;
    cookieSecure: boolean;
  };

  rateLimit: {
    enabled: boolean;
    capacity: number;
    trustedProxies: string[];
    classes: LimiterClassTable;
  };

  passwordPolicy: PasswordPolicy;

  requestTimeoutMs: number;
  tokenCleanupIntervalSeconds: number;
};

function mergeLimiterClasses(
  overrides: Partial<Record<LimiterClass, LimiterClassTable[LimiterClass]>>,
): LimiterClassTable {
  return { ...DEFAULT_LIMITER_CLASSES, ...overrides };
}

function uniqueClasses(classes: PasswordCharacterClass[]): PasswordCharacterClass[] {
  return [...new Set(classes)];
}

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  if (parsed.PASSWORD_MIN_LENGTH > parsed.PASSWORD_MAX_LENGTH) {
    throw new Error('PASSWORD_MIN_LENGTH must not exceed PASSWORD_MAX_LENGTH');
  }

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    dbPoolMax: parsed.DB_POOL_MAX,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    bcryptCost: parsed.BCRYPT_COST,

    credentials: {
      mode: parsed.CREDENTIAL_MODE,
      accessTokenSecret: parsed.ACCESS_TOKEN_SECRET,
      accessTokenIssuer: parsed.ACCESS_TOKEN_ISSUER,
      accessTokenTtlSeconds: parsed.ACCESS_TOKEN_TTL_SECONDS,
      refreshTokenTtlSeconds: parsed.REFRESH_TOKEN_TTL_SECONDS,
      sessionTtlSeconds: parsed.SESSION_TTL_SECONDS,
      cookieSecure: parsed.COOKIE_SECURE,
    },

    rateLimit: {
      enabled: parsed.RATE_LIMIT_ENABLED,
      capacity: parsed.RATE_LIMIT_CAPACITY,
      trustedProxies: parsed.TRUSTED_PROXIES,
      classes: mergeLimiterClasses(parsed.RATE_LIMIT_OVERRIDES),
    },

    passwordPolicy: {
      minLength: parsed.PASSWORD_MIN_LENGTH,
      maxLength: parsed.PASSWORD_MAX_LENGTH,
      requiredClasses: uniqueClasses(parsed.PASSWORD_REQUIRED_CLASSES),
    },

    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    tokenCleanupIntervalSeconds: parsed.TOKEN_CLEANUP_INTERVAL_SECONDS,
  };
}
