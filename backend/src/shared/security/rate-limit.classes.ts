/**
 * src/shared/security/rate-limit.classes.ts
 *
 * Limiter classes group endpoints that share one budget (window + max requests).
 * The table is part of AppConfig; RATE_LIMIT_OVERRIDES replaces individual entries.
 */

export const LIMITER_CLASSES = [
  'login',
  'register',
  'password',
  'withdraw',
  'refresh',
  'post_write',
  'recovery',
  'recovery_email',
  'default',
] as const;

export type LimiterClass = (typeof LIMITER_CLASSES)[number];

export type LimiterClassConfig = Readonly<{
  windowSeconds: number;
  maxRequests: number;
}>;

export type LimiterClassTable = Readonly<Record<LimiterClass, LimiterClassConfig>>;

export const DEFAULT_LIMITER_CLASSES: LimiterClassTable = {
  login: { windowSeconds: 60, maxRequests: 5 },
  register: { windowSeconds: 60, maxRequests: 3 },
  password: { windowSeconds: 60, maxRequests: 3 },
  withdraw: { windowSeconds: 60, maxRequests: 2 },
  refresh: { windowSeconds: 60, maxRequests: 20 },
  post_write: { windowSeconds: 60, maxRequests: 10 },
  recovery: { windowSeconds: 60, maxRequests: 5 },
  // Keyed by a hash of the target address, not the client; hit silently.
  recovery_email: { windowSeconds: 3600, maxRequests: 3 },
  default: { windowSeconds: 60, maxRequests: 100 },
};
