/**
 * backend/src/app/route-policies.ts
 *
 * WHY:
 * - Which limiter class guards a route, and which routes skip the anti-forgery check, are
 *   app-level policy. Keeping both tables here means a new route is reviewed in one place.
 *
 * RULES:
 * - Keys are `${METHOD} ${route pattern}` exactly as registered in the module routes.
 * - GET/HEAD/OPTIONS are never limited or checked.
 */

import type { LimiterClass } from '../shared/security/rate-limit.classes';
import type { LimiterClassifier } from '../shared/http/rate-limit-hook';

const ROUTE_LIMITER_CLASSES: Readonly<Record<string, LimiterClass>> = {
  'POST /v1/auth/session': 'login',
  'POST /v1/users': 'register',
  'PUT /v1/users/me/password': 'password',
  'DELETE /v1/users/me': 'withdraw',
  'POST /v1/auth/token/refresh': 'refresh',
  'POST /v1/posts': 'post_write',
  'POST /v1/posts/:postId/comments': 'post_write',
  'POST /v1/users/reset-password': 'recovery',
  'POST /v1/users/find-email': 'recovery',
};

const UNLIMITED_METHODS: ReadonlySet<string> = new Set(['GET', 'HEAD', 'OPTIONS']);
const UNLIMITED_ROUTES: ReadonlySet<string> = new Set(['/health']);

/** Login, registration and recovery precede any credential: nothing to bind a token to. */
export const INTEGRITY_EXEMPT_ROUTES: ReadonlySet<string> = new Set([
  'POST /v1/auth/session',
  'POST /v1/users',
  'POST /v1/users/reset-password',
  'POST /v1/users/find-email',
]);

export const classifyRoute: LimiterClassifier = (method, routeUrl) => {
  const verb = method.toUpperCase();
  if (UNLIMITED_METHODS.has(verb)) return null;
  // Unmatched routes (404) are not worth a budget entry.
  if (routeUrl === undefined || UNLIMITED_ROUTES.has(routeUrl)) return null;

  return ROUTE_LIMITER_CLASSES[`${verb} ${routeUrl}`] ?? 'default';
};
