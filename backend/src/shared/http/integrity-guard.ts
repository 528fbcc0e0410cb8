/**
 * backend/src/shared/http/integrity-guard.ts
 *
 * WHY:
 * - Cross-site request forgery protection for cookie-borne credentials (double submit).
 *
 * HOW IT WORKS:
 * - Safe requests (GET/HEAD/OPTIONS) without a csrf_token cookie receive one.
 * - State-changing requests must echo the cookie value in X-CSRF-Token.
 * - Routes that precede authentication (login, registration) are exempt by allow-list:
 *   no credential exists yet for a token to be bound to.
 * - Credential issuance (login, rotation, password change) mints a fresh token alongside
 *   the new credential via issueCsrfToken().
 *
 * RULES:
 * - Runs after request-context and before the rate limiter.
 * - Failures are 403 INTEGRITY_MISMATCH; the message says missing vs mismatch, never more.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from './errors';
import { readCookie, setCookie, type CookieOptions } from './cookies';
import { checkRequestIntegrity, STATE_CHANGING_METHODS } from '../security/request-integrity';
import { generateSecureToken } from '../security/token';
import { withRequestContext } from '../logger/with-context';

export const CSRF_COOKIE_NAME = 'csrf_token';
export const CSRF_HEADER_NAME = 'x-csrf-token';
export const CSRF_COOKIE_MAX_AGE_SECONDS = 86_400;

function csrfCookieOptions(secure: boolean): CookieOptions {
  // Readable by client script on purpose: the client must copy it into the header.
  return {
    path: '/',
    httpOnly: false,
    sameSite: 'Strict',
    secure,
    maxAgeSeconds: CSRF_COOKIE_MAX_AGE_SECONDS,
  };
}

export function issueCsrfToken(reply: FastifyReply, secure: boolean): string {
  const token = generateSecureToken();
  setCookie(reply, CSRF_COOKIE_NAME, token, csrfCookieOptions(secure));
  return token;
}

export function clearCsrfToken(reply: FastifyReply, secure: boolean): void {
  setCookie(reply, CSRF_COOKIE_NAME, '', { ...csrfCookieOptions(secure), maxAgeSeconds: 0 });
}

export function routeKey(req: FastifyRequest): string {
  return `${req.method} ${req.routeOptions.url ?? req.url}`;
}

export function registerIntegrityGuard(
  app: FastifyInstance,
  opts: { exemptRoutes: ReadonlySet<string>; cookieSecure: boolean },
) {
  app.addHook('onRequest', (req: FastifyRequest, reply, done) => {
    const cookieToken = readCookie(req.headers.cookie, CSRF_COOKIE_NAME);

    if (!STATE_CHANGING_METHODS.has(req.method)) {
      if (!cookieToken) issueCsrfToken(reply, opts.cookieSecure);
      done();
      return;
    }

    if (opts.exemptRoutes.has(routeKey(req))) {
      done();
      return;
    }

    const rawHeader = req.headers[CSRF_HEADER_NAME];
    const headerToken = typeof rawHeader === 'string' ? rawHeader : null;

    const result = checkRequestIntegrity(cookieToken, headerToken, req.method);
    if (result.ok) {
      done();
      return;
    }

    withRequestContext(req).warn('csrf.rejected', {
      flow: 'http.integrity',
      route: routeKey(req),
      reason: result.reason,
    });

    done(
      AppError.integrityMismatch(
        result.reason === 'MISSING' ? 'CSRF token missing' : 'CSRF token mismatch',
        { reason: result.reason },
      ),
    );
  });
}
