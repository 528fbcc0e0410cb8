/**
 * backend/src/shared/session/set-session-cookie.ts
 *
 * WHY:
 * - Login, password change and logout all set or clear the same cookie; the flags are
 *   defined once here.
 *
 * RULES:
 * - HttpOnly always. SameSite=Lax. Secure when COOKIE_SECURE is on.
 */

import type { FastifyReply } from 'fastify';
import { clearCookie, setCookie, type CookieOptions } from '../http/cookies';
import { SESSION_COOKIE_NAME } from './session.types';

function sessionCookieOptions(secure: boolean, maxAgeSeconds?: number): CookieOptions {
  return { path: '/', httpOnly: true, sameSite: 'Lax', secure, maxAgeSeconds };
}

export function setSessionCookie(
  reply: FastifyReply,
  sessionId: string,
  opts: { secure: boolean; maxAgeSeconds: number },
): void {
  setCookie(reply, SESSION_COOKIE_NAME, sessionId, sessionCookieOptions(opts.secure, opts.maxAgeSeconds));
}

export function clearSessionCookie(reply: FastifyReply, secure: boolean): void {
  clearCookie(reply, SESSION_COOKIE_NAME, sessionCookieOptions(secure));
}
