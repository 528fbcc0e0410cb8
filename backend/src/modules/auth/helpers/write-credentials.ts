/**
 * backend/src/modules/auth/helpers/write-credentials.ts
 *
 * WHY:
 * - Login, rotation and password change all hand freshly issued credentials to the client
 *   the same way: secret parts in HttpOnly cookies, a new anti-forgery token next to them,
 *   and a small JSON body.
 *
 * RULES:
 * - The refresh secret never appears in a response body.
 * - Max-Age comes from the configured TTLs, not from clock arithmetic.
 */

import type { FastifyReply } from 'fastify';

import { clearCookie, setCookie, type CookieOptions } from '../../../shared/http/cookies';
import { clearCsrfToken, issueCsrfToken } from '../../../shared/http/integrity-guard';
import {
  clearSessionCookie,
  setSessionCookie,
} from '../../../shared/session/set-session-cookie';
import type { IssuedCredentials } from '../credentials/credential.types';
import { ACCESS_TOKEN_TYPE, REFRESH_COOKIE_NAME, REFRESH_COOKIE_PATH } from '../auth.constants';

export type CredentialCookieSettings = Readonly<{
  secure: boolean;
  refreshTtlSeconds: number;
  sessionTtlSeconds: number;
}>;

export type CredentialResponseBody =
  | {
      credentialKind: 'access_token';
      tokenType: typeof ACCESS_TOKEN_TYPE;
      accessToken: string;
      expiresAt: Date;
      refreshExpiresAt: Date;
    }
  | { credentialKind: 'session'; expiresAt: Date };

function refreshCookieOptions(secure: boolean, maxAgeSeconds?: number): CookieOptions {
  return { path: REFRESH_COOKIE_PATH, httpOnly: true, sameSite: 'Lax', secure, maxAgeSeconds };
}

export function setRefreshCookie(
  reply: FastifyReply,
  refreshToken: string,
  settings: CredentialCookieSettings,
): void {
  setCookie(
    reply,
    REFRESH_COOKIE_NAME,
    refreshToken,
    refreshCookieOptions(settings.secure, settings.refreshTtlSeconds),
  );
}

export function writeCredentials(
  reply: FastifyReply,
  credentials: IssuedCredentials,
  settings: CredentialCookieSettings,
): CredentialResponseBody {
  issueCsrfToken(reply, settings.secure);

  if (credentials.kind === 'session') {
    setSessionCookie(reply, credentials.sessionId, {
      secure: settings.secure,
      maxAgeSeconds: settings.sessionTtlSeconds,
    });
    return { credentialKind: 'session', expiresAt: credentials.expiresAt };
  }

  setRefreshCookie(reply, credentials.refreshToken, settings);
  return {
    credentialKind: 'access_token',
    tokenType: ACCESS_TOKEN_TYPE,
    accessToken: credentials.accessToken,
    expiresAt: credentials.accessExpiresAt,
    refreshExpiresAt: credentials.refreshExpiresAt,
  };
}

/** A rejected rotation leaves nothing for the client to retry with. */
export function clearRefreshCookie(reply: FastifyReply, secure: boolean): void {
  clearCookie(reply, REFRESH_COOKIE_NAME, refreshCookieOptions(secure));
}

/** Logout / withdrawal: drop every credential cookie regardless of mode. */
export function clearCredentialCookies(reply: FastifyReply, secure: boolean): void {
  clearRefreshCookie(reply, secure);
  clearSessionCookie(reply, secure);
  clearCsrfToken(reply, secure);
}
