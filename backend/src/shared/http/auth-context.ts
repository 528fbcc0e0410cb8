/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Identity resolution runs once per request, after the integrity guard and the rate
 *   limiter, through whichever CredentialValidator the composition root picked.
 * - The rest of the app reads req.authContext and never knows which variant is active.
 *
 * HOW IT WORKS:
 * 1. Every request starts unauthenticated (userId null).
 * 2. The validator's credential is read from the request (Bearer header or session cookie).
 * 3. A valid credential fills userId. An invalid one leaves the request unauthenticated;
 *    endpoints that need an identity reject it via requireIdentity().
 *
 * RULES:
 * - Never throws for a bad credential. The reason is logged at debug level only.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

import type {
  CredentialKind,
  CredentialValidator,
} from '../../modules/auth/credentials/credential-validator';
import { withRequestContext } from '../logger/with-context';
import { readCookie } from './cookies';
import { SESSION_COOKIE_NAME } from '../session/session.types';

export type AuthContext = {
  userId: number | null;
  credentialKind: CredentialKind | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

function readBearer(header: string | undefined): string | null {
  if (!header) return null;
  const match = /^Bearer\s+(\S+)$/i.exec(header.trim());
  return match?.[1] ?? null;
}

export function readPresentedCredential(req: FastifyRequest, kind: CredentialKind): string | null {
  return kind === 'access_token'
    ? readBearer(req.headers.authorization)
    : readCookie(req.headers.cookie, SESSION_COOKIE_NAME);
}

export function registerAuthContext(app: FastifyInstance, validator: CredentialValidator) {
  app.decorateRequest('authContext', null);

  app.addHook('onRequest', async (req: FastifyRequest) => {
    req.authContext = { userId: null, credentialKind: null };

    const credential = readPresentedCredential(req, validator.kind);
    if (!credential) return;

    const result = await validator.validate(credential);
    if (!result.ok) {
      withRequestContext(req).debug('auth.credential_rejected', {
        flow: 'auth.context',
        kind: validator.kind,
        reason: result.reason,
      });
      return;
    }

    req.authContext = { userId: result.userId, credentialKind: validator.kind };
  });
}
