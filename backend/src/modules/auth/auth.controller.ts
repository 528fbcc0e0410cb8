/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → service call for the auth endpoints.
 * - Moves credentials between cookies and the service; the service never sees a reply.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Cookie flags live in helpers/write-credentials and shared/session (DRY).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import { readCookie } from '../../shared/http/cookies';
import { requestMeta } from '../../shared/http/request-meta';
import { requireIdentity } from '../../shared/http/require-auth-context';
import { SESSION_COOKIE_NAME } from '../../shared/session/session.types';

import { toOwnProfileResponse } from '../users';

import { findEmailSchema, loginSchema, resetPasswordSchema } from './auth.schemas';
import type { AuthService } from './auth.service';
import { REFRESH_COOKIE_NAME } from './auth.constants';
import {
  clearCredentialCookies,
  clearRefreshCookie,
  writeCredentials,
  type CredentialCookieSettings,
} from './helpers/write-credentials';

export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly cookies: CredentialCookieSettings,
  ) {}

  async login(req: FastifyRequest, reply: FastifyReply) {
    const parsed = loginSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const result = await this.authService.login({
      email: parsed.data.email,
      password: parsed.data.password,
      ...requestMeta(req),
    });

    const credentials = writeCredentials(reply, result.credentials, this.cookies);
    return reply.status(200).send({ user: result.user, ...credentials });
  }

  async logout(req: FastifyRequest, reply: FastifyReply) {
    await this.authService.logout({
      userId: req.authContext.userId,
      refreshToken: readCookie(req.headers.cookie, REFRESH_COOKIE_NAME),
      sessionId: readCookie(req.headers.cookie, SESSION_COOKIE_NAME),
      ...requestMeta(req),
    });

    clearCredentialCookies(reply, this.cookies.secure);
    return reply.status(204).send();
  }

  async refresh(req: FastifyRequest, reply: FastifyReply) {
    const pair = await this.authService
      .refresh({
        refreshToken: readCookie(req.headers.cookie, REFRESH_COOKIE_NAME),
        ...requestMeta(req),
      })
      .catch((err: unknown) => {
        // 401 means the cookie is dead; IO errors keep it for a retry.
        if (err instanceof AppError && err.status === 401) {
          clearRefreshCookie(reply, this.cookies.secure);
        }
        throw err;
      });

    const body = writeCredentials(reply, { kind: 'access_token', ...pair }, this.cookies);
    return reply.status(200).send(body);
  }

  async me(req: FastifyRequest, reply: FastifyReply) {
    const identity = requireIdentity(req);
    const user = await this.authService.me(identity.userId);

    return reply.status(200).send({
      user: toOwnProfileResponse(user),
      credentialKind: identity.credentialKind,
    });
  }

  /** 200 whether or not the address is registered. */
  async resetPassword(req: FastifyRequest, reply: FastifyReply) {
    const parsed = resetPasswordSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    await this.authService.resetPassword({ email: parsed.data.email, ...requestMeta(req) });

    return reply.status(200).send({
      message: 'If the address is registered, a temporary password has been sent to it.',
    });
  }

  async findEmail(req: FastifyRequest, reply: FastifyReply) {
    const parsed = findEmailSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const result = await this.authService.findEmail({
      nickname: parsed.data.nickname,
      ...requestMeta(req),
    });
    return reply.status(200).send(result);
  }
}
