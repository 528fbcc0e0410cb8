/**
 * backend/src/modules/users/user.controller.ts
 *
 * WHY:
 * - Maps HTTP → UserService for registration and the /v1/users/me family.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - A password change re-issues credentials; they are written the same way login writes them.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import { requestMeta } from '../../shared/http/request-meta';
import { requireIdentity } from '../../shared/http/require-auth-context';

import { writeCredentials, type CredentialCookieSettings } from '../auth';

import { userIdParamsSchema, type UserSchemas } from './user.schemas';
import type { UserService } from './user.service';
import { toOwnProfileResponse } from './user.presenter';

export class UserController {
  constructor(
    private readonly userService: UserService,
    private readonly schemas: UserSchemas,
    private readonly cookies: CredentialCookieSettings,
  ) {}

  async register(req: FastifyRequest, reply: FastifyReply) {
    const parsed = this.schemas.registerSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const user = await this.userService.register({ ...parsed.data, ...requestMeta(req) });
    return reply.status(201).send({ user: toOwnProfileResponse(user) });
  }

  async getMe(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireIdentity(req);
    const user = await this.userService.getMe(userId);
    return reply.status(200).send({ user: toOwnProfileResponse(user) });
  }

  async getProfile(req: FastifyRequest, reply: FastifyReply) {
    const parsed = userIdParamsSchema.safeParse(req.params);
    if (!parsed.success) throw AppError.notFound('User not found.');

    const profile = await this.userService.getPublicProfile(parsed.data.userId);
    return reply.status(200).send({ user: profile });
  }

  async updateMe(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireIdentity(req);

    const parsed = this.schemas.patchProfileSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const user = await this.userService.updateProfile(userId, parsed.data, requestMeta(req));
    return reply.status(200).send({ user: toOwnProfileResponse(user) });
  }

  async changePassword(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireIdentity(req);

    const parsed = this.schemas.changePasswordSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const credentials = await this.userService.changePassword({
      userId,
      currentPassword: parsed.data.currentPassword,
      newPassword: parsed.data.newPassword,
      ...requestMeta(req),
    });

    return reply.status(200).send(writeCredentials(reply, credentials, this.cookies));
  }
}
