/**
 * backend/src/modules/accounts/account.controller.ts
 *
 * RULES:
 * - No DB access here.
 * - A successful withdrawal clears every credential cookie; the server-side records are
 *   already gone.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import { requestMeta } from '../../shared/http/request-meta';
import { requireIdentity } from '../../shared/http/require-auth-context';

import { clearCredentialCookies } from '../auth';

import { withdrawSchema } from './account.schemas';
import type { AccountService } from './account.service';

export class AccountController {
  constructor(
    private readonly accountService: AccountService,
    private readonly cookieSecure: boolean,
  ) {}

  async withdraw(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireIdentity(req);

    const parsed = withdrawSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    await this.accountService.withdraw({
      userId,
      password: parsed.data.password,
      ...requestMeta(req),
    });

    clearCredentialCookies(reply, this.cookieSecure);
    return reply.status(204).send();
  }
}
