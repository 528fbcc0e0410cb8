/**
 * backend/src/modules/accounts/account.routes.ts
 */

import type { FastifyInstance } from 'fastify';
import type { AccountController } from './account.controller';

export function registerAccountRoutes(app: FastifyInstance, controller: AccountController) {
  app.delete('/v1/users/me', controller.withdraw.bind(controller));
}
