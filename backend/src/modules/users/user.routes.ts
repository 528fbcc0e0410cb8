/**
 * backend/src/modules/users/user.routes.ts
 *
 * RULES:
 * - No business logic here.
 * - DELETE /v1/users/me (withdrawal) belongs to the accounts module.
 */

import type { FastifyInstance } from 'fastify';
import type { UserController } from './user.controller';

export function registerUserRoutes(app: FastifyInstance, controller: UserController) {
  app.post('/v1/users', controller.register.bind(controller));
  app.get('/v1/users/me', controller.getMe.bind(controller));
  app.patch('/v1/users/me', controller.updateMe.bind(controller));
  app.put('/v1/users/me/password', controller.changePassword.bind(controller));
  app.get('/v1/users/:userId', controller.getProfile.bind(controller));
}
