/**
 * src/modules/auth/auth.routes.ts
 *
 * WHY:
 * - Declares Auth module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 * - Paths here must match app/route-policies.ts (limiter classes, CSRF exemptions).
 */

import type { FastifyInstance } from 'fastify';
import type { AuthController } from './auth.controller';

export function registerAuthRoutes(app: FastifyInstance, controller: AuthController) {
  app.post('/v1/auth/session', controller.login.bind(controller));
  app.delete('/v1/auth/session', controller.logout.bind(controller));
  app.post('/v1/auth/token/refresh', controller.refresh.bind(controller));
  app.get('/v1/auth/me', controller.me.bind(controller));

  // Account recovery sits under /v1/users for clients, but replaces credentials.
  app.post('/v1/users/reset-password', controller.resetPassword.bind(controller));
  app.post('/v1/users/find-email', controller.findEmail.bind(controller));
}
