/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * RULES:
 * - Hook order is part of the contract:
 *   request context -> integrity guard -> rate limit -> identity.
 *   A forged or throttled request never reaches credential lookup.
 * - Every error leaves through registerErrorHandler (uniform body + requestId).
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { classifyRoute, INTEGRITY_EXEMPT_ROUTES } from './route-policies';
import { logger } from '../shared/logger/logger';
import { buildTrustedProxySet } from '../shared/http/client-address';
import { registerRequestContext } from '../shared/http/request-context';
import { registerIntegrityGuard } from '../shared/http/integrity-guard';
import { registerRateLimit } from '../shared/http/rate-limit-hook';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';

export async function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const { config, deps } = opts;

  const app = Fastify({
    logger: false, // we use our own Winston logger
    bodyLimit: 64 * 1024,
  });

  registerRequestContext(app, {
    trustedProxies: buildTrustedProxySet(config.rateLimit.trustedProxies),
    requestTimeoutMs: config.requestTimeoutMs,
  });
  registerIntegrityGuard(app, {
    exemptRoutes: INTEGRITY_EXEMPT_ROUTES,
    cookieSecure: config.credentials.cookieSecure,
  });
  registerRateLimit(app, { limiter: deps.rateLimiter, classify: classifyRoute });
  registerAuthContext(app, deps.credentialValidator);

  registerErrorHandler(app, { exposeDetail: config.nodeEnv !== 'production' });

  app.addHook('onRequest', (req, _reply, done) => {
    logger.info('http.request', {
      method: req.method,
      url: req.url,
      requestId: req.requestContext.requestId,
      ip: req.requestContext.clientIp,
    });
    done();
  });

  app.addHook('onResponse', (req, reply, done) => {
    logger.info('http.response', {
      method: req.method,
      url: req.url,
      statusCode: reply.statusCode,
      durationMs: Math.round(reply.elapsedTime),
      requestId: req.requestContext.requestId,
    });
    done();
  });

  return app;
}
