/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - Every request gets a correlation id (requestId). It is returned on every error body
 *   and as X-Request-Id, and it is on every log line, so an operator can trace a
 *   generic client-visible failure server-side.
 * - The resolved client address and the request deadline are computed once here.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts, BEFORE the integrity guard and the rate limiter.
 * - After registration, every request has `req.requestContext`.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

import { resolveClientAddress } from './client-address';

export type RequestContext = {
  requestId: string;
  clientIp: string;
  requestedAt: Date;
  /** Epoch millis; passed to runAtomic so a slow unit rolls back instead of committing late. */
  deadlineAt: number;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

export function registerRequestContext(
  app: FastifyInstance,
  opts: { trustedProxies: ReadonlySet<string>; requestTimeoutMs: number },
) {
  // Decorate so Fastify knows the property; the real value is assigned per request.
  app.decorateRequest('requestContext', null);

  // IMPORTANT: Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, reply, done) => {
    const requestedAt = new Date();

    req.requestContext = {
      requestId: randomUUID(),
      clientIp: resolveClientAddress({
        socketAddress: req.socket.remoteAddress,
        forwardedFor: req.headers['x-forwarded-for'],
        trustedProxies: opts.trustedProxies,
      }),
      requestedAt,
      deadlineAt: requestedAt.getTime() + opts.requestTimeoutMs,
    };

    reply.header('x-request-id', req.requestContext.requestId);
    done();
  });
}
