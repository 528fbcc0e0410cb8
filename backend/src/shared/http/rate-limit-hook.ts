/**
 * backend/src/shared/http/rate-limit-hook.ts
 *
 * WHY:
 * - Applies the RateLimiter to every route the classifier maps to a limiter class.
 * - Keyed by req.requestContext.clientIp (proxy-aware, see client-address.ts).
 *
 * RULES:
 * - Runs after the integrity guard and before identity resolution.
 * - Limited responses carry X-RateLimit-Limit / X-RateLimit-Remaining; rejections are
 *   RateLimitError, which the error handler turns into 429 + Retry-After.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

import { RateLimitError, type RateLimiter } from '../security/rate-limit';
import type { LimiterClass } from '../security/rate-limit.classes';

export type LimiterClassifier = (method: string, routeUrl: string | undefined) => LimiterClass | null;

export function registerRateLimit(
  app: FastifyInstance,
  opts: { limiter: RateLimiter; classify: LimiterClassifier },
) {
  app.addHook('onRequest', (req: FastifyRequest, reply, done) => {
    const limiterClass = opts.classify(req.method, req.routeOptions.url);
    if (!limiterClass) {
      done();
      return;
    }

    try {
      const decision = opts.limiter.hitOrThrow(req.requestContext.clientIp, limiterClass);
      reply.header('x-ratelimit-limit', decision.limit);
      reply.header('x-ratelimit-remaining', decision.remaining);
      done();
    } catch (err) {
      if (err instanceof RateLimitError) {
        done(err);
        return;
      }
      throw err;
    }
  });
}
