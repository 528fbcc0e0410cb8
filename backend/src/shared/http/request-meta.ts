/**
 * backend/src/shared/http/request-meta.ts
 *
 * WHY:
 * - Services need a few request facts (correlation id, client address, user agent,
 *   deadline) for audits and atomic units, but must not depend on Fastify types.
 *
 * HOW TO USE:
 * - Controller: `await service.login({ ...parsed.data, ...requestMeta(req) })`
 */

import type { FastifyRequest } from 'fastify';

export type RequestMeta = {
  requestId: string;
  ip: string;
  userAgent: string | null;
  /** Epoch millis; forwarded to TransactionCoordinator.runAtomic. */
  deadlineAt: number;
};

export function requestMeta(req: FastifyRequest): RequestMeta {
  return {
    requestId: req.requestContext.requestId,
    ip: req.requestContext.clientIp,
    userAgent: req.headers['user-agent'] ?? null,
    deadlineAt: req.requestContext.deadlineAt,
  };
}
