/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - Every failure leaves with the same body shape and the request's correlation id.
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → .status / .code.
 * - RateLimitError → 429 + Retry-After / X-RateLimit-* headers.
 * - Fastify 4xx errors (malformed JSON, unsupported media type, body too large) → VALIDATION.
 * - Unexpected errors → 500 INTERNAL. Outside production the message is added as `detail`.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 * - Log full error details (with REDACTED meta) through withRequestContext(req).
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { AppError } from './errors';
import { RateLimitError } from '../security/rate-limit';
import { withRequestContext } from '../logger/with-context';

type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
    requestId: string | null;
    detail?: string;
  };
};

const SENSITIVE_META_KEYS = new Set([
  'token',
  'accessToken',
  'refreshToken',
  'sessionId',
  'password',
  'currentPassword',
  'newPassword',
  'passwordHash',
  'csrfToken',
  'secret',
]);

function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function clientErrorStatus(err: Error): number | null {
  if (!('statusCode' in err) || typeof err.statusCode !== 'number') return null;
  return err.statusCode >= 400 && err.statusCode < 500 ? err.statusCode : null;
}

export function buildErrorBody(
  req: FastifyRequest,
  code: string,
  message: string,
  detail?: string,
): ErrorResponseBody {
  const body: ErrorResponseBody = {
    error: { code, message, requestId: req.requestContext?.requestId ?? null },
  };
  if (detail !== undefined) body.error.detail = detail;
  return body;
}

export function registerErrorHandler(app: FastifyInstance, opts: { exposeDetail: boolean }): void {
  app.setErrorHandler((err: Error, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      const logMeta = {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      };
      if (err.status >= 500) log.error('app_error', { ...logMeta, cause: err.cause });
      else log.warn('app_error', logMeta);

      return reply.status(err.status).send(buildErrorBody(req, err.code, err.message));
    }

    // 2) Rate limit errors
    if (err instanceof RateLimitError) {
      log.warn('rate_limit', {
        flow: 'http.error',
        key: err.key,
        limit: err.limit,
        windowSeconds: err.windowSeconds,
      });

      return reply
        .status(429)
        .header('retry-after', err.retryAfterSeconds)
        .header('x-ratelimit-limit', err.limit)
        .header('x-ratelimit-remaining', 0)
        .send(buildErrorBody(req, 'RATE_LIMITED', 'Too many requests. Try again later.'));
    }

    // 3) Framework-level client errors (body parsing etc.)
    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== null) {
      log.warn('client_error', { flow: 'http.error', status: clientStatus, message: err.message });
      return reply
        .status(clientStatus)
        .send(buildErrorBody(req, 'VALIDATION', 'Malformed request'));
    }

    // 4) Unexpected errors — never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply
      .status(500)
      .send(
        buildErrorBody(
          req,
          'INTERNAL',
          'Internal server error',
          opts.exposeDetail ? err.message : undefined,
        ),
      );
  });

  app.setNotFoundHandler((req, reply) => {
    return reply.status(404).send(buildErrorBody(req, 'NOT_FOUND', 'Route not found'));
  });
}
