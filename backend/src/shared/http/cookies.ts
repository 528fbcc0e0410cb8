/**
 * backend/src/shared/http/cookies.ts
 *
 * WHY:
 * - Cookie parsing and Set-Cookie construction in one place, so flags (HttpOnly, SameSite,
 *   Secure, Path, Max-Age) cannot drift between controllers and hooks.
 *
 * RULES:
 * - No business logic here.
 * - Fastify appends repeated `set-cookie` headers, so several cookies per reply are fine.
 */

import type { FastifyReply } from 'fastify';

/**
 * Parses a raw Cookie header into key-value pairs.
 * Handles the standard format: "key1=value1; key2=value2"
 */
export function parseCookies(raw: string | undefined): Record<string, string> {
  if (!raw) return {};

  const cookies: Record<string, string> = {};
  for (const pair of raw.split(';')) {
    const eqIdx = pair.indexOf('=');
    if (eqIdx === -1) continue;

    const key = pair.substring(0, eqIdx).trim();
    const value = pair.substring(eqIdx + 1).trim();
    if (key) cookies[key] = value;
  }
  return cookies;
}

export function readCookie(rawHeader: string | undefined, name: string): string | null {
  const value = parseCookies(rawHeader)[name];
  return value ? value : null;
}

export type CookieOptions = Readonly<{
  path: string;
  httpOnly: boolean;
  sameSite: 'Strict' | 'Lax';
  secure: boolean;
  /** Omit for a browser-session cookie; 0 deletes the cookie. */
  maxAgeSeconds?: number;
}>;

export function serializeCookie(name: string, value: string, opts: CookieOptions): string {
  const parts = [`${name}=${value}`, `Path=${opts.path}`];

  if (opts.maxAgeSeconds !== undefined) parts.push(`Max-Age=${opts.maxAgeSeconds}`);
  if (opts.httpOnly) parts.push('HttpOnly');
  parts.push(`SameSite=${opts.sameSite}`);
  if (opts.secure) parts.push('Secure');

  return parts.join('; ');
}

export function setCookie(
  reply: FastifyReply,
  name: string,
  value: string,
  opts: CookieOptions,
): void {
  reply.header('set-cookie', serializeCookie(name, value, opts));
}

export function clearCookie(reply: FastifyReply, name: string, opts: CookieOptions): void {
  reply.header('set-cookie', serializeCookie(name, '', { ...opts, maxAgeSeconds: 0 }));
}
