/**
 * backend/src/shared/http/client-address.ts
 *
 * WHY:
 * - The rate limiter keys on the client's TRUE address. X-Forwarded-For is client-supplied
 *   and trivially forged, so it is only believed when the direct peer (the TCP socket) is a
 *   configured trusted reverse proxy.
 *
 * HOW IT WORKS:
 * - Peer not trusted            → the peer address.
 * - Peer trusted                → walk X-Forwarded-For right-to-left, skip trusted hops and
 *                                 entries that are not IP addresses, return the first other.
 * - Every hop trusted / header missing → the peer address.
 */

import { isIP } from 'node:net';

export const UNKNOWN_CLIENT_ADDRESS = 'unknown';

/** Trims and unwraps IPv4-mapped IPv6 ("::ffff:203.0.113.7" → "203.0.113.7"). */
export function normalizeAddress(raw: string): string {
  const trimmed = raw.trim();
  const mapped = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i.exec(trimmed);
  return mapped?.[1] ?? trimmed;
}

export function buildTrustedProxySet(addresses: readonly string[]): ReadonlySet<string> {
  return new Set(addresses.map(normalizeAddress).filter((a) => a.length > 0));
}

export function resolveClientAddress(input: {
  socketAddress: string | undefined;
  forwardedFor: string | string[] | undefined;
  trustedProxies: ReadonlySet<string>;
}): string {
  const peer = input.socketAddress ? normalizeAddress(input.socketAddress) : '';
  if (!peer) return UNKNOWN_CLIENT_ADDRESS;
  if (!input.trustedProxies.has(peer)) return peer;

  const header = Array.isArray(input.forwardedFor)
    ? input.forwardedFor.join(',')
    : (input.forwardedFor ?? '');

  const hops = header
    .split(',')
    .map(normalizeAddress)
    .filter((hop) => isIP(hop) !== 0);

  for (let i = hops.length - 1; i >= 0; i -= 1) {
    const hop = hops[i];
    if (hop !== undefined && !input.trustedProxies.has(hop)) return hop;
  }

  return peer;
}
