/**
 * backend/src/shared/security/token-hasher.ts
 *
 * WHY:
 * - Renewal secrets and session ids are never stored raw. A DB leak must not hand out
 *   usable credentials.
 *
 * HOW TO USE:
 * - Issue: generate raw secret -> hash -> store hash, return raw to the client.
 * - Present: hash the presented value -> look up by hash (unique index).
 *
 * NOTE:
 * - Interface on purpose: callers depend on the abstraction, not on SHA-256.
 */

export interface TokenHasher {
  hash(rawToken: string): string;
}
