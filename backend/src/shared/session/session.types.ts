/**
 * src/shared/session/session.types.ts
 *
 * Server-side session model (stateful credential mode). The raw session id lives only in
 * the client's cookie; the DB keeps its SHA-256 hash.
 */

export type SessionRecord = {
  userId: number;
  expiresAt: Date;
};

export type IssuedSession = {
  sessionId: string;
  expiresAt: Date;
};

export const SESSION_COOKIE_NAME = 'sid';
