/**
 * src/modules/auth/credentials/credential.types.ts
 *
 * Shapes shared by the two credential modes. `kind` is the discriminant everywhere: the
 * validator that reads a credential and the issuer that mints it agree on it.
 */

export type CredentialKind = 'access_token' | 'session';

export type TokenPair = {
  accessToken: string;
  accessExpiresAt: Date;
  refreshToken: string;
  refreshExpiresAt: Date;
};

export type IssuedCredentials =
  | ({ kind: 'access_token' } & TokenPair)
  | { kind: 'session'; sessionId: string; expiresAt: Date };

export type CredentialValidation =
  | { ok: true; userId: number }
  | { ok: false; reason: 'MISSING' | 'EXPIRED' | 'MALFORMED' | 'NOT_FOUND' };

/** Result of presenting a refresh secret. Everything but ROTATED ends as UNAUTHENTICATED. */
export type RotationResult =
  | { outcome: 'ROTATED'; userId: number; credentials: TokenPair }
  | { outcome: 'INVALID' }
  | { outcome: 'EXPIRED'; userId: number }
  | { outcome: 'REUSED'; userId: number; revokedRefreshTokens: number; revokedSessions: number };
