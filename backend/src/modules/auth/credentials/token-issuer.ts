/**
 * src/modules/auth/credentials/token-issuer.ts
 *
 * WHY:
 * - Owns the lifecycle of the stateless credential pair: a 30-minute access JWT plus a
 *   7-day refresh secret stored as a SHA-256 hash.
 * - Rotation doubles as theft detection. A rotated secret leaves a tombstone; presenting it
 *   again means someone else holds a copy, so every credential of the identity is revoked.
 *
 * HOW TO USE:
 *   await coordinator.runAtomic((trx) => tokenIssuer.rotate(trx, rawRefresh), { label, deadlineAt })
 *
 * RULES:
 * - Mutating methods take the caller's TxExecutor. They never open their own unit, so a
 *   rotation (delete + tombstone + insert) and its audit commit or roll back together.
 * - REUSED is a result, not an exception: the revocation must commit before the caller
 *   reports UNAUTHENTICATED.
 * - validateAccess() never touches the DB.
 */

import type { TxExecutor } from '../../../shared/db/db';
import type { TokenHasher } from '../../../shared/security/token-hasher';
import { generateSecureToken } from '../../../shared/security/token';
import type { SessionStore } from '../../../shared/session/session.store';

import { CredentialRepo } from '../dal/credential.repo';
import { selectRotationTombstoneSql } from '../dal/credential.query-sql';
import { decideRotationOutcome } from '../policies/rotation-outcome.policy';
import type { AccessTokenCheck, AccessTokenSigner } from './access-token';
import type { RotationResult, TokenPair } from './credential.types';

export type RevokeAllResult = {
  refreshTokens: number;
  sessions: number;
};

export class TokenIssuer {
  private readonly now: () => Date;

  constructor(
    private readonly deps: {
      signer: AccessTokenSigner;
      tokenHasher: TokenHasher;
      sessionStore: SessionStore;
      refreshTtlSeconds: number;
      now?: () => Date;
    },
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  get refreshTtlSeconds(): number {
    return this.deps.refreshTtlSeconds;
  }

  async issue(trx: TxExecutor, userId: number): Promise<TokenPair> {
    const now = this.now();
    const access = this.deps.signer.sign(userId, now);

    const refreshToken = generateSecureToken();
    const refreshExpiresAt = new Date(now.getTime() + this.deps.refreshTtlSeconds * 1000);

    await new CredentialRepo(trx).insertRefreshToken({
      userId,
      tokenHash: this.deps.tokenHasher.hash(refreshToken),
      expiresAt: refreshExpiresAt,
    });

    return {
      accessToken: access.token,
      accessExpiresAt: access.expiresAt,
      refreshToken,
      refreshExpiresAt,
    };
  }

  validateAccess(accessToken: string): AccessTokenCheck {
    return this.deps.signer.verify(accessToken, this.now());
  }

  async rotate(trx: TxExecutor, refreshToken: string): Promise<RotationResult> {
    const repo = new CredentialRepo(trx);
    const tokenHash = this.deps.tokenHasher.hash(refreshToken);
    const now = this.now();

    const consumed = await repo.consumeRefreshToken(tokenHash);
    const tombstone = consumed ? undefined : await selectRotationTombstoneSql(trx, tokenHash);

    const decision = decideRotationOutcome({
      consumed,
      tombstone: tombstone ?? null,
      now,
    });

    switch (decision) {
      case 'INVALID':
        return { outcome: 'INVALID' };

      case 'REUSED': {
        // decideRotationOutcome only answers REUSED when a tombstone was found.
        const userId = tombstone?.userId;
        if (userId === undefined) return { outcome: 'INVALID' };
        const revoked = await this.revokeAll(trx, userId);
        return {
          outcome: 'REUSED',
          userId,
          revokedRefreshTokens: revoked.refreshTokens,
          revokedSessions: revoked.sessions,
        };
      }

      case 'EXPIRED':
      case 'ROTATE': {
        if (!consumed) return { outcome: 'INVALID' };
        if (decision === 'EXPIRED') return { outcome: 'EXPIRED', userId: consumed.userId };

        await repo.insertRotationTombstone({
          tokenHash,
          userId: consumed.userId,
          expiresAt: consumed.expiresAt,
        });

        const credentials = await this.issue(trx, consumed.userId);
        return { outcome: 'ROTATED', userId: consumed.userId, credentials };
      }
    }
  }

  /** Logout. Deleting an absent record is not an error. */
  async revoke(trx: TxExecutor, refreshToken: string): Promise<boolean> {
    const consumed = await new CredentialRepo(trx).consumeRefreshToken(
      this.deps.tokenHasher.hash(refreshToken),
    );
    return consumed !== null;
  }

  /** Every refresh secret and every server-side session of the identity. */
  async revokeAll(trx: TxExecutor, userId: number): Promise<RevokeAllResult> {
    const refreshTokens = await new CredentialRepo(trx).deleteRefreshTokensForUser(userId);
    const sessions = await this.deps.sessionStore.destroyAllForUser(trx, userId);
    return { refreshTokens, sessions };
  }
}
