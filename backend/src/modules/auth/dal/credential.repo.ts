/**
 * src/modules/auth/dal/credential.repo.ts
 *
 * WHY:
 * - DAL WRITES for refresh_tokens and refresh_token_rotations.
 *
 * RULES:
 * - Constructed from a TxExecutor only: every write runs inside a coordinator unit.
 * - Stores hashes, never raw secrets.
 * - No AppError. No policies.
 */

import type { TxExecutor } from '../../../shared/db/db';

export type ConsumedRefreshToken = {
  userId: number;
  expiresAt: Date;
};

export class CredentialRepo {
  constructor(private readonly trx: TxExecutor) {}

  async insertRefreshToken(params: {
    userId: number;
    tokenHash: string;
    expiresAt: Date;
  }): Promise<void> {
    await this.trx
      .insertInto('refresh_tokens')
      .values({
        user_id: params.userId,
        token_hash: params.tokenHash,
        expires_at: params.expiresAt,
      })
      .execute();
  }

  /**
   * Deletes the record and hands back what it was, in one statement. Of several units
   * racing on the same hash, the row lock lets exactly one of them see a row.
   */
  async consumeRefreshToken(tokenHash: string): Promise<ConsumedRefreshToken | null> {
    const row = await this.trx
      .deleteFrom('refresh_tokens')
      .where('token_hash', '=', tokenHash)
      .returning(['user_id', 'expires_at'])
      .executeTakeFirst();

    return row ? { userId: row.user_id, expiresAt: row.expires_at } : null;
  }

  async insertRotationTombstone(params: {
    tokenHash: string;
    userId: number;
    expiresAt: Date;
  }): Promise<void> {
    await this.trx
      .insertInto('refresh_token_rotations')
      .values({
        token_hash: params.tokenHash,
        user_id: params.userId,
        expires_at: params.expiresAt,
      })
      .onConflict((oc) => oc.column('token_hash').doNothing())
      .execute();
  }

  async deleteRefreshTokensForUser(userId: number): Promise<number> {
    const result = await this.trx
      .deleteFrom('refresh_tokens')
      .where('user_id', '=', userId)
      .executeTakeFirst();
    return Number(result.numDeletedRows);
  }

  async deleteTombstonesForUser(userId: number): Promise<number> {
    const result = await this.trx
      .deleteFrom('refresh_token_rotations')
      .where('user_id', '=', userId)
      .executeTakeFirst();
    return Number(result.numDeletedRows);
  }

  async purgeExpiredRefreshTokens(now: Date): Promise<number> {
    const result = await this.trx
      .deleteFrom('refresh_tokens')
      .where('expires_at', '<=', now)
      .executeTakeFirst();
    return Number(result.numDeletedRows);
  }

  async purgeExpiredTombstones(now: Date): Promise<number> {
    const result = await this.trx
      .deleteFrom('refresh_token_rotations')
      .where('expires_at', '<=', now)
      .executeTakeFirst();
    return Number(result.numDeletedRows);
  }
}
