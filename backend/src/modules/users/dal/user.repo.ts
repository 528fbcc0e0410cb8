/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users.
 * - Uniqueness of email / nickname among active rows is the DB's job (partial unique
 *   indexes); the coordinator turns a violation into CONFLICT.
 *
 * RULES:
 * - Constructed from a TxExecutor: an update and the row it returns share one connection.
 * - No transactions started here (service owns the unit).
 * - No AppError.
 * - Updates only ever touch active rows.
 */

import type { TxExecutor } from '../../../shared/db/db';
import type { UserRow } from './user.query-sql';
import type { UserColumnPatch } from '../policies/user-patch.policy';

export class UserRepo {
  constructor(private readonly trx: TxExecutor) {}

  async insertUser(params: {
    email: string;
    nickname: string;
    passwordHash: string;
  }): Promise<UserRow> {
    return this.trx
      .insertInto('users')
      .values({
        email: params.email.toLowerCase(),
        nickname: params.nickname,
        password_hash: params.passwordHash,
        profile_image_url: null,
        deleted_at: null,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  /** Applies an allow-listed patch and returns the updated row (undefined if not active). */
  async updateFields(userId: number, patch: UserColumnPatch): Promise<UserRow | undefined> {
    return this.trx
      .updateTable('users')
      .set({ ...patch, updated_at: new Date() })
      .where('id', '=', userId)
      .where('deleted_at', 'is', null)
      .returningAll()
      .executeTakeFirst();
  }

  async updatePasswordHash(userId: number, passwordHash: string): Promise<boolean> {
    const result = await this.trx
      .updateTable('users')
      .set({ password_hash: passwordHash, updated_at: new Date() })
      .where('id', '=', userId)
      .where('deleted_at', 'is', null)
      .executeTakeFirst();

    return Number(result.numUpdatedRows) === 1;
  }

  /**
   * Withdrawal: overwrite identifying fields and mark the row deleted in one statement.
   * Returns false when the user does not exist or is already withdrawn.
   */
  async anonymizeAndSoftDelete(
    userId: number,
    replacement: { email: string; nickname: string; deletedAt: Date },
  ): Promise<boolean> {
    const result = await this.trx
      .updateTable('users')
      .set({
        email: replacement.email,
        nickname: replacement.nickname,
        profile_image_url: null,
        deleted_at: replacement.deletedAt,
        updated_at: replacement.deletedAt,
      })
      .where('id', '=', userId)
      .where('deleted_at', 'is', null)
      .executeTakeFirst();

    return Number(result.numUpdatedRows) === 1;
  }
}
