/**
 * src/modules/auth/dal/credential.query-sql.ts
 *
 * WHY:
 * - DAL READS for credential tables.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here. Inside rotation the caller passes its own unit, so the
 *   tombstone read sees what the unit's DELETE just observed.
 */

import type { DbExecutor } from '../../../shared/db/db';

export async function selectRotationTombstoneSql(
  db: DbExecutor,
  tokenHash: string,
): Promise<{ userId: number; expiresAt: Date } | undefined> {
  const row = await db
    .selectFrom('refresh_token_rotations')
    .select(['user_id', 'expires_at'])
    .where('token_hash', '=', tokenHash)
    .executeTakeFirst();

  return row ? { userId: row.user_id, expiresAt: row.expires_at } : undefined;
}
