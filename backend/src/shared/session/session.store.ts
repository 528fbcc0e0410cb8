/**
 * src/shared/session/session.store.ts
 *
 * WHY:
 * - Server-side sessions in Postgres (user_sessions). Instantly revocable: deleting the
 *   row ends the session.
 * - Revocation shares a unit with the change that caused it (password change, withdrawal),
 *   which a separate session backend could not offer.
 *
 * RULES:
 * - Writes take a TxExecutor (caller's atomic unit); reads take any executor.
 * - Stores only the hash of the session id.
 * - No HTTP concerns here (cookie handling lives in controllers).
 */

import type { DbExecutor, TxExecutor } from '../db/db';
import type { TokenHasher } from '../security/token-hasher';
import { generateSecureToken } from '../security/token';
import type { IssuedSession, SessionRecord } from './session.types';

export class SessionStore {
  private readonly now: () => Date;

  constructor(
    private readonly deps: {
      db: DbExecutor;
      tokenHasher: TokenHasher;
      ttlSeconds: number;
      now?: () => Date;
    },
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  get ttlSeconds(): number {
    return this.deps.ttlSeconds;
  }

  async create(trx: TxExecutor, userId: number): Promise<IssuedSession> {
    const sessionId = generateSecureToken();
    const expiresAt = new Date(this.now().getTime() + this.deps.ttlSeconds * 1000);

    await trx
      .insertInto('user_sessions')
      .values({
        user_id: userId,
        session_hash: this.deps.tokenHasher.hash(sessionId),
        expires_at: expiresAt,
      })
      .execute();

    return { sessionId, expiresAt };
  }

  /** Loads a session by raw id, expired or not; the caller decides what expiry means. */
  async find(sessionId: string): Promise<SessionRecord | null> {
    const row = await this.deps.db
      .selectFrom('user_sessions')
      .select(['user_id', 'expires_at'])
      .where('session_hash', '=', this.deps.tokenHasher.hash(sessionId))
      .executeTakeFirst();

    return row ? { userId: row.user_id, expiresAt: row.expires_at } : null;
  }

  /** Logout / lazy expiry. Idempotent. */
  async destroy(trx: TxExecutor, sessionId: string): Promise<boolean> {
    const result = await trx
      .deleteFrom('user_sessions')
      .where('session_hash', '=', this.deps.tokenHasher.hash(sessionId))
      .executeTakeFirst();
    return Number(result.numDeletedRows) > 0;
  }

  /** Password change, withdrawal, reuse detection: every session of the user. */
  async destroyAllForUser(trx: TxExecutor, userId: number): Promise<number> {
    const result = await trx
      .deleteFrom('user_sessions')
      .where('user_id', '=', userId)
      .executeTakeFirst();
    return Number(result.numDeletedRows);
  }

  async purgeExpired(trx: TxExecutor, now: Date): Promise<number> {
    const result = await trx
      .deleteFrom('user_sessions')
      .where('expires_at', '<=', now)
      .executeTakeFirst();
    return Number(result.numDeletedRows);
  }
}
