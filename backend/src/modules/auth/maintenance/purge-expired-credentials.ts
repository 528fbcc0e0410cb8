/**
 * src/modules/auth/maintenance/purge-expired-credentials.ts
 *
 * WHY:
 * - Expired records are deleted lazily when presented, but a secret nobody presents again
 *   would stay forever. This sweep removes them in bulk.
 * - Tombstones are kept until the rotated secret's own expiry; after that a replay could
 *   not succeed anyway.
 *
 * HOW TO USE:
 * - di.ts schedules it every TOKEN_CLEANUP_INTERVAL_SECONDS (0 disables the timer).
 */

import type { TransactionCoordinator } from '../../../shared/db/transaction';
import type { Logger } from '../../../shared/logger/logger';
import type { SessionStore } from '../../../shared/session/session.store';
import { CredentialRepo } from '../dal/credential.repo';

export type PurgeCounts = {
  refreshTokens: number;
  tombstones: number;
  sessions: number;
};

export async function purgeExpiredCredentials(
  deps: { coordinator: TransactionCoordinator; sessionStore: SessionStore; logger: Logger },
  now: Date = new Date(),
): Promise<PurgeCounts> {
  const counts = await deps.coordinator.runAtomic(
    async (trx) => {
      const repo = new CredentialRepo(trx);
      return {
        refreshTokens: await repo.purgeExpiredRefreshTokens(now),
        tombstones: await repo.purgeExpiredTombstones(now),
        sessions: await deps.sessionStore.purgeExpired(trx, now),
      };
    },
    { label: 'auth.purge_expired' },
  );

  deps.logger.info('auth.purge_expired.done', { flow: 'auth.purge_expired', ...counts });
  return counts;
}
