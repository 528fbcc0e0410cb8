/**
 * backend/src/modules/accounts/account.audit.ts
 *
 * Written inside the withdrawal unit. The original email is not recorded: anonymization
 * would be pointless if the audit trail kept it.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';

export type WithdrawalInitiator = 'self' | 'admin';

export function auditUserWithdrawn(
  writer: AuditWriter,
  data: {
    userId: number;
    initiatedBy: WithdrawalInitiator;
    reason: string | null;
    revokedRefreshTokens: number;
    revokedSessions: number;
  },
): Promise<void> {
  return writer.append('user.withdrawn', data);
}
