/**
 * backend/src/shared/audit/audit.repo.ts
 *
 * WHY:
 * - Append-only audit persistence.
 *
 * RULES:
 * - DAL-style component: DB concerns only. No business rules, no AppError.
 * - Success audits are written inside the caller's unit (they roll back with it);
 *   failure audits use the pool executor so they survive the failed unit.
 */

import type { DbExecutor } from '../db/db';
import type { AuditEventInsert } from './audit.types';

export class AuditRepo {
  constructor(private readonly db: DbExecutor) {}

  /** Returns a repo bound to a different executor (e.g. a transaction). */
  withDb(db: DbExecutor): AuditRepo {
    return new AuditRepo(db);
  }

  async append(event: AuditEventInsert): Promise<void> {
    await this.db
      .insertInto('audit_events')
      .values({
        action: event.action,
        user_id: event.userId,
        request_id: event.requestId,
        ip: event.ip,
        user_agent: event.userAgent,
        // JSON.stringify drops undefined / functions; the DB parses the text into jsonb.
        metadata: JSON.stringify(event.metadata ?? {}),
      })
      .execute();
  }
}
