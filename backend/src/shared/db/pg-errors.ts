/**
 * backend/src/shared/db/pg-errors.ts
 *
 * Narrowing helpers for driver errors. Postgres reports SQLSTATE in `code` and, for
 * constraint failures, the constraint (or unique index) name in `constraint`.
 */

export const PG_UNIQUE_VIOLATION = '23505';

export type UniqueViolation = { constraint: string | null };

export function asUniqueViolation(err: unknown): UniqueViolation | null {
  if (typeof err !== 'object' || err === null) return null;
  if (!('code' in err) || err.code !== PG_UNIQUE_VIOLATION) return null;

  const constraint =
    'constraint' in err && typeof err.constraint === 'string' ? err.constraint : null;

  return { constraint };
}
