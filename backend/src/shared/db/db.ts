/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 * - Names the two DB capabilities the rest of the code is allowed to hold.
 *
 * HOW TO USE:
 * - Reads (query-sql / queries) accept DbExecutor: the pool or a transaction.
 * - Writes (repos) accept TxExecutor only. A TxExecutor exists solely inside
 *   TransactionCoordinator.runAtomic, so a mutation and its follow-up read cannot be
 *   split across connections.
 */

import pg from 'pg';
import { Kysely, PostgresDialect, type PostgresPool, type Transaction } from 'kysely';

import type { DB } from './schema';

export type Db = Kysely<DB>;

/** Read capability: works for both the pool and a transaction. */
export type DbExecutor = Kysely<DB>;

/** Write capability: an open READ COMMITTED unit from TransactionCoordinator. */
export type TxExecutor = Transaction<DB>;

export function createDb(opts: { databaseUrl: string; poolMax: number }): Db {
  const pool = new pg.Pool({
    connectionString: opts.databaseUrl,
    max: opts.poolMax,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  return createDbFromPool(pool);
}

/** Any pg.Pool-shaped pool (tests pass an in-process one). */
export function createDbFromPool(pool: PostgresPool): Db {
  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
  });
}
