/**
 * backend/src/shared/db/migrator.ts
 *
 * Runs the static migration list against any Db (CLI and tests share this path).
 */

import { Migrator, type MigrationProvider } from 'kysely';

import type { Db } from './db';
import type { Logger } from '../logger/logger';
import { MIGRATIONS } from './migrations';

const provider: MigrationProvider = {
  async getMigrations() {
    return { ...MIGRATIONS };
  },
};

export async function migrateToLatest(db: Db, logger: Logger): Promise<void> {
  const migrator = new Migrator({ db, provider });
  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('migration success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('migration error', { migration: r.migrationName });
  });

  if (error) {
    throw error instanceof Error ? error : new Error('Migration failed', { cause: error });
  }
}
