/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - CLI entry for applying migrations (`npm run db:migrate` in backend/).
 */

import { createDb } from './db';
import { migrateToLatest } from './migrator';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb({ databaseUrl: config.databaseUrl, poolMax: 1 });

  try {
    await migrateToLatest(db, logger);
    logger.info('Migrations up to date');
  } finally {
    await db.destroy();
  }
}

runMigrations().catch((err: unknown) => {
  logger.error('Migration failed', { err });
  process.exit(1);
});
