/**
 * src/shared/db/migrations/index.ts
 *
 * Static migration list (ordered by name). Used by the CLI migrator and by tests, so no
 * directory scanning or dynamic import is needed at runtime.
 */

import type { Migration } from 'kysely';

import * as m0001 from './0001_users';
import * as m0002 from './0002_credentials';
import * as m0003 from './0003_forum_content';
import * as m0004 from './0004_audit_events';

export const MIGRATIONS: Readonly<Record<string, Migration>> = {
  '0001_users': m0001,
  '0002_credentials': m0002,
  '0003_forum_content': m0003,
  '0004_audit_events': m0004,
};
