/**
 * src/shared/db/migrations/0002_credentials.ts
 *
 * WHY:
 * - refresh_tokens: hashed renewal secrets (never plaintext), many per user (multi-device).
 * - refresh_token_rotations: tombstones of rotated secrets. The rotated record itself is
 *   deleted; the tombstone is what lets a replay be recognised as reuse.
 * - user_sessions: server-side sessions for the stateful credential mode.
 *
 * RULES:
 * - All three cascade when the owning user row is removed.
 * - Hash columns are UNIQUE: lookups are index hits and a second concurrent delete of the
 *   same record is a no-op the caller can detect.
 */

import { type Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('refresh_tokens')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('user_id', 'integer', (col) =>
      col.notNull().references('users.id').onDelete('cascade'),
    )
    .addColumn('token_hash', 'varchar(64)', (col) => col.notNull().unique())
    .addColumn('expires_at', 'timestamptz', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`CREATE INDEX refresh_tokens_user_id_idx ON refresh_tokens(user_id);`.execute(db);
  await sql`CREATE INDEX refresh_tokens_expires_at_idx ON refresh_tokens(expires_at);`.execute(db);

  await db.schema
    .createTable('refresh_token_rotations')
    .addColumn('token_hash', 'varchar(64)', (col) => col.primaryKey())
    .addColumn('user_id', 'integer', (col) =>
      col.notNull().references('users.id').onDelete('cascade'),
    )
    .addColumn('rotated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('expires_at', 'timestamptz', (col) => col.notNull())
    .execute();

  await sql`
    CREATE INDEX refresh_token_rotations_user_id_idx ON refresh_token_rotations(user_id);
  `.execute(db);

  await db.schema
    .createTable('user_sessions')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('user_id', 'integer', (col) =>
      col.notNull().references('users.id').onDelete('cascade'),
    )
    .addColumn('session_hash', 'varchar(64)', (col) => col.notNull().unique())
    .addColumn('expires_at', 'timestamptz', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`CREATE INDEX user_sessions_user_id_idx ON user_sessions(user_id);`.execute(db);
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('user_sessions').ifExists().execute();
  await db.schema.dropTable('refresh_token_rotations').ifExists().execute();
  await db.schema.dropTable('refresh_tokens').ifExists().execute();
}
