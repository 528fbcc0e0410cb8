/**
 * src/shared/db/migrations/0004_audit_events.ts
 *
 * Append-only audit trail. user_id is intentionally not a foreign key: audit rows
 * outlive the rows they describe.
 */

import { type Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('audit_events')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('action', 'text', (col) => col.notNull())
    .addColumn('user_id', 'integer')
    .addColumn('request_id', 'text')
    .addColumn('ip', 'text')
    .addColumn('user_agent', 'text')
    .addColumn('metadata', 'jsonb', (col) => col.notNull().defaultTo(sql`'{}'::jsonb`))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`CREATE INDEX audit_events_user_id_idx ON audit_events(user_id);`.execute(db);
  await sql`CREATE INDEX audit_events_action_idx ON audit_events(action);`.execute(db);
  await sql`CREATE INDEX audit_events_created_at_idx ON audit_events(created_at);`.execute(db);
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('audit_events').ifExists().execute();
}
