/**
 * backend/src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely table typings for the Postgres schema built by ./migrations.
 * - Hand-maintained: every migration that changes a table updates the matching
 *   interface here in the same commit.
 *
 * RULES:
 * - Column names stay snake_case (DB naming never leaks past dal/ and queries/).
 * - Generated<> marks columns with a DB default; nullable columns are optional on insert.
 */

import type { ColumnType, Generated } from 'kysely';

/** Written as a JSON string, read back as the parsed value. */
export type JsonColumn = ColumnType<unknown, string | undefined, string>;

export interface UsersTable {
  id: Generated<number>;
  email: string;
  nickname: string;
  password_hash: string;
  profile_image_url: string | null;
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
  deleted_at: Date | null;
}

export interface RefreshTokensTable {
  id: Generated<number>;
  user_id: number;
  token_hash: string;
  expires_at: Date;
  created_at: Generated<Date>;
}

export interface RefreshTokenRotationsTable {
  token_hash: string;
  user_id: number;
  rotated_at: Generated<Date>;
  expires_at: Date;
}

export interface UserSessionsTable {
  id: Generated<number>;
  user_id: number;
  session_hash: string;
  expires_at: Date;
  created_at: Generated<Date>;
}

export interface PostsTable {
  id: Generated<number>;
  author_id: number | null;
  title: string;
  content: string;
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
  deleted_at: Date | null;
}

export interface CommentsTable {
  id: Generated<number>;
  post_id: number;
  author_id: number | null;
  content: string;
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
  deleted_at: Date | null;
}

export interface AuditEventsTable {
  id: Generated<number>;
  action: string;
  user_id: number | null;
  request_id: string | null;
  ip: string | null;
  user_agent: string | null;
  metadata: JsonColumn;
  created_at: Generated<Date>;
}

export interface DB {
  users: UsersTable;
  refresh_tokens: RefreshTokensTable;
  refresh_token_rotations: RefreshTokenRotationsTable;
  user_sessions: UserSessionsTable;
  posts: PostsTable;
  comments: CommentsTable;
  audit_events: AuditEventsTable;
}
