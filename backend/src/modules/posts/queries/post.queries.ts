/**
 * backend/src/modules/posts/queries/post.queries.ts
 *
 * Read-only. Shapes joined rows into Post / Comment.
 */

import type { DbExecutor } from '../../../shared/db/db';
import {
  selectCommentByIdSql,
  selectPostByIdSql,
  type CommentRow,
  type PostRow,
} from '../dal/post.query-sql';
import type { Comment, ContentAuthor, Post } from '../post.types';

function toAuthor(row: PostRow | CommentRow): ContentAuthor | null {
  if (row.author_id === null || row.author_nickname === null) return null;
  return {
    id: row.author_id,
    nickname: row.author_nickname,
    withdrawn: row.author_deleted_at !== null,
  };
}

export async function getPostById(db: DbExecutor, postId: number): Promise<Post | undefined> {
  const row = await selectPostByIdSql(db, postId);
  if (!row) return undefined;
  return {
    id: row.id,
    author: toAuthor(row),
    title: row.title,
    content: row.content,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export async function getCommentById(
  db: DbExecutor,
  commentId: number,
): Promise<Comment | undefined> {
  const row = await selectCommentByIdSql(db, commentId);
  if (!row) return undefined;
  return {
    id: row.id,
    postId: row.post_id,
    author: toAuthor(row),
    content: row.content,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
