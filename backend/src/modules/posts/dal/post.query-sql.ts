/**
 * backend/src/modules/posts/dal/post.query-sql.ts
 *
 * WHY:
 * - DAL READS for posts and comments, joined with the author row.
 *
 * RULES:
 * - No AppError. No policies. No transactions started here.
 * - Soft-deleted content is invisible; a withdrawn author is not.
 */

import type { DbExecutor } from '../../../shared/db/db';

export type PostRow = {
  id: number;
  author_id: number | null;
  author_nickname: string | null;
  author_deleted_at: Date | null;
  title: string;
  content: string;
  created_at: Date;
  updated_at: Date;
};

export type CommentRow = {
  id: number;
  post_id: number;
  author_id: number | null;
  author_nickname: string | null;
  author_deleted_at: Date | null;
  content: string;
  created_at: Date;
  updated_at: Date;
};

export async function selectPostByIdSql(
  db: DbExecutor,
  postId: number,
): Promise<PostRow | undefined> {
  return db
    .selectFrom('posts')
    .leftJoin('users', 'users.id', 'posts.author_id')
    .select([
      'posts.id',
      'posts.author_id',
      'users.nickname as author_nickname',
      'users.deleted_at as author_deleted_at',
      'posts.title',
      'posts.content',
      'posts.created_at',
      'posts.updated_at',
    ])
    .where('posts.id', '=', postId)
    .where('posts.deleted_at', 'is', null)
    .executeTakeFirst();
}

export async function selectCommentByIdSql(
  db: DbExecutor,
  commentId: number,
): Promise<CommentRow | undefined> {
  return db
    .selectFrom('comments')
    .leftJoin('users', 'users.id', 'comments.author_id')
    .select([
      'comments.id',
      'comments.post_id',
      'comments.author_id',
      'users.nickname as author_nickname',
      'users.deleted_at as author_deleted_at',
      'comments.content',
      'comments.created_at',
      'comments.updated_at',
    ])
    .where('comments.id', '=', commentId)
    .where('comments.deleted_at', 'is', null)
    .executeTakeFirst();
}
