/**
 * backend/src/modules/posts/dal/post.repo.ts
 *
 * WHY:
 * - DAL WRITES for posts and comments.
 *
 * RULES:
 * - Constructed from a TxExecutor (same discipline as UserRepo).
 * - Returns ids only; the service re-reads through queries/ on the same unit.
 * - No AppError.
 */

import type { TxExecutor } from '../../../shared/db/db';
import type { PostPatch } from '../post.types';

export class PostRepo {
  constructor(private readonly trx: TxExecutor) {}

  async insertPost(params: { authorId: number; title: string; content: string }): Promise<number> {
    const row = await this.trx
      .insertInto('posts')
      .values({
        author_id: params.authorId,
        title: params.title,
        content: params.content,
        deleted_at: null,
      })
      .returning('id')
      .executeTakeFirstOrThrow();
    return row.id;
  }

  /** Only the author's own, non-deleted post is updated. */
  async updatePost(params: { postId: number; authorId: number; patch: PostPatch }): Promise<boolean> {
    const result = await this.trx
      .updateTable('posts')
      .set({ ...params.patch, updated_at: new Date() })
      .where('id', '=', params.postId)
      .where('author_id', '=', params.authorId)
      .where('deleted_at', 'is', null)
      .executeTakeFirst();
    return Number(result.numUpdatedRows) === 1;
  }

  async insertComment(params: {
    postId: number;
    authorId: number;
    content: string;
  }): Promise<number> {
    const row = await this.trx
      .insertInto('comments')
      .values({
        post_id: params.postId,
        author_id: params.authorId,
        content: params.content,
        deleted_at: null,
      })
      .returning('id')
      .executeTakeFirstOrThrow();
    return row.id;
  }
}
