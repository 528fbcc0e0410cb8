/**
 * backend/src/modules/posts/post.service.ts
 *
 * WHY:
 * - Posts and comments reuse the same write discipline as the account code: every write
 *   in a coordinator unit, the created/updated row re-read on that unit's connection.
 *
 * RULES:
 * - Ownership is checked against the row read inside the unit, not a value the client sent.
 * - Every write unit first confirms the acting user is still active on its own trx. A bearer
 *   token outlives withdrawal until it expires; the row does not.
 */

import type { DbExecutor, TxExecutor } from '../../shared/db/db';
import { AppError } from '../../shared/http/errors';
import { withReadRetry, type TransactionCoordinator } from '../../shared/db/transaction';
import type { Logger } from '../../shared/logger/logger';
import { getActiveUserById } from '../users';

import { PostRepo } from './dal/post.repo';
import { PostErrors } from './post.errors';
import { getCommentById, getPostById } from './queries/post.queries';
import type { Comment, Post, PostPatch } from './post.types';

type WriteMeta = { deadlineAt: number };

async function requireActiveAuthor(trx: TxExecutor, userId: number): Promise<void> {
  const user = await getActiveUserById(trx, userId);
  if (!user) throw AppError.unauthenticated();
}

export class PostService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      coordinator: TransactionCoordinator;
      logger: Logger;
    },
  ) {}

  createPost(
    authorId: number,
    input: { title: string; content: string },
    meta: WriteMeta,
  ): Promise<Post> {
    return this.deps.coordinator.runAtomic(
      async (trx) => {
        await requireActiveAuthor(trx, authorId);
        const postId = await new PostRepo(trx).insertPost({ authorId, ...input });
        const post = await getPostById(trx, postId);
        if (!post) throw PostErrors.postNotFound({ postId });
        return post;
      },
      { label: 'posts.create', deadlineAt: meta.deadlineAt },
    );
  }

  async getPost(postId: number): Promise<Post> {
    const post = await withReadRetry(() => getPostById(this.deps.db, postId), {
      label: 'posts.get',
      logger: this.deps.logger,
    });
    if (!post) throw PostErrors.postNotFound();
    return post;
  }

  updatePost(userId: number, postId: number, patch: PostPatch, meta: WriteMeta): Promise<Post> {
    if (patch.title === undefined && patch.content === undefined) {
      throw PostErrors.nothingToUpdate();
    }

    return this.deps.coordinator.runAtomic(
      async (trx) => {
        await requireActiveAuthor(trx, userId);
        const existing = await getPostById(trx, postId);
        if (!existing) throw PostErrors.postNotFound();
        if (existing.author?.id !== userId) throw PostErrors.notAuthor({ postId, userId });

        await new PostRepo(trx).updatePost({ postId, authorId: userId, patch });

        const updated = await getPostById(trx, postId);
        if (!updated) throw PostErrors.postNotFound();
        return updated;
      },
      { label: 'posts.update', deadlineAt: meta.deadlineAt },
    );
  }

  createComment(
    authorId: number,
    postId: number,
    input: { content: string },
    meta: WriteMeta,
  ): Promise<Comment> {
    return this.deps.coordinator.runAtomic(
      async (trx) => {
        await requireActiveAuthor(trx, authorId);
        const post = await getPostById(trx, postId);
        if (!post) throw PostErrors.postNotFound();

        const commentId = await new PostRepo(trx).insertComment({
          postId,
          authorId,
          content: input.content,
        });
        const comment = await getCommentById(trx, commentId);
        if (!comment) throw PostErrors.commentNotFound({ commentId });
        return comment;
      },
      { label: 'comments.create', deadlineAt: meta.deadlineAt },
    );
  }

  async getComment(commentId: number): Promise<Comment> {
    const comment = await withReadRetry(() => getCommentById(this.deps.db, commentId), {
      label: 'comments.get',
      logger: this.deps.logger,
    });
    if (!comment) throw PostErrors.commentNotFound();
    return comment;
  }
}
