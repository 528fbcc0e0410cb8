/**
 * backend/src/modules/posts/post.controller.ts
 *
 * RULES:
 * - No DB access here.
 * - A malformed id in the path is a 404, the same as an unknown one.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import { requestMeta } from '../../shared/http/request-meta';
import { requireIdentity } from '../../shared/http/require-auth-context';

import {
  commentIdParamsSchema,
  createCommentSchema,
  createPostSchema,
  postIdParamsSchema,
  updatePostSchema,
} from './post.schemas';
import { PostErrors } from './post.errors';
import type { PostService } from './post.service';

function invalidBody(issues: unknown): AppError {
  return AppError.validationError('Invalid request body', { issues });
}

export class PostController {
  constructor(private readonly postService: PostService) {}

  async createPost(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireIdentity(req);

    const parsed = createPostSchema.safeParse(req.body);
    if (!parsed.success) throw invalidBody(parsed.error.issues);

    const post = await this.postService.createPost(userId, parsed.data, requestMeta(req));
    return reply.status(201).send({ post });
  }

  async getPost(req: FastifyRequest, reply: FastifyReply) {
    const params = postIdParamsSchema.safeParse(req.params);
    if (!params.success) throw PostErrors.postNotFound();

    const post = await this.postService.getPost(params.data.postId);
    return reply.status(200).send({ post });
  }

  async updatePost(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireIdentity(req);

    const params = postIdParamsSchema.safeParse(req.params);
    if (!params.success) throw PostErrors.postNotFound();

    const parsed = updatePostSchema.safeParse(req.body);
    if (!parsed.success) throw invalidBody(parsed.error.issues);

    const post = await this.postService.updatePost(
      userId,
      params.data.postId,
      parsed.data,
      requestMeta(req),
    );
    return reply.status(200).send({ post });
  }

  async createComment(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireIdentity(req);

    const params = postIdParamsSchema.safeParse(req.params);
    if (!params.success) throw PostErrors.postNotFound();

    const parsed = createCommentSchema.safeParse(req.body);
    if (!parsed.success) throw invalidBody(parsed.error.issues);

    const comment = await this.postService.createComment(
      userId,
      params.data.postId,
      parsed.data,
      requestMeta(req),
    );
    return reply.status(201).send({ comment });
  }

  async getComment(req: FastifyRequest, reply: FastifyReply) {
    const params = commentIdParamsSchema.safeParse(req.params);
    if (!params.success) throw PostErrors.commentNotFound();

    const comment = await this.postService.getComment(params.data.commentId);
    return reply.status(200).send({ comment });
  }
}
