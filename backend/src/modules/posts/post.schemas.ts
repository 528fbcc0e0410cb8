/**
 * backend/src/modules/posts/post.schemas.ts
 */

import { z } from 'zod';

const idParam = z.coerce.number().int().positive().max(2_147_483_647);

const titleSchema = z.string().trim().min(1, 'Title is required').max(100);
const postContentSchema = z.string().min(1, 'Content is required').max(10_000);

export const postIdParamsSchema = z.object({ postId: idParam });
export const commentIdParamsSchema = z.object({ commentId: idParam });

export const createPostSchema = z.object({
  title: titleSchema,
  content: postContentSchema,
});

export const updatePostSchema = z
  .object({
    title: titleSchema.optional(),
    content: postContentSchema.optional(),
  })
  .strict();

export const createCommentSchema = z.object({
  content: z.string().min(1, 'Content is required').max(1000),
});
