/**
 * backend/src/modules/posts/post.errors.ts
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const PostErrors = {
  postNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Post not found.', meta);
  },

  commentNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Comment not found.', meta);
  },

  notAuthor(meta?: AppErrorMeta) {
    return AppError.forbidden('Only the author can edit this post.', meta);
  },

  nothingToUpdate(meta?: AppErrorMeta) {
    return AppError.validationError('No fields to update.', meta);
  },
} as const;
