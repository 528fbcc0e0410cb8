/**
 * backend/src/modules/posts/post.routes.ts
 */

import type { FastifyInstance } from 'fastify';
import type { PostController } from './post.controller';

export function registerPostRoutes(app: FastifyInstance, controller: PostController) {
  app.post('/v1/posts', controller.createPost.bind(controller));
  app.get('/v1/posts/:postId', controller.getPost.bind(controller));
  app.patch('/v1/posts/:postId', controller.updatePost.bind(controller));
  app.post('/v1/posts/:postId/comments', controller.createComment.bind(controller));
  app.get('/v1/comments/:commentId', controller.getComment.bind(controller));
}
