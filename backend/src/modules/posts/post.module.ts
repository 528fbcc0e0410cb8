/**
 * backend/src/modules/posts/post.module.ts
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { TransactionCoordinator } from '../../shared/db/transaction';
import type { Logger } from '../../shared/logger/logger';

import { PostService } from './post.service';
import { PostController } from './post.controller';
import { registerPostRoutes } from './post.routes';

export type PostModule = ReturnType<typeof createPostModule>;

export function createPostModule(deps: {
  db: DbExecutor;
  coordinator: TransactionCoordinator;
  logger: Logger;
}) {
  const postService = new PostService(deps);
  const controller = new PostController(postService);

  return {
    postService,
    registerRoutes(app: FastifyInstance) {
      registerPostRoutes(app, controller);
    },
  };
}
