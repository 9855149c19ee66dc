/**
 * Posts API Application
 *
 * Builds the Application: request logging, the JSON negotiation gate,
 * and the post routes over the given store.
 */

import { Application } from '../framework/app.ts';
import type { Config } from '../framework/config/config.ts';
import type { Logger } from '../framework/telemetry/logger.ts';
import { JSON_MEDIA_TYPE } from '../framework/http/response.ts';
import { loggingMiddleware } from '../framework/middleware/logging.ts';
import { requireAccept } from '../framework/middleware/negotiation.ts';
import type { PostStore } from './contexts/posts/domain/post_store.ts';
import { PostService } from './contexts/posts/application/post_service.ts';
import { registerPostRoutes } from './contexts/posts/presentation/post_routes.ts';

export interface PostsAppOptions {
  store: PostStore;
  config?: Config;
  logger?: Logger;
}

export function createPostsApp(options: PostsAppOptions): Application {
  const app = new Application({ config: options.config, logger: options.logger });

  app.use(loggingMiddleware());
  // Runs before routing, so no handler or store is reached without it.
  app.use(requireAccept(JSON_MEDIA_TYPE));

  registerPostRoutes(app, new PostService(options.store));

  return app;
}
