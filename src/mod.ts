/**
 * Application Source
 *
 * Main application module exports.
 */

export { createPostsApp, type PostsAppOptions } from './app.ts';
export { PostService } from './contexts/posts/application/post_service.ts';
export { serializePost, type Post, type PostInput } from './contexts/posts/domain/post.ts';
export type { PostStore, ManagedPostStore } from './contexts/posts/domain/post_store.ts';
export {
  applyPostFilter,
  buildPostPredicates,
  type PostFilter,
  type PostPredicate,
} from './contexts/posts/domain/post_filters.ts';
export {
  MemoryPostStore,
  SqlitePostStore,
  openPostStore,
} from './contexts/posts/infrastructure/mod.ts';
export {
  POSTS_PATH,
  filterFromQuery,
  registerPostRoutes,
} from './contexts/posts/presentation/post_routes.ts';
