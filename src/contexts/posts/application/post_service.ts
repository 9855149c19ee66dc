/**
 * Post Application Service
 *
 * Post use cases over a PostStore. Each operation makes exactly one
 * store call.
 */

import type { Post, PostInput } from '../domain/post.ts';
import type { PostStore } from '../domain/post_store.ts';
import { applyPostFilter, type PostFilter } from '../domain/post_filters.ts';

export class PostService {
  constructor(private readonly store: PostStore) {}

  /**
   * List posts in ascending id order, narrowed by the filter
   */
  async listPosts(filter: PostFilter = {}): Promise<Post[]> {
    const posts = await this.store.list();
    return applyPostFilter(posts, filter);
  }

  /**
   * Find a post by id. A missing post is an ordinary outcome, not an error.
   */
  async getPost(id: number): Promise<Post | null> {
    return await this.store.find(id);
  }

  async createPost(input: PostInput): Promise<Post> {
    return await this.store.create(input.title, input.body);
  }
}
