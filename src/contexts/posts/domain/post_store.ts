/**
 * Post Store
 *
 * Persistence contract the post service depends on.
 *
 * @module
 */

import type { Post } from './post.ts';

export interface PostStore {
  /**
   * All posts in ascending id order
   */
  list(): Promise<Post[]>;

  find(id: number): Promise<Post | null>;

  /**
   * Persist a new post under the next free id
   */
  create(title: string, body: string): Promise<Post>;
}

/**
 * A store whose schema and connection the caller manages
 */
export interface ManagedPostStore extends PostStore {
  createSchema(): Promise<void>;
  dropSchema(): Promise<void>;
  close(): Promise<void>;
}
