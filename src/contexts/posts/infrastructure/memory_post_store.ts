/**
 * In-Memory Post Store
 *
 * Process-local PostStore. It mirrors the SQLite store's lifecycle:
 * every operation fails until createSchema() has run, and dropSchema()
 * discards all rows and restarts ids at 1.
 *
 * @module
 */

import type { Post } from '../domain/post.ts';
import type { ManagedPostStore } from '../domain/post_store.ts';

export class MemoryPostStore implements ManagedPostStore {
  private posts: Post[] | null = null;
  private nextId = 1;

  async createSchema(): Promise<void> {
    if (!this.posts) {
      this.posts = [];
    }
  }

  async dropSchema(): Promise<void> {
    this.posts = null;
    this.nextId = 1;
  }

  async list(): Promise<Post[]> {
    return this.table().map((post) => ({ ...post }));
  }

  async find(id: number): Promise<Post | null> {
    const post = this.table().find((candidate) => candidate.id === id);
    return post ? { ...post } : null;
  }

  async create(title: string, body: string): Promise<Post> {
    const posts = this.table();
    const post: Post = { id: this.nextId++, title, body };
    posts.push(post);
    return { ...post };
  }

  async close(): Promise<void> {
    this.posts = null;
  }

  private table(): Post[] {
    if (!this.posts) {
      throw new Error('posts table does not exist; call createSchema() first');
    }
    return this.posts;
  }
}
