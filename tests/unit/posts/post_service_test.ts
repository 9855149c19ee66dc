/**
 * Post Service Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { PostService } from '../../../src/contexts/posts/application/post_service.ts';
import type { Post } from '../../../src/contexts/posts/domain/post.ts';
import type { PostStore } from '../../../src/contexts/posts/domain/post_store.ts';

/**
 * A store that records which operations were called
 */
class RecordingStore implements PostStore {
  readonly calls: string[] = [];
  private posts: Post[] = [];

  async list(): Promise<Post[]> {
    this.calls.push('list');
    return [...this.posts];
  }

  async find(id: number): Promise<Post | null> {
    this.calls.push(`find:${id}`);
    return this.posts.find((post) => post.id === id) ?? null;
  }

  async create(title: string, body: string): Promise<Post> {
    this.calls.push('create');
    const post: Post = { id: this.posts.length + 1, title, body };
    this.posts.push(post);
    return post;
  }
}

test('PostService - createPost then listPosts', async () => {
  const store = new RecordingStore();
  const service = new PostService(store);

  const created = await service.createPost({ title: 'Hello', body: 'World' });
  const listed = await service.listPosts();

  assert.deepEqual(created, { id: 1, title: 'Hello', body: 'World' });
  assert.deepEqual(listed, [created]);
  assert.deepEqual(store.calls, ['create', 'list']);
});

test('PostService - listPosts applies the filter with one store call', async () => {
  const store = new RecordingStore();
  const service = new PostService(store);
  await service.createPost({ title: 'Alpha', body: 'first' });
  await service.createPost({ title: 'Beta', body: 'second' });

  const result = await service.listPosts({ titleLike: 'BET' });

  assert.deepEqual(result, [{ id: 2, title: 'Beta', body: 'second' }]);
  assert.deepEqual(store.calls, ['create', 'create', 'list']);
});

test('PostService - getPost returns null when missing', async () => {
  const store = new RecordingStore();
  const service = new PostService(store);

  assert.equal(await service.getPost(5), null);
  assert.deepEqual(store.calls, ['find:5']);
});
