/**
 * In-Memory Post Store Tests
 */

import { afterEach, beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';
import { MemoryPostStore } from '../../../src/contexts/posts/infrastructure/memory_post_store.ts';
import { openPostStore } from '../../../src/contexts/posts/infrastructure/mod.ts';

let store: MemoryPostStore;

beforeEach(async () => {
  store = new MemoryPostStore();
  await store.createSchema();
});

afterEach(async () => {
  await store.dropSchema();
});

test('MemoryPostStore - create assigns increasing ids', async () => {
  const first = await store.create('One', 'first');
  const second = await store.create('Two', 'second');

  assert.deepEqual(first, { id: 1, title: 'One', body: 'first' });
  assert.deepEqual(second, { id: 2, title: 'Two', body: 'second' });
  assert.deepEqual(await store.list(), [first, second]);
});

test('MemoryPostStore - find', async () => {
  await store.create('One', 'first');

  assert.deepEqual(await store.find(1), { id: 1, title: 'One', body: 'first' });
  assert.equal(await store.find(2), null);
});

test('MemoryPostStore - createSchema is idempotent', async () => {
  await store.create('One', 'first');
  await store.createSchema();

  assert.equal((await store.list()).length, 1);
});

test('MemoryPostStore - dropSchema discards rows and restarts ids', async () => {
  await store.create('One', 'first');
  await store.dropSchema();

  await assert.rejects(store.list(), {
    message: 'posts table does not exist; call createSchema() first',
  });

  await store.createSchema();
  assert.deepEqual(await store.list(), []);
  assert.equal((await store.create('Again', 'body')).id, 1);
});

test('openPostStore - memory driver is ready to use', async () => {
  const opened = await openPostStore({ driver: 'memory', path: 'unused' });

  assert.deepEqual(await opened.list(), []);
  await opened.close();
});
