/**
 * SQLite Post Store Tests
 */

import { afterEach, beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SqlitePostStore } from '../../../src/contexts/posts/infrastructure/sqlite_post_store.ts';
import { openPostStore } from '../../../src/contexts/posts/infrastructure/mod.ts';

let store: SqlitePostStore;

beforeEach(async () => {
  store = await SqlitePostStore.open(':memory:');
  await store.createSchema();
});

afterEach(async () => {
  await store.close();
});

test('SqlitePostStore - empty table', async () => {
  assert.deepEqual(await store.list(), []);
});

test('SqlitePostStore - create and list in id order', async () => {
  const first = await store.create('One', 'first');
  const second = await store.create('Two', 'second');

  assert.deepEqual(first, { id: 1, title: 'One', body: 'first' });
  assert.deepEqual(second, { id: 2, title: 'Two', body: 'second' });
  assert.deepEqual(await store.list(), [first, second]);
});

test('SqlitePostStore - find', async () => {
  await store.create('One', 'first');

  assert.deepEqual(await store.find(1), { id: 1, title: 'One', body: 'first' });
  assert.equal(await store.find(99), null);
});

test('SqlitePostStore - text is stored verbatim', async () => {
  const post = await store.create("It's 100% \"quoted\"", 'ünïcödé\nline two');

  assert.deepEqual(await store.find(post.id), {
    id: 1,
    title: "It's 100% \"quoted\"",
    body: 'ünïcödé\nline two',
  });
});

test('SqlitePostStore - missing table is an error', async () => {
  await store.dropSchema();

  await assert.rejects(store.list(), /no such table: posts/);
});

test('SqlitePostStore - close is idempotent', async () => {
  await store.close();
  await store.close();
});

test('SqlitePostStore - data survives reopening the file', async () => {
  const dir = await mkdtemp(join(tmpdir(), 'posts-db-'));
  const path = join(dir, 'posts.db');
  try {
    const writer = await openPostStore({ driver: 'sqlite', path });
    await writer.create('Kept', 'on disk');
    await writer.close();

    const reader = await SqlitePostStore.open(path);
    assert.deepEqual(await reader.list(), [{ id: 1, title: 'Kept', body: 'on disk' }]);
    assert.equal((await reader.create('Next', 'id')).id, 2);
    await reader.close();
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
